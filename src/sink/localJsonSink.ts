import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { ArtifactKind, FetchOutcome, PaperDocument } from "../types";
import { Sink } from "./types";

export class LocalJsonSink implements Sink {
  private readonly recordsDir: string;
  private readonly manifestsDir: string;
  private readonly runId: string;

  constructor(config: AppConfig, runId: string) {
    this.recordsDir = path.resolve(config.outputDirs.records);
    this.manifestsDir = path.resolve(config.outputDirs.manifests);
    this.runId = runId;
  }

  recordPath(paperId: string): string {
    return path.join(this.recordsDir, `${paperId}.json`);
  }

  async hasRecord(paperId: string): Promise<boolean> {
    try {
      await fs.promises.access(this.recordPath(paperId), fs.constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  async publishRecord(paperId: string, document: PaperDocument): Promise<string> {
    await fs.promises.mkdir(this.recordsDir, { recursive: true });
    const filePath = this.recordPath(paperId);
    const tempPath = `${filePath}.part`;
    await fs.promises.writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
    await fs.promises.rename(tempPath, filePath);
    return filePath;
  }

  async publishOutcomes(kind: ArtifactKind, outcomes: FetchOutcome[]): Promise<void> {
    await this.appendLines(
      path.join(this.manifestsDir, `${kind}-outcomes.jsonl`),
      outcomes.map((outcome) => ({
        runId: this.runId,
        key: outcome.reference.key,
        paperId: outcome.reference.paperId,
        url: outcome.reference.url,
        targetPath: outcome.reference.targetPath,
        status: outcome.status,
        durationMs: outcome.durationMs,
        finishedAt: outcome.finishedAt,
        ...(outcome.status === "failed"
          ? { errorKind: outcome.errorKind, error: outcome.error, statusCode: outcome.statusCode }
          : { bytes: outcome.bytes }),
      })),
    );
  }

  private async appendLines(filePath: string, records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(filePath, content, "utf-8");
  }
}
