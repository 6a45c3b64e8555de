import fs from "node:fs";
import path from "node:path";
import { Logger } from "../observability";
import { listRecords } from "../store";
import { MetadataRecord } from "../types";

const SEPARATOR = "=".repeat(80);

export interface CorpusExportSummary {
  exported: number;
  invalid: number;
  outPath: string;
}

export function renderCorpusEntry(record: MetadataRecord): string {
  const title = record.title || "No Title";
  const abstract = record.abstract?.trim() || "No Abstract";
  const topics = record.topics.length > 0 ? record.topics.join("; ") : "No Topics";
  return `Title: ${title}\nAbstract: ${abstract}\nTopics: ${topics}\n\n${SEPARATOR}\n\n`;
}

/** Writes title, abstract and topics of every valid record into one plain-text file. */
export async function exportCorpus(recordsDir: string, outPath: string, logger: Logger): Promise<CorpusExportSummary> {
  const listing = await listRecords(recordsDir);
  for (const invalid of listing.invalid) {
    logger.warn("record_invalid_skipped", { filePath: invalid.filePath, error: invalid.error.message });
  }

  const absoluteOut = path.resolve(outPath);
  await fs.promises.mkdir(path.dirname(absoluteOut), { recursive: true });
  await fs.promises.writeFile(absoluteOut, listing.records.map(renderCorpusEntry).join(""), "utf-8");

  const summary = { exported: listing.records.length, invalid: listing.invalid.length, outPath: absoluteOut };
  logger.info("export_complete", { ...summary });
  return summary;
}
