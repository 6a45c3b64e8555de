import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Response } from "undici";
import { AppConfig, DEFAULT_CONFIG } from "../src/config";
import { FetchFn } from "../src/core/fetch";
import { Logger, ProgressStream } from "../src/observability";
import { ArtifactReference } from "../src/types";

export function makeTempDir(prefix = "harvester-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function testConfig(root: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    baseUrl: "https://papers.test/miccai-2025/",
    arxivApiUrl: "https://arxiv.test/api/query",
    arxivEprintUrl: "https://arxiv.test/e-print/",
    downloadTimeoutMs: 5_000,
    requestTimeoutMs: 5_000,
    resolverIntervalMs: 0,
    crawlDelayMs: 0,
    logFile: path.join(root, "logs", "test.log"),
    exportPath: path.join(root, "export.txt"),
    outputDirs: {
      records: path.join(root, "json"),
      pdfs: path.join(root, "pdf"),
      sources: path.join(root, "sources"),
      manifests: path.join(root, "manifests"),
    },
    ...overrides,
  };
}

export interface LoggedLine {
  level: string;
  msg: string;
  [key: string]: unknown;
}

export function memoryLogger(component = "test"): { logger: Logger; lines: LoggedLine[] } {
  const lines: LoggedLine[] = [];
  const logger = new Logger({
    component,
    runId: "run_test",
    destinations: [
      {
        write(_level, line) {
          lines.push(JSON.parse(line));
        },
      },
    ],
  });
  return { logger, lines };
}

export function captureStream(isTTY = false): ProgressStream & { chunks: string[] } {
  const chunks: string[] = [];
  return {
    isTTY,
    chunks,
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
  };
}

export type CannedRoute = { status: number; body?: string | Buffer } | Error;

export function urlOf(input: Parameters<FetchFn>[0]): string {
  if (typeof input === "string") {
    return input;
  }
  return "href" in input ? input.href : input.url;
}

/** Serves canned responses by exact URL; unknown URLs get a 404. */
export function routeFetch(routes: Record<string, CannedRoute>): { fetchFn: FetchFn; calls: string[] } {
  const calls: string[] = [];
  const fetchFn: FetchFn = async (input) => {
    const url = urlOf(input);
    calls.push(url);
    const route = routes[url];
    if (!route) {
      return new Response("not found", { status: 404 });
    }
    if (route instanceof Error) {
      throw route;
    }
    return new Response(route.body ?? "", { status: route.status });
  };
  return { fetchFn, calls };
}

export function writeRecord(recordsDir: string, paperId: string, data: unknown): string {
  fs.mkdirSync(recordsDir, { recursive: true });
  const filePath = path.join(recordsDir, `${paperId}.json`);
  fs.writeFileSync(filePath, typeof data === "string" ? data : JSON.stringify(data, null, 2));
  return filePath;
}

export function makeReference(paperId: string, root = "/tmp/harvester-refs"): ArtifactReference {
  return {
    key: `pdf:${paperId}`,
    paperId,
    kind: "pdf",
    url: `https://papers.test/${paperId}.pdf`,
    targetPath: path.join(root, `${paperId}.pdf`),
  };
}
