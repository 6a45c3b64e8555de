import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { LogLevel } from "../observability/types";
import { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://papers.miccai.org/miccai-2025/",
  userAgent: "paper-harvester/0.1 (+research corpus builder)",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 20_000,
  downloadTimeoutMs: 300_000,
  crawlConcurrency: 1,
  crawlDelayMs: 1_000,
  downloadConcurrency: 10,
  sourceConcurrency: 2,
  minArtifactBytes: 1024,
  resolverIntervalMs: 3_000,
  arxivApiUrl: "https://export.arxiv.org/api/query",
  arxivEprintUrl: "https://arxiv.org/e-print/",
  extractSources: true,
  logFile: "logs/paper-harvester.log",
  logLevel: "info",
  logToConsole: false,
  exportPath: "data/all_abs_title_topics.txt",
  outputDirs: {
    records: "data/json",
    pdfs: "data/pdf",
    sources: "data/sources",
    manifests: "data/manifests",
  },
};

const ConfigOverridesSchema = z
  .object({
    baseUrl: z.string().url(),
    userAgent: z.string().min(1),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: z.number().int().positive(),
    downloadTimeoutMs: z.number().int().positive(),
    crawlConcurrency: z.number().int().min(1),
    crawlDelayMs: z.number().int().min(0),
    downloadConcurrency: z.number().int().min(1),
    sourceConcurrency: z.number().int().min(1),
    minArtifactBytes: z.number().int().min(0),
    resolverIntervalMs: z.number().int().min(0),
    arxivApiUrl: z.string().url(),
    arxivEprintUrl: z.string().url(),
    extractSources: z.boolean(),
    logFile: z.string().min(1),
    logLevel: z.enum(["debug", "info", "warn", "error"]),
    logToConsole: z.boolean(),
    exportPath: z.string().min(1),
    outputDirs: z
      .object({
        records: z.string().min(1),
        pdfs: z.string().min(1),
        sources: z.string().min(1),
        manifests: z.string().min(1),
      })
      .partial(),
  })
  .partial();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const result = ConfigOverridesSchema.safeParse(JSON.parse(raw));
  if (!result.success) {
    throw new Error(`Invalid config file ${absolutePath}: ${result.error.message}`);
  }
  return result.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  return {
    ...merged,
    baseUrl: env.BASE_URL ?? merged.baseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    crawlConcurrency: toInt(env.CRAWL_CONCURRENCY, merged.crawlConcurrency),
    crawlDelayMs: toInt(env.CRAWL_DELAY_MS, merged.crawlDelayMs),
    downloadConcurrency: toInt(env.DOWNLOAD_CONCURRENCY, merged.downloadConcurrency),
    sourceConcurrency: toInt(env.SOURCE_CONCURRENCY, merged.sourceConcurrency),
    minArtifactBytes: toInt(env.MIN_ARTIFACT_BYTES, merged.minArtifactBytes),
    resolverIntervalMs: toInt(env.RESOLVER_INTERVAL_MS, merged.resolverIntervalMs),
    arxivApiUrl: env.ARXIV_API_URL ?? merged.arxivApiUrl,
    arxivEprintUrl: env.ARXIV_EPRINT_URL ?? merged.arxivEprintUrl,
    extractSources: toBool(env.EXTRACT_SOURCES, merged.extractSources),
    logFile: env.LOG_FILE ?? merged.logFile,
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
    logToConsole: toBool(env.LOG_TO_CONSOLE, merged.logToConsole),
    exportPath: env.EXPORT_PATH ?? merged.exportPath,
    outputDirs: {
      records: env.OUTPUT_RECORDS_DIR ?? merged.outputDirs.records,
      pdfs: env.OUTPUT_PDFS_DIR ?? merged.outputDirs.pdfs,
      sources: env.OUTPUT_SOURCES_DIR ?? merged.outputDirs.sources,
      manifests: env.OUTPUT_MANIFESTS_DIR ?? merged.outputDirs.manifests,
    },
  };
}

export { DEFAULT_CONFIG };
