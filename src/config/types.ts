import { LogLevel } from "../observability/types";

export interface OutputDirs {
  records: string;
  pdfs: string;
  sources: string;
  manifests: string;
}

export interface AppConfig {
  baseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  crawlConcurrency: number;
  crawlDelayMs: number;
  downloadConcurrency: number;
  sourceConcurrency: number;
  minArtifactBytes: number;
  resolverIntervalMs: number;
  arxivApiUrl: string;
  arxivEprintUrl: string;
  extractSources: boolean;
  logFile: string;
  logLevel: LogLevel;
  logToConsole: boolean;
  exportPath: string;
  outputDirs: OutputDirs;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs">> & {
  outputDirs?: Partial<OutputDirs>;
};
