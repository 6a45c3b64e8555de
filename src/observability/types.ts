export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  paperId?: string;
  url?: string;
  pageUrl?: string;
  kind?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "pages_crawled"
  | "records_saved"
  | "records_invalid"
  | "artifacts_downloaded"
  | "artifacts_skipped"
  | "artifacts_failed"
  | "resolver_calls"
  | "archives_extracted";

export type MetricTimerName = "page_fetch_ms" | "download_ms" | "resolve_ms";
