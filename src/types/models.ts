export interface PaperLink {
  url: string;
  paperId: string;
}

export type ReviewEntry = Record<string, string>;

/** Persisted shape of one crawled paper page; keys match the existing corpus files. */
export interface PaperDocument {
  Title: string;
  "Author(s)": string[];
  Abstract: string;
  PDF: string;
  BibTex: string;
  Topics: string[];
  Reviews: ReviewEntry[];
  "Meta-review": ReviewEntry[];
  "Author Feedback": string;
  "Code Repository": string;
  Dataset: string;
}

export interface MetadataRecord {
  paperId: string;
  sourcePath: string;
  title: string;
  documentReference?: string;
  sourceIdentifierHint: string;
  abstract?: string;
  topics: string[];
}

export type ArtifactKind = "pdf" | "source";

export interface ArtifactReference {
  key: string;
  paperId: string;
  kind: ArtifactKind;
  url?: string;
  title?: string;
  targetPath: string;
  extractDir?: string;
}

export type ArtifactErrorKind =
  | "invalid_reference"
  | "http_status"
  | "network"
  | "timeout"
  | "no_match"
  | "resolver"
  | "archive"
  | "write"
  | "unexpected";

interface OutcomeBase {
  reference: ArtifactReference;
  durationMs: number;
  finishedAt: string;
}

export interface DownloadedOutcome extends OutcomeBase {
  status: "downloaded";
  bytes: number;
  resolvedUrl?: string;
}

export interface SkippedOutcome extends OutcomeBase {
  status: "skipped";
  bytes: number;
}

export interface FailedOutcome extends OutcomeBase {
  status: "failed";
  errorKind: ArtifactErrorKind;
  error: string;
  statusCode?: number;
}

export type FetchOutcome = DownloadedOutcome | SkippedOutcome | FailedOutcome;

export interface RunSummary {
  downloaded: number;
  skipped: number;
  failed: number;
  total: number;
}
