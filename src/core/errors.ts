import { ArtifactErrorKind } from "../types";

export class PipelineError extends Error {
  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = "PipelineError";
  }
}

/** The records directory itself cannot be listed; fatal for the whole run. */
export class RecordStoreError extends PipelineError {
  constructor(recordsDir: string, cause: string) {
    super(`Cannot read records directory ${recordsDir}: ${cause}`, { recordsDir });
    this.name = "RecordStoreError";
  }
}

export class RecordParseError extends PipelineError {
  readonly kind = "parse";

  constructor(
    public readonly filePath: string,
    reason: string,
  ) {
    super(`Invalid metadata record ${filePath}: ${reason}`, { filePath });
    this.name = "RecordParseError";
  }
}

export class ArtifactError extends PipelineError {
  constructor(
    message: string,
    public readonly kind: ArtifactErrorKind,
    public readonly statusCode?: number,
    details?: Record<string, unknown>,
  ) {
    super(message, details);
    this.name = "ArtifactError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorKindOf(error: unknown): ArtifactErrorKind {
  return error instanceof ArtifactError ? error.kind : "unexpected";
}
