import { ArtifactError, errorKindOf, errorMessage } from "../core/errors";
import { ArtifactReference, DownloadedOutcome, FailedOutcome, SkippedOutcome } from "../types";

function elapsedSince(startedAt: number): number {
  return Math.max(0, Date.now() - startedAt);
}

export function downloadedOutcome(
  reference: ArtifactReference,
  bytes: number,
  startedAt: number,
  resolvedUrl?: string,
): DownloadedOutcome {
  return {
    status: "downloaded",
    reference,
    bytes,
    resolvedUrl,
    durationMs: elapsedSince(startedAt),
    finishedAt: new Date().toISOString(),
  };
}

export function skippedOutcome(reference: ArtifactReference, bytes: number, startedAt: number): SkippedOutcome {
  return {
    status: "skipped",
    reference,
    bytes,
    durationMs: elapsedSince(startedAt),
    finishedAt: new Date().toISOString(),
  };
}

export function failedOutcome(reference: ArtifactReference, error: unknown, startedAt: number): FailedOutcome {
  return {
    status: "failed",
    reference,
    errorKind: errorKindOf(error),
    error: errorMessage(error),
    statusCode: error instanceof ArtifactError ? error.statusCode : undefined,
    durationMs: elapsedSince(startedAt),
    finishedAt: new Date().toISOString(),
  };
}
