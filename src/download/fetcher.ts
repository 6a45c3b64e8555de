import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { Dispatcher } from "undici";
import { ArtifactError, errorMessage } from "../core/errors";
import { defaultFetch, FetchFn, isAbsoluteHttpUrl } from "../core/fetch";
import { Logger } from "../observability";
import { ArtifactReference, DownloadedOutcome, FailedOutcome } from "../types";
import { downloadedOutcome, failedOutcome } from "./outcomes";

export interface FetchArtifactOptions {
  logger: Logger;
  userAgent: string;
  timeoutMs: number;
  accept?: string;
  dispatcher?: Dispatcher;
  fetchFn?: FetchFn;
}

interface WrittenFile {
  bytes: number;
  resolvedUrl: string;
}

function toTransportError(error: unknown, signal: AbortSignal, timeoutMs: number, url: string): ArtifactError {
  if (error instanceof ArtifactError) {
    return error;
  }
  if (signal.aborted) {
    return new ArtifactError(`Timed out after ${timeoutMs} ms`, "timeout", undefined, { url });
  }
  const cause = error instanceof Error && error.cause instanceof Error ? `: ${error.cause.message}` : "";
  return new ArtifactError(`${errorMessage(error)}${cause}`, "network", undefined, { url });
}

function toWriteError(error: unknown, targetPath: string): ArtifactError {
  return new ArtifactError(`Cannot write ${targetPath}: ${errorMessage(error)}`, "write", undefined, { targetPath });
}

async function prepareTarget(targetPath: string): Promise<void> {
  try {
    await fs.promises.mkdir(path.dirname(targetPath), { recursive: true });
  } catch (error) {
    throw toWriteError(error, targetPath);
  }
}

/**
 * One GET within a single overall time budget. The body lands in a `.part`
 * file that is renamed over the target only once fully written. Failures on
 * the local side are `write` errors; everything upstream is `network` or
 * `timeout`.
 */
async function downloadToFile(url: string, targetPath: string, options: FetchArtifactOptions): Promise<WrittenFile> {
  const fetchFn = options.fetchFn ?? defaultFetch;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
  const tempPath = `${targetPath}.part`;

  try {
    const response = await fetchFn(url, {
      method: "GET",
      headers: {
        "user-agent": options.userAgent,
        accept: options.accept ?? "*/*",
      },
      dispatcher: options.dispatcher,
      signal: controller.signal,
      redirect: "follow",
    }).catch((error: unknown) => {
      throw toTransportError(error, controller.signal, options.timeoutMs, url);
    });

    if (response.status !== 200) {
      await response.body?.cancel();
      throw new ArtifactError(`HTTP ${response.status}`, "http_status", response.status, { url });
    }

    if (!response.body) {
      throw new ArtifactError("Response had no body", "network", response.status, { url });
    }

    try {
      await prepareTarget(targetPath);
    } catch (error) {
      await response.body.cancel();
      throw error;
    }

    const writable = fs.createWriteStream(tempPath, { flags: "w" });
    try {
      await pipeline(Readable.fromWeb(response.body), writable);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      if (writable.errored) {
        throw toWriteError(error, targetPath);
      }
      throw toTransportError(error, controller.signal, options.timeoutMs, url);
    }

    try {
      await fs.promises.rename(tempPath, targetPath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw toWriteError(error, targetPath);
    }

    return { bytes: writable.bytesWritten, resolvedUrl: response.url || url };
  } finally {
    clearTimeout(timeout);
  }
}

export async function fetchArtifact(
  reference: ArtifactReference,
  options: FetchArtifactOptions,
): Promise<DownloadedOutcome | FailedOutcome> {
  const startedAt = Date.now();
  const { logger } = options;
  const fields = { paperId: reference.paperId, kind: reference.kind, url: reference.url };

  if (!isAbsoluteHttpUrl(reference.url)) {
    const error = new ArtifactError(
      `Not an absolute http(s) URL: ${reference.url ?? "<missing>"}`,
      "invalid_reference",
    );
    logger.error("artifact_fetch_failed", { ...fields, errorKind: error.kind, error: error.message });
    return failedOutcome(reference, error, startedAt);
  }

  try {
    const written = await downloadToFile(reference.url, reference.targetPath, options);
    const outcome = downloadedOutcome(reference, written.bytes, startedAt, written.resolvedUrl);
    logger.info("artifact_downloaded", {
      ...fields,
      targetPath: reference.targetPath,
      bytes: written.bytes,
      durationMs: outcome.durationMs,
    });
    return outcome;
  } catch (error) {
    const outcome = failedOutcome(reference, error, startedAt);
    logger.error("artifact_fetch_failed", {
      ...fields,
      errorKind: outcome.errorKind,
      statusCode: outcome.statusCode,
      error: outcome.error,
      durationMs: outcome.durationMs,
    });
    return outcome;
  }
}
