import { AppConfig } from "../config";
import { ArtifactError, errorMessage } from "../core/errors";
import { FetchFn, getFetchDispatcher } from "../core/fetch";
import { Pacer } from "../core/pacing";
import { Logger, MetricsRegistry, ProgressReporter, ProgressStream } from "../observability";
import { ArxivResolver, eprintUrl, IdentifierResolver } from "../resolve";
import { Sink } from "../sink";
import { listRecords } from "../store";
import { ArtifactKind, ArtifactReference, FetchOutcome, RunSummary } from "../types";
import { materializeArchive } from "./archive";
import { fetchArtifact, FetchArtifactOptions } from "./fetcher";
import { failedOutcome, skippedOutcome } from "./outcomes";
import { buildReferences } from "./references";
import { ReferenceTask, runScheduled } from "./scheduler";
import { SummaryAccumulator } from "./summary";
import { checkArtifact, isDirectorySatisfied } from "./validity";

export interface DownloaderDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sink?: Sink;
  fetchFn?: FetchFn;
  progressStream?: ProgressStream;
  concurrency?: number;
}

export interface SourceDownloaderDeps extends DownloaderDeps {
  resolver?: IdentifierResolver;
  pacer?: Pacer;
  extract?: boolean;
}

export interface DownloadRun {
  kind: ArtifactKind;
  summary: RunSummary;
  outcomes: FetchOutcome[];
  invalidRecords: number;
}

interface ReferenceSet {
  references: ArtifactReference[];
  invalidRecords: number;
}

const PROGRESS_LABELS: Record<ArtifactKind, string> = {
  pdf: "Downloading PDFs",
  source: "Fetching arXiv sources",
};

async function loadReferences(deps: DownloaderDeps, kind: ArtifactKind): Promise<ReferenceSet> {
  const { config, logger, metrics } = deps;
  const listing = await listRecords(config.outputDirs.records);

  for (const invalid of listing.invalid) {
    metrics.incrementCounter("records_invalid", 1);
    logger.warn("record_invalid_skipped", { filePath: invalid.filePath, error: invalid.error.message });
  }

  const references = buildReferences(listing.records, kind, config.outputDirs);
  logger.info("references_loaded", {
    kind,
    records: listing.records.length,
    invalidRecords: listing.invalid.length,
    references: references.length,
  });
  return { references, invalidRecords: listing.invalid.length };
}

function fetchOptionsFor(deps: DownloaderDeps, accept: string): FetchArtifactOptions {
  return {
    logger: deps.logger,
    userAgent: deps.config.userAgent,
    timeoutMs: deps.config.downloadTimeoutMs,
    accept,
    dispatcher: getFetchDispatcher(deps.config.ignoreHttpsErrors),
    fetchFn: deps.fetchFn,
  };
}

async function runReferences(
  deps: DownloaderDeps,
  kind: ArtifactKind,
  set: ReferenceSet,
  concurrency: number,
  task: ReferenceTask,
): Promise<DownloadRun> {
  const { logger, metrics } = deps;
  const progress = new ProgressReporter({
    label: PROGRESS_LABELS[kind],
    total: set.references.length,
    stream: deps.progressStream,
  });
  const accumulator = new SummaryAccumulator(set.references, { progress, metrics });

  logger.info("artifact_run_start", { kind, total: set.references.length, concurrency });
  let outcomes: FetchOutcome[];
  try {
    outcomes = await runScheduled(set.references, {
      concurrency,
      task,
      logger,
      onOutcome: (outcome) => accumulator.record(outcome),
    });
  } finally {
    progress.close();
  }

  if (deps.sink) {
    try {
      await deps.sink.publishOutcomes(kind, outcomes);
    } catch (error) {
      logger.error("manifest_write_failed", { kind, error: errorMessage(error) });
    }
  }
  const summary = accumulator.summary();
  logger.info("artifact_run_complete", { kind, ...summary });
  return { kind, summary, outcomes, invalidRecords: set.invalidRecords };
}

export async function runPdfDownloads(deps: DownloaderDeps): Promise<DownloadRun> {
  const { config, logger, metrics } = deps;
  const set = await loadReferences(deps, "pdf");
  const fetchOptions = fetchOptionsFor(deps, "application/pdf,*/*");

  const task: ReferenceTask = async (reference) => {
    const startedAt = Date.now();
    const validity = await checkArtifact(reference.targetPath, config.minArtifactBytes);
    if (validity.satisfied) {
      logger.info("artifact_skipped", { paperId: reference.paperId, kind: "pdf", targetPath: reference.targetPath });
      return skippedOutcome(reference, validity.bytes, startedAt);
    }
    if (validity.reason === "undersized") {
      logger.info("artifact_undersized_refetch", { paperId: reference.paperId, bytes: validity.bytes });
    }

    const stopTimer = metrics.startTimer("download_ms");
    try {
      return await fetchArtifact(reference, fetchOptions);
    } finally {
      stopTimer();
    }
  };

  return runReferences(deps, "pdf", set, deps.concurrency ?? config.downloadConcurrency, task);
}

export async function runSourceDownloads(deps: SourceDownloaderDeps): Promise<DownloadRun> {
  const { config, logger, metrics } = deps;
  const extract = deps.extract ?? config.extractSources;
  const set = await loadReferences(deps, "source");
  const fetchOptions = fetchOptionsFor(deps, "application/gzip,application/x-eprint-tar,*/*");
  const pacer = deps.pacer ?? new Pacer(config.resolverIntervalMs);
  const resolver =
    deps.resolver ??
    new ArxivResolver({
      apiUrl: config.arxivApiUrl,
      userAgent: config.userAgent,
      timeoutMs: config.requestTimeoutMs,
      pacer,
      dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
      fetchFn: deps.fetchFn,
    });

  const materialize = async (reference: ArtifactReference, startedAt: number): Promise<FetchOutcome | undefined> => {
    if (!extract || !reference.extractDir) {
      return undefined;
    }
    if (!(await materializeArchive(reference.targetPath, reference.extractDir, logger))) {
      return failedOutcome(
        reference,
        new ArtifactError(`Could not extract ${reference.targetPath}; bundle kept`, "archive"),
        startedAt,
      );
    }
    metrics.incrementCounter("archives_extracted", 1);
    return undefined;
  };

  const task: ReferenceTask = async (reference) => {
    const startedAt = Date.now();
    const validity = await checkArtifact(reference.targetPath, config.minArtifactBytes);
    if (validity.satisfied) {
      if (extract && reference.extractDir && !(await isDirectorySatisfied(reference.extractDir))) {
        const failed = await materialize(reference, startedAt);
        if (failed) {
          return failed;
        }
      }
      logger.info("artifact_skipped", { paperId: reference.paperId, kind: "source", targetPath: reference.targetPath });
      return skippedOutcome(reference, validity.bytes, startedAt);
    }

    const title = reference.title ?? "";
    const stopResolve = metrics.startTimer("resolve_ms");
    metrics.incrementCounter("resolver_calls", 1);
    let arxivId: string | undefined;
    try {
      arxivId = await resolver.resolve(title);
    } finally {
      stopResolve();
    }

    if (!arxivId) {
      logger.info("source_no_match", { paperId: reference.paperId, title });
      return failedOutcome(reference, new ArtifactError(`No arXiv match for "${title}"`, "no_match"), startedAt);
    }

    await pacer.wait();
    const stopTimer = metrics.startTimer("download_ms");
    let outcome: FetchOutcome;
    try {
      outcome = await fetchArtifact({ ...reference, url: eprintUrl(config.arxivEprintUrl, arxivId) }, fetchOptions);
    } finally {
      stopTimer();
    }

    if (outcome.status !== "downloaded") {
      return outcome;
    }
    return (await materialize(outcome.reference, startedAt)) ?? outcome;
  };

  return runReferences(deps, "source", set, deps.concurrency ?? config.sourceConcurrency, task);
}
