import { AppConfig } from "../config";
import { crawlPaperPages, CrawlSummary } from "../crawl";
import { buildReferences, DownloadRun, formatRunSummary, isSatisfied, runPdfDownloads, runSourceDownloads } from "../download";
import { exportCorpus } from "../export/corpusExport";
import { Logger, MetricsRegistry, ProgressStream } from "../observability";
import { Sink } from "../sink";
import { listRecords } from "../store";
import { ArtifactKind, MetadataRecord } from "../types";
import { FetchFn } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  fetchFn?: FetchFn;
  progressStream?: ProgressStream;
  print?: (text: string) => void;
}

export interface DownloadCommandOptions {
  concurrency?: number;
  extract?: boolean;
}

export interface ArtifactStatus {
  references: number;
  satisfied: number;
}

export interface StatusReport {
  records: number;
  invalidRecords: number;
  pdf: ArtifactStatus;
  source: ArtifactStatus;
}

function printer(ctx: CommandContext): (text: string) => void {
  return ctx.print ?? ((text) => console.log(text));
}

export async function runCrawl(
  ctx: CommandContext,
  options: { dryRun: boolean; force: boolean; maxDocs?: number },
): Promise<CrawlSummary> {
  ctx.logger.info("crawl_start", { pageUrl: ctx.config.baseUrl, mode: options.dryRun ? "dry-run" : "normal", ...options });
  const summary = await crawlPaperPages(
    {
      config: ctx.config,
      logger: ctx.logger,
      metrics: ctx.metrics,
      sink: ctx.sink,
      fetchFn: ctx.fetchFn,
    },
    options,
  );
  printer(ctx)(
    `Crawl: discovered ${summary.discovered}, saved ${summary.saved}, already present ${summary.skippedExisting}, failed ${summary.failed}`,
  );
  return summary;
}

export async function runPdfs(ctx: CommandContext, options: DownloadCommandOptions = {}): Promise<DownloadRun> {
  const run = await runPdfDownloads({
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    sink: ctx.sink,
    fetchFn: ctx.fetchFn,
    progressStream: ctx.progressStream,
    concurrency: options.concurrency,
  });
  printer(ctx)(formatRunSummary("PDF download", run.summary));
  return run;
}

export async function runSources(ctx: CommandContext, options: DownloadCommandOptions = {}): Promise<DownloadRun> {
  const run = await runSourceDownloads({
    config: ctx.config,
    logger: ctx.logger,
    metrics: ctx.metrics,
    sink: ctx.sink,
    fetchFn: ctx.fetchFn,
    progressStream: ctx.progressStream,
    concurrency: options.concurrency,
    extract: options.extract,
  });
  printer(ctx)(formatRunSummary("arXiv source download", run.summary));
  return run;
}

export async function runPipeline(
  ctx: CommandContext,
  options: DownloadCommandOptions & { force: boolean; maxDocs?: number },
): Promise<void> {
  ctx.logger.info("pipeline_start", { ...options });
  await runCrawl({ ...ctx, logger: ctx.logger.child("crawl") }, { dryRun: false, force: options.force, maxDocs: options.maxDocs });
  await runPdfs({ ...ctx, logger: ctx.logger.child("pdfs") }, options);
  await runSources({ ...ctx, logger: ctx.logger.child("sources") }, options);
  ctx.logger.info("pipeline_complete");
}

export async function runExport(ctx: CommandContext, outPath?: string): Promise<void> {
  const summary = await exportCorpus(ctx.config.outputDirs.records, outPath ?? ctx.config.exportPath, ctx.logger);
  printer(ctx)(`Exported ${summary.exported} records to ${summary.outPath} (${summary.invalid} invalid skipped)`);
}

async function artifactStatus(ctx: CommandContext, kind: ArtifactKind, records: MetadataRecord[]): Promise<ArtifactStatus> {
  const references = buildReferences(records, kind, ctx.config.outputDirs);
  let satisfied = 0;
  for (const reference of references) {
    if (await isSatisfied(reference.targetPath, ctx.config.minArtifactBytes)) {
      satisfied += 1;
    }
  }
  return { references: references.length, satisfied };
}

export async function runStatus(ctx: CommandContext): Promise<StatusReport> {
  ctx.logger.info("status_start");
  const listing = await listRecords(ctx.config.outputDirs.records);
  const report: StatusReport = {
    records: listing.records.length,
    invalidRecords: listing.invalid.length,
    pdf: await artifactStatus(ctx, "pdf", listing.records),
    source: await artifactStatus(ctx, "source", listing.records),
  };
  ctx.logger.info("status_complete", { ...report });
  printer(ctx)(
    [
      `Records: ${report.records} (${report.invalidRecords} invalid)`,
      `PDFs: ${report.pdf.satisfied}/${report.pdf.references} present`,
      `arXiv sources: ${report.source.satisfied}/${report.source.references} present`,
    ].join("\n"),
  );
  return report;
}
