import pLimit from "p-limit";
import { AppConfig } from "../config";
import { errorMessage } from "../core/errors";
import { defaultFetch, FetchFn, getFetchDispatcher } from "../core/fetch";
import { sleep } from "../core/pacing";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { PaperLink } from "../types";
import { extractPaperLinks, parsePaperPage } from "./htmlParser";

interface CrawlDependencies {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  fetchFn?: FetchFn;
  delayFn?: (ms: number) => Promise<void>;
}

export interface CrawlOptions {
  dryRun: boolean;
  force: boolean;
  maxDocs?: number;
}

export interface CrawlSummary {
  discovered: number;
  saved: number;
  skippedExisting: number;
  failed: number;
}

export async function fetchHtml(url: string, config: AppConfig, fetchFn: FetchFn = defaultFetch): Promise<string> {
  const response = await fetchFn(url, {
    method: "GET",
    headers: {
      "user-agent": config.userAgent,
      accept: "text/html,application/xhtml+xml",
    },
    dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
    signal: AbortSignal.timeout(config.requestTimeoutMs),
  });

  if (!response.ok) {
    await response.body?.cancel();
    throw new Error(`HTTP ${response.status} while fetching ${url}`);
  }

  return await response.text();
}

/**
 * Fetches the conference index, then every paper page it links to, and
 * stores one JSON record per page. A failing index is fatal; a failing page
 * is logged and skipped.
 */
export async function crawlPaperPages(deps: CrawlDependencies, options: CrawlOptions): Promise<CrawlSummary> {
  const { config, logger, metrics, sink } = deps;
  const fetchFn = deps.fetchFn ?? defaultFetch;
  const delay = deps.delayFn ?? sleep;
  const summary: CrawlSummary = { discovered: 0, saved: 0, skippedExisting: 0, failed: 0 };

  logger.info("crawl_index_start", { pageUrl: config.baseUrl });
  const stopIndexTimer = metrics.startTimer("page_fetch_ms");
  const indexHtml = await fetchHtml(config.baseUrl, config, fetchFn);
  stopIndexTimer();
  metrics.incrementCounter("pages_crawled", 1);

  let links: PaperLink[] = extractPaperLinks(indexHtml, config.baseUrl);
  if (options.maxDocs !== undefined) {
    links = links.slice(0, Math.max(options.maxDocs, 0));
  }
  summary.discovered = links.length;
  logger.info("crawl_index_complete", { pageUrl: config.baseUrl, discovered: links.length });

  const limit = pLimit(Math.max(1, Math.floor(config.crawlConcurrency)));
  const crawlPage = async (link: PaperLink): Promise<void> => {
    if (!options.force && !options.dryRun && (await sink.hasRecord(link.paperId))) {
      summary.skippedExisting += 1;
      logger.debug("crawl_record_exists", { paperId: link.paperId, pageUrl: link.url });
      return;
    }

    const stopTimer = metrics.startTimer("page_fetch_ms");
    try {
      const html = await fetchHtml(link.url, config, fetchFn);
      metrics.incrementCounter("pages_crawled", 1);
      const document = parsePaperPage(html, link.url);

      if (options.dryRun) {
        logger.info("crawl_discovered_dry_run", { paperId: link.paperId, pageUrl: link.url, title: document.Title });
      } else {
        const filePath = await sink.publishRecord(link.paperId, document);
        metrics.incrementCounter("records_saved", 1);
        summary.saved += 1;
        logger.info("crawl_record_saved", { paperId: link.paperId, pageUrl: link.url, filePath });
      }
    } catch (error) {
      summary.failed += 1;
      logger.error("crawl_page_failed", { paperId: link.paperId, pageUrl: link.url, error: errorMessage(error) });
    } finally {
      const durationMs = stopTimer();
      logger.debug("crawl_page_complete", { paperId: link.paperId, durationMs });
    }

    await delay(config.crawlDelayMs);
  };

  await Promise.all(links.map((link) => limit(() => crawlPage(link))));

  logger.info("crawl_finished", { ...summary });
  return summary;
}
