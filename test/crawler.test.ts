import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AppConfig } from "../src/config";
import { FetchFn } from "../src/core/fetch";
import { sleep } from "../src/core/pacing";
import { crawlPaperPages } from "../src/crawl";
import { MetricsRegistry } from "../src/observability";
import { LocalJsonSink } from "../src/sink";
import { CannedRoute, makeTempDir, memoryLogger, routeFetch, testConfig, urlOf } from "./helpers";

const indexUrl = "https://papers.test/miccai-2025/";
const firstPage = "https://papers.test/miccai-2025/0042-Paper1234.html";
const secondPage = "https://papers.test/miccai-2025/0043-Paper2000.html";

function fixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, "fixtures", name), "utf-8");
}

describe("crawlPaperPages", () => {
  let tmpDir: string;
  let config: AppConfig;
  let routes: Record<string, CannedRoute>;

  beforeEach(() => {
    tmpDir = makeTempDir("harvester-crawl-");
    config = testConfig(tmpDir);
    routes = {
      [indexUrl]: { status: 200, body: fixture("index-page.html") },
      [firstPage]: { status: 200, body: fixture("paper-page.html") },
      [secondPage]: { status: 500, body: "server error" },
    };
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function crawlDeps() {
    const { fetchFn, calls } = routeFetch(routes);
    const { logger, lines } = memoryLogger("crawl");
    const metrics = new MetricsRegistry();
    return {
      deps: { config, logger, metrics, sink: new LocalJsonSink(config, "run_test"), fetchFn, delayFn: async () => undefined },
      calls,
      lines,
    };
  }

  it("saves one record per page and counts failing pages", async () => {
    const { deps, lines } = crawlDeps();

    const summary = await crawlPaperPages(deps, { dryRun: false, force: false });

    expect(summary).toEqual({ discovered: 2, saved: 1, skippedExisting: 0, failed: 1 });
    const saved = JSON.parse(fs.readFileSync(path.join(config.outputDirs.records, "0042-Paper1234.json"), "utf-8"));
    expect(saved).toMatchObject({
      Title: "Shape-Aware Segmentation of Tiny Structures",
      PDF: "https://papers.test/paper/0042_paper.pdf",
      Topics: ["Segmentation", "Ultrasound"],
    });
    expect(fs.existsSync(path.join(config.outputDirs.records, "0043-Paper2000.json"))).toBe(false);
    expect(lines.find((line) => line.msg === "crawl_page_failed")).toMatchObject({
      paperId: "0043-Paper2000",
      error: `HTTP 500 while fetching ${secondPage}`,
    });
    expect(deps.metrics.getCounters()).toMatchObject({ pages_crawled: 2, records_saved: 1 });
  });

  it("does not fetch pages whose record already exists", async () => {
    await crawlPaperPages(crawlDeps().deps, { dryRun: false, force: false });

    const second = crawlDeps();
    const summary = await crawlPaperPages(second.deps, { dryRun: false, force: false });

    expect(summary).toEqual({ discovered: 2, saved: 0, skippedExisting: 1, failed: 1 });
    expect(second.calls).toEqual([indexUrl, secondPage]);
  });

  it("fetches existing pages again when forced", async () => {
    await crawlPaperPages(crawlDeps().deps, { dryRun: false, force: false });

    const summary = await crawlPaperPages(crawlDeps().deps, { dryRun: false, force: true });

    expect(summary.saved).toBe(1);
    expect(summary.skippedExisting).toBe(0);
  });

  it("writes nothing on a dry run", async () => {
    const { deps, lines } = crawlDeps();

    const summary = await crawlPaperPages(deps, { dryRun: true, force: false });

    expect(summary.saved).toBe(0);
    expect(fs.existsSync(config.outputDirs.records)).toBe(false);
    expect(lines.filter((line) => line.msg === "crawl_discovered_dry_run")).toHaveLength(1);
  });

  it("limits the number of pages", async () => {
    const { deps, calls } = crawlDeps();

    const summary = await crawlPaperPages(deps, { dryRun: false, force: false, maxDocs: 1 });

    expect(summary).toEqual({ discovered: 1, saved: 1, skippedExisting: 0, failed: 0 });
    expect(calls).toEqual([indexUrl, firstPage]);
  });

  it.each([1, 2])("fetches at most %i pages at once", async (crawlConcurrency) => {
    config = { ...config, crawlConcurrency };
    const { deps } = crawlDeps();
    const served = deps.fetchFn;
    let inFlight = 0;
    let maxInFlight = 0;
    const fetchFn: FetchFn = async (input, init) => {
      if (urlOf(input) === indexUrl) {
        return served(input, init);
      }
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await sleep(10);
      inFlight -= 1;
      return served(input, init);
    };

    const summary = await crawlPaperPages({ ...deps, fetchFn }, { dryRun: true, force: false });

    expect(summary.discovered).toBe(2);
    expect(maxInFlight).toBe(crawlConcurrency);
  });

  it("fails when the index cannot be fetched", async () => {
    routes[indexUrl] = { status: 503, body: "maintenance" };

    await expect(crawlPaperPages(crawlDeps().deps, { dryRun: false, force: false })).rejects.toThrow(
      `HTTP 503 while fetching ${indexUrl}`,
    );
  });
});
