import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createRunId, fileDestination, LogDestination, Logger, MetricsRegistry } from "../src/observability";
import { makeTempDir } from "./helpers";

describe("Logger", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTempDir("harvester-log-");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("appends JSON lines to a file", () => {
    const logFile = path.join(tmpDir, "nested", "run.log");
    const logger = new Logger({ component: "pdfs", runId: "run_1", destinations: [fileDestination(logFile)] });

    logger.info("artifact_downloaded", { paperId: "A", bytes: 2048 });
    logger.error("artifact_fetch_failed", { paperId: "B" });

    const entries = fs
      .readFileSync(logFile, "utf-8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({ level: "info", msg: "artifact_downloaded", component: "pdfs", runId: "run_1", bytes: 2048 });
    expect(entries[1]).toMatchObject({ level: "error", paperId: "B" });
  });

  it("drops lines below the minimum level", () => {
    const levels: string[] = [];
    const destination: LogDestination = { write: (level) => levels.push(level) };
    const logger = new Logger({ component: "x", runId: "run_1", minLevel: "warn", destinations: [destination] });

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(levels).toEqual(["warn", "error"]);
  });

  it("keeps run id and destinations in child loggers", () => {
    const lines: string[] = [];
    const logger = new Logger({ component: "cli", runId: "run_2", destinations: [{ write: (_level, line) => lines.push(line) }] });

    logger.child("sources").info("source_no_match");

    expect(JSON.parse(lines[0])).toMatchObject({ component: "sources", runId: "run_2", msg: "source_no_match" });
  });

  it("logs a metrics summary", () => {
    const lines: string[] = [];
    const logger = new Logger({ component: "cli", runId: "run_3", destinations: [{ write: (_level, line) => lines.push(line) }] });
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("artifacts_downloaded", 2);

    metrics.logSummary(logger);

    const entry = JSON.parse(lines[0]);
    expect(entry.msg).toBe("metrics_summary");
    expect(entry.counters.artifacts_downloaded).toBe(2);
    expect(entry.timers.download_ms).toEqual({ count: 0, min: 0, max: 0, avg: 0 });
  });
});

describe("createRunId", () => {
  it("stamps the start time into the id", () => {
    expect(createRunId(new Date("2026-01-02T03:04:05.678Z"), () => 0)).toBe("run_2026-01-02T03-04-05-678Z_000000");
    expect(createRunId(new Date("2026-01-02T03:04:05.678Z"))).toMatch(/^run_2026-01-02T03-04-05-678Z_[a-z0-9]{6}$/);
  });
});
