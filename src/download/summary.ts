import { MetricCounterName, MetricsRegistry, ProgressReporter } from "../observability";
import { ArtifactReference, FetchOutcome, RunSummary } from "../types";

const COUNTER_BY_STATUS: Record<FetchOutcome["status"], MetricCounterName> = {
  downloaded: "artifacts_downloaded",
  skipped: "artifacts_skipped",
  failed: "artifacts_failed",
};

export interface AccumulatorHooks {
  progress?: ProgressReporter;
  metrics?: MetricsRegistry;
}

/**
 * Sole owner of a run's tally. Tasks hand it their outcome; it refuses
 * outcomes for unknown references and second outcomes for the same one.
 */
export class SummaryAccumulator {
  private readonly expected = new Map<string, ArtifactReference>();
  private readonly received = new Map<string, FetchOutcome>();
  private readonly counts = { downloaded: 0, skipped: 0, failed: 0 };

  constructor(
    references: ArtifactReference[],
    private readonly hooks: AccumulatorHooks = {},
  ) {
    for (const reference of references) {
      if (this.expected.has(reference.key)) {
        throw new Error(`Duplicate reference key: ${reference.key}`);
      }
      this.expected.set(reference.key, reference);
    }
  }

  record(outcome: FetchOutcome): void {
    const key = outcome.reference.key;
    if (!this.expected.has(key)) {
      throw new Error(`Outcome for unknown reference: ${key}`);
    }
    if (this.received.has(key)) {
      throw new Error(`Second outcome for reference: ${key}`);
    }

    this.received.set(key, outcome);
    this.counts[outcome.status] += 1;
    this.hooks.metrics?.incrementCounter(COUNTER_BY_STATUS[outcome.status], 1);
    this.hooks.progress?.tick();
  }

  outcomeFor(key: string): FetchOutcome | undefined {
    return this.received.get(key);
  }

  pending(): ArtifactReference[] {
    return [...this.expected.values()].filter((reference) => !this.received.has(reference.key));
  }

  summary(): RunSummary {
    return { ...this.counts, total: this.expected.size };
  }
}

export function summarizeOutcomes(outcomes: FetchOutcome[]): RunSummary {
  const summary: RunSummary = { downloaded: 0, skipped: 0, failed: 0, total: outcomes.length };
  for (const outcome of outcomes) {
    summary[outcome.status] += 1;
  }
  return summary;
}

export function formatRunSummary(label: string, summary: RunSummary): string {
  return [
    `${label} summary`,
    `  Downloaded: ${summary.downloaded}`,
    `  Skipped (already valid): ${summary.skipped}`,
    `  Failed: ${summary.failed}`,
    `  Total: ${summary.total}`,
  ].join("\n");
}
