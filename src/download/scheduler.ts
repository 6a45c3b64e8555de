import pLimit from "p-limit";
import { Logger } from "../observability";
import { ArtifactReference, FetchOutcome } from "../types";
import { failedOutcome } from "./outcomes";

export type ReferenceTask = (reference: ArtifactReference) => Promise<FetchOutcome>;

export interface ScheduleOptions {
  concurrency: number;
  task: ReferenceTask;
  onOutcome?: (outcome: FetchOutcome) => void;
  logger?: Logger;
}

async function runGuarded(reference: ArtifactReference, task: ReferenceTask, logger?: Logger): Promise<FetchOutcome> {
  const startedAt = Date.now();
  try {
    return await task(reference);
  } catch (error) {
    const outcome = failedOutcome(reference, error, startedAt);
    logger?.error("artifact_task_failed", {
      paperId: reference.paperId,
      kind: reference.kind,
      url: reference.url,
      errorKind: outcome.errorKind,
      error: outcome.error,
    });
    return outcome;
  }
}

/**
 * Starts every reference at once behind a counting gate: a task holds one of
 * `concurrency` slots from before its first check until its outcome exists.
 * A throwing task still yields exactly one `failed` outcome.
 */
export async function runScheduled(references: ArtifactReference[], options: ScheduleOptions): Promise<FetchOutcome[]> {
  const limit = pLimit(Math.max(1, Math.floor(options.concurrency)));
  const outcomes: FetchOutcome[] = [];

  await Promise.all(
    references.map((reference) =>
      limit(() => runGuarded(reference, options.task, options.logger)).then((outcome) => {
        outcomes.push(outcome);
        options.onOutcome?.(outcome);
      }),
    ),
  );

  return outcomes;
}
