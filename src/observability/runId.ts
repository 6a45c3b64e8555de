/** Sortable id stamped on every log line and manifest entry of one CLI invocation. */
export function createRunId(now = new Date(), random: () => number = Math.random): string {
  const stamp = now.toISOString().replace(/[:.]/g, "-");
  const suffix = Math.floor(random() * 36 ** 6)
    .toString(36)
    .padStart(6, "0");
  return `run_${stamp}_${suffix}`;
}
