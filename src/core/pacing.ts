export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Spaces successive callers at least `intervalMs` apart, in arrival order.
 * Shared by every task that talks to a rate-limited service.
 */
export class Pacer {
  private lastStartedAt: number | undefined;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly intervalMs: number,
    private readonly sleepFn: (ms: number) => Promise<void> = sleep,
    private readonly now: () => number = Date.now,
  ) {}

  wait(): Promise<void> {
    const turn = this.queue.then(() => this.takeTurn());
    this.queue = turn;
    return turn;
  }

  private async takeTurn(): Promise<void> {
    if (this.lastStartedAt !== undefined) {
      const remaining = this.lastStartedAt + this.intervalMs - this.now();
      if (remaining > 0) {
        await this.sleepFn(remaining);
      }
    }
    this.lastStartedAt = this.now();
  }
}
