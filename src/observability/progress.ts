export interface ProgressStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface ProgressReporterOptions {
  label: string;
  total: number;
  stream?: ProgressStream;
}

const BAR_WIDTH = 30;

export function renderProgressLine(label: string, completed: number, total: number): string {
  const ratio = total === 0 ? 1 : Math.min(completed / total, 1);
  const filled = Math.round(ratio * BAR_WIDTH);
  const bar = `${"#".repeat(filled)}${"-".repeat(BAR_WIDTH - filled)}`;
  return `${label}: [${bar}] ${completed}/${total} (${Math.round(ratio * 100)}%)`;
}

/**
 * Live completed-count display. Redraws in place on a TTY; elsewhere it only
 * writes the final line so piped output stays readable.
 */
export class ProgressReporter {
  private completed = 0;
  private closed = false;
  private readonly stream: ProgressStream;

  constructor(private readonly options: ProgressReporterOptions) {
    this.stream = options.stream ?? process.stderr;
  }

  get count(): number {
    return this.completed;
  }

  tick(): void {
    this.completed += 1;
    if (this.stream.isTTY) {
      this.stream.write(`\r${renderProgressLine(this.options.label, this.completed, this.options.total)}`);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const line = renderProgressLine(this.options.label, this.completed, this.options.total);
    this.stream.write(this.stream.isTTY ? `\r${line}\n` : `${line}\n`);
  }
}
