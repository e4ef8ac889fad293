export interface PacerOptions {
  /** Minimum gap between the end of one fetch and the start of the next */
  intervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Enforces a minimum interval between upstream requests.
 *
 * Callers `mark()` after a successful fetch and `wait()` before the next one.
 * Nothing waits before the first request or after the last.
 */
export class Pacer {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastMark: number | null = null;

  constructor(options: PacerOptions) {
    this.intervalMs = Math.max(0, options.intervalMs);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  mark(): void {
    this.lastMark = this.now();
  }

  async wait(): Promise<number> {
    if (this.lastMark === null || this.intervalMs === 0) return 0;

    const remaining = this.lastMark + this.intervalMs - this.now();
    if (remaining <= 0) return 0;

    await this.sleep(remaining);
    return remaining;
  }
}
