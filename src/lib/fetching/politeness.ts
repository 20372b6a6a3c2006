/**
 * Politeness Gate
 * Global minimum spacing between request starts
 */

export type SleepFunction = (ms: number) => Promise<void>;
export type Clock = () => number;

export const sleep: SleepFunction = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class PolitenessGate {
  private chain: Promise<void> = Promise.resolve();
  private lastStart: number | null = null;
  private waits = 0;

  constructor(
    private delayMs: number,
    private readonly clock: Clock = Date.now,
    private readonly sleepFn: SleepFunction = sleep
  ) {}

  /**
   * Resolve when the caller may start its request. Callers are served in
   * arrival order; each start is at least `delayMs` after the previous one.
   */
  wait(): Promise<void> {
    const turn = this.chain.then(async () => {
      if (this.lastStart !== null) {
        const remaining = this.lastStart + this.delayMs - this.clock();
        if (remaining > 0) {
          this.waits++;
          await this.sleepFn(remaining);
        }
      }
      this.lastStart = this.clock();
    });
    this.chain = turn;
    return turn;
  }

  /**
   * Raise the delay (e.g. to a robots Crawl-delay); never lowers it
   */
  raiseDelay(delayMs: number): void {
    if (delayMs > this.delayMs) {
      this.delayMs = delayMs;
    }
  }

  getDelay(): number {
    return this.delayMs;
  }

  /**
   * Number of times a caller had to sleep
   */
  waitCount(): number {
    return this.waits;
  }
}
