export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

interface MinIntervalGateOptions {
  intervalMs: number;
  now?: () => number;
  sleep?: SleepFn;
}

/**
 * Serializes callers so that consecutive `wait()` resolutions are at least
 * `intervalMs` apart, however many callers are waiting at once.
 */
export class MinIntervalGate {
  private readonly intervalMs: number;

  private readonly now: () => number;

  private readonly sleepFn: SleepFn;

  private nextAllowedAt = 0;

  private tail: Promise<void> = Promise.resolve();

  constructor(options: MinIntervalGateOptions) {
    this.intervalMs = Math.max(0, options.intervalMs);
    this.now = options.now ?? Date.now;
    this.sleepFn = options.sleep ?? sleep;
  }

  wait(): Promise<void> {
    const turn = this.tail.then(() => this.takeSlot());
    this.tail = turn;
    return turn;
  }

  private async takeSlot(): Promise<void> {
    const delay = this.nextAllowedAt - this.now();
    if (delay > 0) {
      await this.sleepFn(delay);
    }
    this.nextAllowedAt = this.now() + this.intervalMs;
  }
}
