// Fixed-interval request pacer - pauses after each call so that consecutive
// calls are at least intervalMs apart. The first call of a run goes out immediately.

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class RequestPacer {
  private readonly intervalMs: number;
  private readonly sleepFn: SleepFn;
  private pauses = 0;

  constructor(intervalMs: number, sleepFn: SleepFn = sleep) {
    this.intervalMs = Math.max(0, intervalMs);
    this.sleepFn = sleepFn;
  }

  get enabled(): boolean {
    return this.intervalMs > 0;
  }

  // Number of pauses taken so far
  get pauseCount(): number {
    return this.pauses;
  }

  async pace(): Promise<void> {
    if (!this.enabled) return;
    this.pauses++;
    await this.sleepFn(this.intervalMs);
  }
}
