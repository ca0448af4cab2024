/**
 * Source of "now" for anything that measures elapsed time.
 */
export interface Clock {
  now(): Date;
}

/** Wall-clock implementation used outside of tests. */
export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock that only moves when told to. Starts at `epochMs`.
 */
export class ManualClock implements Clock {
  private currentMs: number;

  constructor(epochMs: number = Date.UTC(2025, 0, 1)) {
    this.currentMs = epochMs;
  }

  now(): Date {
    return new Date(this.currentMs);
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }

  set(epochMs: number): void {
    this.currentMs = epochMs;
  }
}
