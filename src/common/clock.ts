export interface Clock {
  now: () => number; // milliseconds epoch
  toISOString: (ts: number) => string;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  toISOString: (ts) => new Date(ts).toISOString(),
};

/**
 * Manually advanced clock for tests and replays.
 */
export class ManualClock implements Clock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  toISOString(ts: number): string {
    return new Date(ts).toISOString();
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
