/**
 * Time source. Every gate is evaluated against the clock reading taken
 * when the operation starts; nothing is scheduled.
 */

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Settable clock for tests and replays
 */
export class ManualClock implements Clock {
  constructor(private current: number = Date.now()) {}

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}
