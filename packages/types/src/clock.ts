/**
 * Clock
 *
 * Every component reads time through an injected Clock so that
 * time-driven transitions (deadman expiry, sunset, recovery) are
 * deterministic under test.
 *
 * Time is whole unix seconds.
 */

export interface Clock {
  /** Current time in unix seconds */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private _now: number;

  constructor(start = 0) {
    this._now = start;
  }

  now(): number {
    return this._now;
  }

  advance(seconds: number): void {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new RangeError(`Cannot advance clock by ${seconds}`);
    }
    this._now += seconds;
  }

  set(seconds: number): void {
    this._now = seconds;
  }
}

/**
 * Render unix seconds as an ISO 8601 timestamp.
 */
export function toIsoTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}
