/**
 * Time source for window and expiry checks. Instants are Unix seconds.
 */

export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: number) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(instant: number): void {
    this.current = instant;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}

export function toIsoTimestamp(instant: number): string {
  return new Date(instant * 1000).toISOString();
}
