/**
 * Time source for the kernel.
 *
 * All kernel timestamps and auction timing come from an injected clock so a
 * simulation can be replayed and tests can drive time by hand.
 */

export interface Clock {
  /** Milliseconds since the epoch. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** Clock that only moves when told to. */
export class ManualClock implements Clock {
  constructor(private current: number = 0) {}

  now(): number {
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}

export function isoAt(clock: Clock): string {
  return new Date(clock.now()).toISOString();
}
