/**
 * Clock port interface.
 * All time reads go through here so traces can be made deterministic.
 */
export interface ClockPort {
  /** Get current time in milliseconds. */
  nowMs(): number;
}

export const systemClock: ClockPort = {
  nowMs: () => Date.now(),
};

/** A clock that always reads the same instant. */
export function fixedClock(ms: number): ClockPort {
  return { nowMs: () => ms };
}
