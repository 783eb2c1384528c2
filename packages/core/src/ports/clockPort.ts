export interface ClockPort {
  nowMs(): number;
}

/**
 * Create a system clock adapter that uses Date.now()
 *
 * Only composition roots (CLI, job wiring) should use this.
 * Evaluation code takes an injected clock so cycles stay reproducible.
 */
export function createSystemClock(): ClockPort {
  return { nowMs: () => Date.now() };
}

/**
 * Fixed clock for tests and replays
 */
export function createFixedClock(nowMs: number): ClockPort {
  return { nowMs: () => nowMs };
}
