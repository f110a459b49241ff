/**
 * Time source for run ids, record timestamps and adaptive time budgets
 */
export interface ClockPort {
  nowMs(): number;
}

/**
 * Wall clock backed by Date.now(). Searches receive a ClockPort so tests
 * can drive time explicitly.
 */
export function createSystemClock(): ClockPort {
  return { nowMs: () => Date.now() };
}
