/**
 * Walk-Forward Window Types
 */

/**
 * Window configuration, in calendar days
 */
export interface WindowConfig {
  /** In-sample (optimization) window length */
  inSampleDays: number;

  /** Out-of-sample (validation) window length */
  outOfSampleDays: number;

  /**
   * Step size for sliding.
   * If undefined, step = outOfSampleDays (consecutive out-of-sample windows tile the range)
   */
  stepDays?: number;
}
