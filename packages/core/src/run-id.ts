/**
 * Run ID Generator
 *
 * Format: `{strategyId}_{searchKind}_{yyyyMMdd'T'HHmmss'Z'}` with `_{n}`
 * appended for n > 0. Pure: same inputs, same id.
 */

import { DateTime } from 'luxon';
import type { SearchKind } from './types/run.js';

export function sanitizeStrategyId(strategyId: string): string {
  return strategyId.replace(/[^A-Za-z0-9-]/g, '-');
}

export function generateRunId(
  strategyId: string,
  searchKind: SearchKind,
  timestampMs: number,
  disambiguator: number = 0
): string {
  if (!Number.isInteger(disambiguator) || disambiguator < 0) {
    throw new RangeError(`disambiguator must be a non-negative integer, got ${disambiguator}`);
  }
  const stamp = DateTime.fromMillis(timestampMs, { zone: 'utc' }).toFormat("yyyyMMdd'T'HHmmss'Z'");
  const base = `${sanitizeStrategyId(strategyId)}_${searchKind}_${stamp}`;
  return disambiguator === 0 ? base : `${base}_${disambiguator}`;
}
