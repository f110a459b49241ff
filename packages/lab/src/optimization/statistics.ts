import { isSucceeded } from '@paramlab/core';
import type { RunStatistics, TrialResult } from '@paramlab/core';

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * Sample standard deviation (n - 1); null below two values
 */
export function sampleStd(values: readonly number[]): number | null {
  const avg = mean(values);
  if (avg === null || values.length < 2) return null;
  const variance = values.reduce((sum, v) => sum + Math.pow(v - avg, 2), 0) / (values.length - 1);
  return Math.sqrt(variance);
}

export function computeRunStatistics(results: readonly TrialResult[]): RunStatistics {
  const succeeded = results.filter(isSucceeded);
  const sharpes = succeeded.map((r) => r.outcome.metrics.sharpeRatio);
  const returns = succeeded.map((r) => r.outcome.metrics.totalReturn);

  return {
    totalTrials: results.length,
    succeededTrials: succeeded.length,
    failedTrials: results.length - succeeded.length,
    meanSharpe: mean(sharpes),
    stdSharpe: sampleStd(sharpes),
    minSharpe: sharpes.length > 0 ? Math.min(...sharpes) : null,
    maxSharpe: sharpes.length > 0 ? Math.max(...sharpes) : null,
    meanReturn: mean(returns),
  };
}
