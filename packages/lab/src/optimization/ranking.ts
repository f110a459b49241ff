/**
 * Ranking
 *
 * Total order over successful trial results. Primary metric first, then
 * higher total return, then lower absolute drawdown, then earlier trial.
 */

import { isSucceeded } from '@paramlab/core';
import type { RankableMetric, SucceededTrialResult, TrialResult } from '@paramlab/core';

export interface RankingConfig {
  metric: RankableMetric;
  direction: 'asc' | 'desc';
}

export const DEFAULT_RANKING: RankingConfig = { metric: 'sharpeRatio', direction: 'desc' };

/**
 * Negative when a ranks before b
 */
export function compareResults(
  a: SucceededTrialResult,
  b: SucceededTrialResult,
  ranking: RankingConfig = DEFAULT_RANKING
): number {
  const ma = a.outcome.metrics;
  const mb = b.outcome.metrics;

  const primary = ma[ranking.metric] - mb[ranking.metric];
  if (primary !== 0) {
    return ranking.direction === 'desc' ? -primary : primary;
  }
  if (ma.totalReturn !== mb.totalReturn) {
    return mb.totalReturn - ma.totalReturn;
  }
  const drawdown = Math.abs(ma.maxDrawdown) - Math.abs(mb.maxDrawdown);
  if (drawdown !== 0) {
    return drawdown;
  }
  return a.trial.index - b.trial.index;
}

/**
 * Successful results, best first
 */
export function rankResults(
  results: readonly TrialResult[],
  ranking: RankingConfig = DEFAULT_RANKING
): SucceededTrialResult[] {
  return results.filter(isSucceeded).sort((a, b) => compareResults(a, b, ranking));
}

export function selectBest(
  results: readonly TrialResult[],
  ranking: RankingConfig = DEFAULT_RANKING
): SucceededTrialResult | undefined {
  let best: SucceededTrialResult | undefined;
  for (const result of results) {
    if (isSucceeded(result) && (best === undefined || compareResults(result, best, ranking) < 0)) {
      best = result;
    }
  }
  return best;
}

/**
 * Scalar score for suggestion backends; higher is better
 */
export function scoreOf(result: SucceededTrialResult, ranking: RankingConfig = DEFAULT_RANKING): number {
  const value = result.outcome.metrics[ranking.metric];
  return ranking.direction === 'desc' ? value : -value;
}
