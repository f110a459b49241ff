/**
 * Search Types
 *
 * Shared context for every search strategy. Strategies are single-threaded
 * producers and consumers around the scheduler; only their trials run
 * concurrently.
 */

import type { DateRange, ParameterCombination, Trial } from '@paramlab/core';
import type { RankingConfig } from './ranking.js';
import type { CancelToken } from '../scheduler/CancelToken.js';
import type { ProgressCallback } from '../scheduler/TrialScheduler.js';

/**
 * Identifying context shared by every trial of a run
 */
export interface TrialContext {
  strategyId: string;
  symbols: string[];
  capital: number;
}

export interface SearchOptions {
  concurrency?: number;
  ranking?: RankingConfig;
  onProgress?: ProgressCallback;
  cancelToken?: CancelToken;
}

export function buildTrial(
  context: TrialContext,
  range: DateRange,
  combination: ParameterCombination,
  index: number
): Trial {
  return {
    index,
    strategyId: context.strategyId,
    combination,
    symbols: [...context.symbols],
    startDate: range.start,
    endDate: range.end,
    capital: context.capital,
  };
}
