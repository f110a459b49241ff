/**
 * GridSearch
 *
 * Exhaustive grid search over parameter space.
 * Generates all combinations and evaluates each through the scheduler.
 */

import type { DateRange, SucceededTrialResult, Trial, TrialResult } from '@paramlab/core';
import { NoViableResultError, logger } from '@paramlab/utils';
import type { ParameterSpace } from './ParameterSpace.js';
import { DEFAULT_RANKING, selectBest } from './ranking.js';
import type { TrialScheduler } from '../scheduler/TrialScheduler.js';
import { buildTrial } from './types.js';
import type { SearchOptions, TrialContext } from './types.js';

/**
 * GridSearch outcome
 */
export interface GridSearchResult {
  best: SucceededTrialResult;
  /** Every trial outcome, in enumeration order */
  trials: TrialResult[];
  cancelled: boolean;
}

/**
 * Raw evaluation of a grid, best absent when nothing succeeded
 */
export interface GridEvaluation {
  best?: SucceededTrialResult;
  trials: TrialResult[];
  cancelled: boolean;
}

/**
 * GridSearch optimizer
 */
export class GridSearch {
  constructor(private readonly scheduler: TrialScheduler) {}

  /**
   * Run grid search over one date range
   *
   * @throws NoViableResultError when no trial succeeded (cancelled or not)
   */
  async search(
    space: ParameterSpace,
    context: TrialContext,
    range: DateRange,
    options: SearchOptions = {}
  ): Promise<GridSearchResult> {
    const { best, trials, cancelled } = await this.evaluate(space, context, range, options);

    if (!best) {
      logger.warn('Grid search produced no viable result', {
        strategyId: context.strategyId,
        attempted: trials.length,
        cancelled,
      });
      throw new NoViableResultError('grid', trials.length, { cancelled, range });
    }

    return { best, trials, cancelled };
  }

  /**
   * Evaluate every combination and rank, without failing on zero successes
   */
  async evaluate(
    space: ParameterSpace,
    context: TrialContext,
    range: DateRange,
    options: SearchOptions = {}
  ): Promise<GridEvaluation> {
    const total = space.size();
    const ranking = options.ranking ?? DEFAULT_RANKING;

    logger.info('Starting grid search', {
      strategyId: context.strategyId,
      totalConfigs: total,
      range,
    });

    function* trials(): Generator<Trial> {
      let index = 0;
      for (const combination of space.enumerate()) {
        yield buildTrial(context, range, combination, index++);
      }
    }

    const { results, cancelled } = await this.scheduler.run(trials(), {
      concurrency: options.concurrency,
      total,
      onProgress: options.onProgress,
      cancelToken: options.cancelToken,
    });

    const ordered = [...results].sort((a, b) => a.trial.index - b.trial.index);
    const best = selectBest(ordered, ranking);

    logger.info('Grid search completed', {
      totalConfigs: total,
      evaluated: ordered.length,
      failed: ordered.filter((r) => r.outcome.status === 'failed').length,
      bestScore: best?.outcome.metrics[ranking.metric],
      cancelled,
    });

    return { best, trials: ordered, cancelled };
  }
}
