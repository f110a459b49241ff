/**
 * AdaptiveSearch
 *
 * Suggest-evaluate-report loop around a SearchBackend. Suggestions are pulled
 * lazily by the scheduler, so a backend sees every score reported before a
 * worker asks for its next trial.
 *
 * Stops at the trial budget, the time budget or cancellation, whichever
 * comes first.
 */

import { z } from 'zod';
import { createSystemClock, isSucceeded } from '@paramlab/core';
import type {
  AdaptiveStopReason,
  ClockPort,
  DateRange,
  ParameterCombination,
  SearchBackend,
  SucceededTrialResult,
  Trial,
  TrialResult,
} from '@paramlab/core';
import { NoViableResultError, logger } from '@paramlab/utils';
import type { ParameterSpace } from './ParameterSpace.js';
import { DEFAULT_RANKING, scoreOf, selectBest } from './ranking.js';
import type { TrialScheduler } from '../scheduler/TrialScheduler.js';
import { buildTrial } from './types.js';
import type { SearchOptions, TrialContext } from './types.js';

/** Score reported to the backend for any failed trial */
export const FAILURE_SCORE = -1e9;

export const AdaptiveConfigSchema = z
  .object({
    maxTrials: z.number().int().positive().optional(),
    maxDurationMs: z.number().int().positive().optional(),
    seed: z.number().int().default(42),
  })
  .refine((c) => c.maxTrials !== undefined || c.maxDurationMs !== undefined, {
    message: 'adaptive search needs maxTrials or maxDurationMs',
  });

export type AdaptiveConfig = z.infer<typeof AdaptiveConfigSchema>;

export interface AdaptiveSearchResult {
  best: SucceededTrialResult;
  /** Every trial outcome, in submission order */
  trials: TrialResult[];
  backend: string;
  stopReason: AdaptiveStopReason;
  cancelled: boolean;
}

export class AdaptiveSearch {
  constructor(
    private readonly scheduler: TrialScheduler,
    private readonly clock: ClockPort = createSystemClock()
  ) {}

  async search(
    space: ParameterSpace,
    backend: SearchBackend,
    context: TrialContext,
    range: DateRange,
    config: AdaptiveConfig,
    options: SearchOptions = {}
  ): Promise<AdaptiveSearchResult> {
    const ranking = options.ranking ?? DEFAULT_RANKING;
    const cancelToken = options.cancelToken;
    const total = config.maxDurationMs === undefined ? (config.maxTrials ?? null) : null;
    const startedAt = this.clock.nowMs();
    const rejected: TrialResult[] = [];
    let completed = 0;
    let submitted = 0;
    let stopReason: AdaptiveStopReason = 'trial_budget';

    logger.info('Starting adaptive search', {
      strategyId: context.strategyId,
      backend: backend.name,
      maxTrials: config.maxTrials,
      maxDurationMs: config.maxDurationMs,
      spaceSize: space.size(),
    });

    const reportOutcome = async (result: TrialResult): Promise<void> => {
      const score = isSucceeded(result) ? scoreOf(result, ranking) : FAILURE_SCORE;
      await backend.report(result.trial.combination, score);
      completed++;
      options.onProgress?.(completed, total);
    };

    const budgetLeft = (): boolean => {
      if (cancelToken?.isCancelled) {
        stopReason = 'cancelled';
        return false;
      }
      if (config.maxTrials !== undefined && submitted >= config.maxTrials) {
        stopReason = 'trial_budget';
        return false;
      }
      if (config.maxDurationMs !== undefined && this.clock.nowMs() - startedAt >= config.maxDurationMs) {
        stopReason = 'time_budget';
        return false;
      }
      return true;
    };

    async function* suggestions(): AsyncGenerator<Trial> {
      while (budgetLeft()) {
        const combination: ParameterCombination = await backend.suggest();
        const trial = buildTrial(context, range, combination, submitted++);

        if (space.contains(combination)) {
          yield trial;
          continue;
        }

        // Never reaches the evaluator; recorded and scored as a failure
        const result: TrialResult = {
          trial,
          outcome: {
            status: 'failed',
            failure: {
              reason: 'invalid_combination',
              message: `Suggested combination is not in the parameter space: ${JSON.stringify(combination)}`,
            },
          },
          durationMs: 0,
        };
        logger.warn('Backend suggested an invalid combination', {
          backend: backend.name,
          trialIndex: trial.index,
          combination,
        });
        rejected.push(result);
        await reportOutcome(result);
      }
    }

    let results: TrialResult[];
    try {
      ({ results } = await this.scheduler.run(suggestions(), {
        concurrency: options.concurrency,
        total,
        onResult: reportOutcome,
        cancelToken,
      }));
    } catch (error) {
      logger.error('Adaptive search aborted', error, { backend: backend.name });
      throw error;
    }

    const cancelled = cancelToken?.isCancelled ?? false;
    if (cancelled) {
      stopReason = 'cancelled';
    }

    const trials = [...results, ...rejected].sort((a, b) => a.trial.index - b.trial.index);
    const best = selectBest(trials, ranking);

    if (!best) {
      logger.warn('Adaptive search produced no viable result', { attempted: trials.length, stopReason });
      throw new NoViableResultError('adaptive', trials.length, { cancelled, stopReason });
    }

    logger.info('Adaptive search completed', {
      evaluated: trials.length,
      failed: trials.filter((r) => r.outcome.status === 'failed').length,
      bestScore: best.outcome.metrics[ranking.metric],
      stopReason,
      durationMs: this.clock.nowMs() - startedAt,
    });

    return { best, trials, backend: backend.name, stopReason, cancelled };
  }
}
