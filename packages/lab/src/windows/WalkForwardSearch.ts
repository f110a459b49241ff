/**
 * WalkForwardSearch
 *
 * Optimizes on each in-sample window, then replays the winner once on the
 * following out-of-sample window and measures how much it degrades.
 *
 * Rules:
 * - A period whose in-sample grid has no success is failed, not fatal
 * - A failed out-of-sample trial fails its period and keeps the failure
 * - Periods never started after cancellation are omitted
 */

import { isSucceeded } from '@paramlab/core';
import type {
  BestResult,
  DateRange,
  PeriodResult,
  Period,
  TrialResult,
  WalkForwardSummary,
} from '@paramlab/core';
import { InvalidArgumentError, logger } from '@paramlab/utils';
import { GridSearch } from '../optimization/GridSearch.js';
import type { ParameterSpace } from '../optimization/ParameterSpace.js';
import { mean, median } from '../optimization/statistics.js';
import { buildTrial } from '../optimization/types.js';
import type { SearchOptions, TrialContext } from '../optimization/types.js';
import type { TrialScheduler } from '../scheduler/TrialScheduler.js';
import { generatePeriods, validatePeriod } from './PeriodGenerator.js';
import type { WindowConfig } from './types.js';

export const DEFAULT_DEGRADATION_EPSILON = 0.01;

export interface WalkForwardOptions extends SearchOptions {
  window: WindowConfig;
  /** Floor on |in-sample Sharpe| in the degradation denominator */
  degradationEpsilon?: number;
}

export interface WalkForwardResult {
  periods: PeriodResult[];
  summary: WalkForwardSummary;
  /** Out-of-sample winner; null when no period had a positive out-of-sample Sharpe */
  best: BestResult | null;
  robust: boolean;
  cancelled: boolean;
  /** In-sample and out-of-sample trials of every recorded period */
  trials: TrialResult[];
}

/**
 * (sIn - sOut) / max(|sIn|, epsilon)
 */
export function computeDegradation(
  inSampleSharpe: number,
  outOfSampleSharpe: number,
  epsilon: number = DEFAULT_DEGRADATION_EPSILON
): number {
  return (inSampleSharpe - outOfSampleSharpe) / Math.max(Math.abs(inSampleSharpe), epsilon);
}

interface ScoredPeriod {
  result: PeriodResult;
  best: BestResult;
  inSampleSharpe: number;
  outOfSampleSharpe: number;
  degradation: number;
}

function scoredPeriods(periods: readonly PeriodResult[]): ScoredPeriod[] {
  const scored: ScoredPeriod[] = [];
  for (const result of periods) {
    const oos = result.outOfSample;
    if (
      result.status !== 'succeeded' ||
      result.best === undefined ||
      result.degradation === undefined ||
      oos === undefined ||
      !isSucceeded(oos)
    ) {
      continue;
    }
    scored.push({
      result,
      best: { combination: result.best.combination, metrics: oos.outcome.metrics },
      inSampleSharpe: result.best.metrics.sharpeRatio,
      outOfSampleSharpe: oos.outcome.metrics.sharpeRatio,
      degradation: result.degradation,
    });
  }
  return scored;
}

/**
 * Aggregate period outcomes; averages cover succeeded periods only
 */
export function summarizePeriods(periods: readonly PeriodResult[]): WalkForwardSummary {
  const scored = scoredPeriods(periods);
  const degradations = scored.map((p) => p.degradation);
  const outSharpes = scored.map((p) => p.outOfSampleSharpe);

  return {
    totalPeriods: periods.length,
    succeededPeriods: scored.length,
    failedPeriods: periods.length - scored.length,
    meanDegradation: mean(degradations),
    medianDegradation: median(degradations),
    meanInSampleSharpe: mean(scored.map((p) => p.inSampleSharpe)),
    meanOutOfSampleSharpe: mean(outSharpes),
    positiveOutOfSampleFraction:
      scored.length > 0 ? outSharpes.filter((s) => s > 0).length / scored.length : null,
  };
}

/**
 * Lowest degradation among periods with a positive out-of-sample Sharpe.
 * Ties: higher out-of-sample Sharpe, then earlier period.
 */
export function selectRobustBest(periods: readonly PeriodResult[]): BestResult | null {
  const candidates = scoredPeriods(periods)
    .filter((p) => p.outOfSampleSharpe > 0)
    .sort(
      (a, b) =>
        a.degradation - b.degradation ||
        b.outOfSampleSharpe - a.outOfSampleSharpe ||
        a.result.period.index - b.result.period.index
    );
  return candidates.length > 0 ? candidates[0].best : null;
}

export class WalkForwardSearch {
  private readonly grid: GridSearch;

  constructor(private readonly scheduler: TrialScheduler) {
    this.grid = new GridSearch(scheduler);
  }

  async search(
    space: ParameterSpace,
    context: TrialContext,
    range: DateRange,
    options: WalkForwardOptions
  ): Promise<WalkForwardResult> {
    const epsilon = options.degradationEpsilon ?? DEFAULT_DEGRADATION_EPSILON;
    if (!(epsilon > 0)) {
      throw new InvalidArgumentError(`degradationEpsilon must be positive, got ${epsilon}`, { epsilon });
    }

    const periods = generatePeriods(range, options.window);
    if (periods.length === 0) {
      throw new InvalidArgumentError(
        `Date range ${range.start}..${range.end} is too short for one walk-forward period`,
        { range, window: options.window }
      );
    }
    for (const period of periods) {
      const check = validatePeriod(period, range);
      if (!check.valid) {
        throw new InvalidArgumentError(`Invalid period ${period.index}: ${check.errors.join('; ')}`, {
          period,
        });
      }
    }

    const total = periods.length * (space.size() + 1);
    let completed = 0;
    const results: PeriodResult[] = [];
    let cancelled = false;

    logger.info('Starting walk-forward search', {
      strategyId: context.strategyId,
      totalPeriods: periods.length,
      gridSize: space.size(),
      range,
    });

    for (const period of periods) {
      if (options.cancelToken?.isCancelled) {
        cancelled = true;
        break;
      }

      const base = completed;
      const result = await this.runPeriod(space, context, period, options, epsilon, (done) => {
        completed = base + done;
        options.onProgress?.(completed, total);
      });
      completed = base + result.inSampleTrials.length + (result.outOfSample ? 1 : 0);
      results.push(result);

      if (result.failure?.reason === 'cancelled') {
        cancelled = true;
        break;
      }
    }

    const summary = summarizePeriods(results);
    const best = selectRobustBest(results);

    logger.info('Walk-forward search completed', {
      ...summary,
      robust: best !== null,
      cancelled,
    });

    return {
      periods: results,
      summary,
      best,
      robust: best !== null,
      cancelled,
      trials: results.flatMap((r) => (r.outOfSample ? [...r.inSampleTrials, r.outOfSample] : r.inSampleTrials)),
    };
  }

  private async runPeriod(
    space: ParameterSpace,
    context: TrialContext,
    period: Period,
    options: WalkForwardOptions,
    epsilon: number,
    onProgress: (done: number) => void
  ): Promise<PeriodResult> {
    const inSample = await this.grid.evaluate(space, context, period.inSample, {
      concurrency: options.concurrency,
      ranking: options.ranking,
      cancelToken: options.cancelToken,
      onProgress: (done) => onProgress(done),
    });

    if (inSample.cancelled) {
      return {
        period,
        status: 'failed',
        inSampleTrials: inSample.trials,
        failure: { reason: 'cancelled', message: `Period ${period.index} was cancelled during in-sample search` },
      };
    }

    const winner = inSample.best;
    if (!winner) {
      logger.warn('Walk-forward period has no viable in-sample result', {
        periodIndex: period.index,
        attempted: inSample.trials.length,
      });
      return {
        period,
        status: 'failed',
        inSampleTrials: inSample.trials,
        failure: {
          reason: 'no_viable_in_sample',
          message: `No successful in-sample trial out of ${inSample.trials.length}`,
        },
      };
    }

    const best: BestResult = { combination: winner.trial.combination, metrics: winner.outcome.metrics };
    const { results } = await this.scheduler.run(
      [buildTrial(context, period.outOfSample, winner.trial.combination, inSample.trials.length)],
      { concurrency: 1 }
    );
    const outOfSample = results[0];
    onProgress(inSample.trials.length + 1);

    if (!isSucceeded(outOfSample)) {
      const trialFailure = outOfSample.outcome.status === 'failed' ? outOfSample.outcome.failure : undefined;
      logger.warn('Walk-forward out-of-sample trial failed', {
        periodIndex: period.index,
        reason: trialFailure?.reason,
      });
      return {
        period,
        status: 'failed',
        best,
        inSampleTrials: inSample.trials,
        outOfSample,
        failure: {
          reason: 'out_of_sample_failed',
          message: trialFailure?.message ?? 'Out-of-sample trial failed',
          trialFailure,
        },
      };
    }

    const degradation = computeDegradation(
      winner.outcome.metrics.sharpeRatio,
      outOfSample.outcome.metrics.sharpeRatio,
      epsilon
    );

    logger.debug('Walk-forward period completed', {
      periodIndex: period.index,
      inSampleSharpe: winner.outcome.metrics.sharpeRatio,
      outOfSampleSharpe: outOfSample.outcome.metrics.sharpeRatio,
      degradation,
    });

    return {
      period,
      status: 'succeeded',
      best,
      inSampleTrials: inSample.trials,
      outOfSample,
      degradation,
    };
  }
}
