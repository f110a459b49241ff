/**
 * Optimizer
 *
 * Composition root for one optimization run:
 *   config → ParameterSpace → search strategy → RunRecord → ResultsStore
 *
 * NoViableResultError propagates and nothing is persisted. A cancelled run
 * with at least one success is saved with cancelled = true.
 */

import { createSystemClock } from '@paramlab/core';
import type {
  AdaptiveRunRecord,
  ClockPort,
  DateRange,
  EvaluatorPort,
  GridRunRecord,
  ResultsStorePort,
  RunRecord,
  SearchBackend,
  SearchKind,
  SucceededTrialResult,
  WalkForwardRunRecord,
} from '@paramlab/core';
import { ValidationError, getOptimizerDefaults, handleError, logger } from '@paramlab/utils';
import { parseOptimizationConfig } from './config/schema.js';
import type { OptimizationConfig } from './config/schema.js';
import { TrialEvaluator } from './evaluation/TrialEvaluator.js';
import { AdaptiveSearch } from './optimization/AdaptiveSearch.js';
import { GridSearch } from './optimization/GridSearch.js';
import { ParameterSpace } from './optimization/ParameterSpace.js';
import { RandomSampler } from './optimization/RandomSampler.js';
import { computeRunStatistics } from './optimization/statistics.js';
import type { SearchOptions, TrialContext } from './optimization/types.js';
import type { CancelToken } from './scheduler/CancelToken.js';
import { TrialScheduler } from './scheduler/TrialScheduler.js';
import type { ProgressCallback } from './scheduler/TrialScheduler.js';
import { WalkForwardSearch } from './windows/WalkForwardSearch.js';

export type BackendFactory = (space: ParameterSpace, config: OptimizationConfig) => SearchBackend;

export interface OptimizerDeps {
  evaluator: EvaluatorPort;
  store: ResultsStorePort;
  clock?: ClockPort;
  /** Backend for adaptive runs when none is passed to run(); RandomSampler by default */
  backendFactory?: BackendFactory;
}

export interface OptimizerRunOptions {
  onProgress?: ProgressCallback;
  cancelToken?: CancelToken;
  backend?: SearchBackend;
}

type RecordBase = Omit<GridRunRecord, 'searchKind' | 'best' | 'trials' | 'statistics'>;

function toBest(result: SucceededTrialResult): GridRunRecord['best'] {
  return { combination: result.trial.combination, metrics: result.outcome.metrics };
}

export const defaultBackendFactory: BackendFactory = (space, config) =>
  new RandomSampler(space, config.adaptive?.seed ?? 42);

export class Optimizer {
  private readonly clock: ClockPort;
  private readonly backendFactory: BackendFactory;

  constructor(private readonly deps: OptimizerDeps) {
    this.clock = deps.clock ?? createSystemClock();
    this.backendFactory = deps.backendFactory ?? defaultBackendFactory;
  }

  /**
   * Validate, search and persist. Resolves with the saved record.
   *
   * @throws ValidationError for a malformed config
   * @throws InvalidSpaceError before any trial runs
   * @throws NoViableResultError when no trial succeeded
   */
  async run(input: unknown, options: OptimizerRunOptions = {}): Promise<RunRecord> {
    const config = parseOptimizationConfig(input);
    try {
      return await this.execute(config, options);
    } catch (error) {
      handleError(error, { strategyId: config.strategyId, searchKind: config.searchKind });
      throw error;
    }
  }

  private async execute(config: OptimizationConfig, options: OptimizerRunOptions): Promise<RunRecord> {
    const defaults = getOptimizerDefaults();
    const space = new ParameterSpace(config.parameters, {
      maxCombinations: config.maxCombinations ?? defaults.maxCombinations,
    });

    const scheduler = new TrialScheduler(
      new TrialEvaluator(this.deps.evaluator, {
        timeoutMs: config.trialTimeoutMs ?? defaults.trialTimeoutMs,
      })
    );
    const context: TrialContext = {
      strategyId: config.strategyId,
      symbols: config.symbols,
      capital: config.capital,
    };
    const range: DateRange = { start: config.startDate, end: config.endDate };
    const searchOptions: SearchOptions = {
      concurrency: config.concurrency ?? defaults.concurrency,
      ranking: config.ranking,
      onProgress: options.onProgress,
      cancelToken: options.cancelToken,
    };

    const startedAt = this.clock.nowMs();
    const log = logger.child({ strategyId: config.strategyId, searchKind: config.searchKind });
    log.info('Optimization started', {
      totalConfigs: space.size(),
      concurrency: searchOptions.concurrency,
    });

    const base = async (kind: SearchKind, cancelled: boolean): Promise<RecordBase> => ({
      version: 1,
      runId: await this.deps.store.reserveRunId(config.strategyId, kind, startedAt),
      createdAtIso: new Date(startedAt).toISOString(),
      strategyId: config.strategyId,
      config: { ...config },
      symbols: [...config.symbols],
      startDate: config.startDate,
      endDate: config.endDate,
      cancelled,
    });

    let record: RunRecord;
    switch (config.searchKind) {
      case 'grid': {
        const result = await new GridSearch(scheduler).search(space, context, range, searchOptions);
        const grid: GridRunRecord = {
          ...(await base('grid', result.cancelled)),
          searchKind: 'grid',
          best: toBest(result.best),
          trials: result.trials,
          statistics: computeRunStatistics(result.trials),
        };
        record = grid;
        break;
      }

      case 'walk_forward': {
        const wf = config.walkForward;
        if (!wf) {
          throw new ValidationError('walk_forward search needs a walkForward block');
        }
        const result = await new WalkForwardSearch(scheduler).search(space, context, range, {
          ...searchOptions,
          window: {
            inSampleDays: wf.inSampleDays,
            outOfSampleDays: wf.outOfSampleDays,
            stepDays: wf.stepDays,
          },
          degradationEpsilon: wf.degradationEpsilon,
        });
        const walkForward: WalkForwardRunRecord = {
          ...(await base('walk_forward', result.cancelled)),
          searchKind: 'walk_forward',
          best: result.best,
          periods: result.periods,
          summary: result.summary,
          robust: result.robust,
          statistics: computeRunStatistics(result.trials),
        };
        record = walkForward;
        break;
      }

      case 'adaptive': {
        const adaptiveConfig = config.adaptive;
        if (!adaptiveConfig) {
          throw new ValidationError('adaptive search needs an adaptive block');
        }
        const backend = options.backend ?? this.backendFactory(space, config);
        const result = await new AdaptiveSearch(scheduler, this.clock).search(
          space,
          backend,
          context,
          range,
          adaptiveConfig,
          searchOptions
        );
        const adaptive: AdaptiveRunRecord = {
          ...(await base('adaptive', result.cancelled)),
          searchKind: 'adaptive',
          best: toBest(result.best),
          trials: result.trials,
          backend: result.backend,
          stopReason: result.stopReason,
          statistics: computeRunStatistics(result.trials),
        };
        record = adaptive;
        break;
      }
    }

    await this.deps.store.save(record);

    log.info('Optimization completed', {
      runId: record.runId,
      cancelled: record.cancelled,
      bestSharpe: record.best?.metrics.sharpeRatio ?? null,
      trials: record.statistics.totalTrials,
      durationMs: this.clock.nowMs() - startedAt,
    });

    return record;
  }
}
