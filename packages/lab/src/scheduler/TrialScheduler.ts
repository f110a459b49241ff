/**
 * TrialScheduler
 *
 * Runs a lazy stream of trials through the TrialEvaluator on a fixed pool of
 * workers. Workers share one iterator, so each trial is pulled and evaluated
 * exactly once. Outcomes are collected in completion order.
 *
 * Rules:
 * - Per-trial isolation: one failing trial never aborts its siblings
 * - Cancellation is checked before each pull; in-flight trials finish
 * - The source is pulled lazily, so adaptive samplers see earlier reports
 */

import { availableParallelism } from 'os';
import type { Trial, TrialResult } from '@paramlab/core';
import { InvalidArgumentError, logger } from '@paramlab/utils';
import type { TrialEvaluator } from '../evaluation/TrialEvaluator.js';
import type { CancelToken } from './CancelToken.js';

export type ProgressCallback = (completed: number, total: number | null) => void;

export interface SchedulerRunOptions {
  /** Worker count, defaults to available hardware parallelism */
  concurrency?: number;
  /** Progress denominator; null when unknown */
  total?: number | null;
  onProgress?: ProgressCallback;
  /** Called after every outcome, before progress is reported */
  onResult?: (result: TrialResult) => void | Promise<void>;
  cancelToken?: CancelToken;
}

export interface SchedulerRunResult {
  /** Completion order */
  results: TrialResult[];
  cancelled: boolean;
}

export type TrialSource = Iterable<Trial> | AsyncIterable<Trial>;

function isAsyncIterable(source: TrialSource): source is AsyncIterable<Trial> {
  return Symbol.asyncIterator in source;
}

function toAsyncIterator(source: TrialSource): AsyncIterator<Trial> {
  if (isAsyncIterable(source)) {
    return source[Symbol.asyncIterator]();
  }
  const iterator = source[Symbol.iterator]();
  return { next: async () => iterator.next() };
}

export function defaultConcurrency(): number {
  return Math.max(1, availableParallelism());
}

export class TrialScheduler {
  constructor(private readonly evaluator: TrialEvaluator) {}

  async run(trials: TrialSource, options: SchedulerRunOptions = {}): Promise<SchedulerRunResult> {
    const concurrency = options.concurrency ?? defaultConcurrency();
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new InvalidArgumentError(`concurrency must be an integer >= 1, got ${concurrency}`, {
        concurrency,
      });
    }

    const total = options.total ?? null;
    const cancelToken = options.cancelToken;
    const iterator = toAsyncIterator(trials);
    const results: TrialResult[] = [];

    const state: { exhausted: boolean; fatal?: { error: unknown } } = { exhausted: false };
    // Pulls are chained so a custom async source never sees overlapping next() calls
    let pullChain: Promise<void> = Promise.resolve();

    const stopped = (): boolean =>
      state.exhausted || state.fatal !== undefined || (cancelToken?.isCancelled ?? false);

    const takeNext = async (): Promise<Trial | undefined> => {
      if (stopped()) return undefined;
      try {
        const next = await iterator.next();
        if (next.done) {
          state.exhausted = true;
          return undefined;
        }
        return next.value;
      } catch (error) {
        state.fatal ??= { error };
        return undefined;
      }
    };

    const pull = (): Promise<Trial | undefined> => {
      const next = pullChain.then(takeNext);
      pullChain = next.then(() => undefined);
      return next;
    };

    const worker = async (workerId: number): Promise<void> => {
      while (true) {
        const trial = await pull();
        // A pull may resolve after cancellation; such a trial is never started
        if (trial === undefined || cancelToken?.isCancelled) {
          return;
        }

        const startedAt = performance.now();
        const outcome = await this.evaluator.evaluate(trial);
        const result: TrialResult = {
          trial,
          outcome,
          durationMs: Math.round(performance.now() - startedAt),
        };
        results.push(result);

        logger.debug('Trial completed', {
          workerId,
          trialIndex: trial.index,
          status: outcome.status,
          completed: results.length,
          total,
        });

        try {
          await options.onResult?.(result);
        } catch (error) {
          state.fatal ??= { error };
          return;
        }
        options.onProgress?.(results.length, total);
      }
    };

    logger.debug('Scheduler starting', { concurrency, total });
    await Promise.all(Array.from({ length: concurrency }, (_, i) => worker(i)));

    if (state.fatal !== undefined) {
      throw state.fatal.error;
    }

    const cancelled = cancelToken?.isCancelled ?? false;
    if (cancelled) {
      logger.info('Scheduler cancelled', {
        reason: cancelToken?.reason,
        completed: results.length,
        total,
      });
    }

    return { results, cancelled };
  }
}
