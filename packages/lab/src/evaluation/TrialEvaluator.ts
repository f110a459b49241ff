/**
 * TrialEvaluator
 *
 * Wraps the external evaluator with a per-trial timeout and normalizes
 * every failure into a TrialOutcome. evaluate() never rejects.
 */

import { MetricsRecordSchema } from '@paramlab/core';
import type { EvaluatorPort, Trial, TrialOutcome } from '@paramlab/core';
import { TimeoutError, errorMessage, logger } from '@paramlab/utils';

export interface TrialEvaluatorOptions {
  /** Per-trial timeout; 0 disables it */
  timeoutMs: number;
}

/**
 * Execute a promise with a timeout. The timer is cleared once settled.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  timeoutMessage: string = 'Operation timed out'
): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(timeoutMessage, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

export class TrialEvaluator {
  constructor(
    private readonly evaluator: EvaluatorPort,
    private readonly options: TrialEvaluatorOptions
  ) {}

  async evaluate(trial: Trial): Promise<TrialOutcome> {
    let raw: unknown;
    try {
      // Invoke inside the try so a synchronous throw is caught too
      raw = await withTimeout(
        Promise.resolve().then(() =>
          this.evaluator.evaluate({
            strategyId: trial.strategyId,
            combination: trial.combination,
            symbols: trial.symbols,
            startDate: trial.startDate,
            endDate: trial.endDate,
            capital: trial.capital,
          })
        ),
        this.options.timeoutMs,
        `Trial ${trial.index} exceeded ${this.options.timeoutMs}ms`
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        logger.warn('Trial timed out', { trialIndex: trial.index, timeoutMs: this.options.timeoutMs });
        return { status: 'failed', failure: { reason: 'timeout', message: error.message } };
      }
      logger.warn('Evaluator failed', {
        trialIndex: trial.index,
        combination: trial.combination,
        error: errorMessage(error),
      });
      return { status: 'failed', failure: { reason: 'evaluator_error', message: errorMessage(error) } };
    }

    const parsed = MetricsRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      logger.warn('Evaluator returned invalid metrics', { trialIndex: trial.index, issues: msg });
      return { status: 'failed', failure: { reason: 'invalid_metrics', message: msg } };
    }

    return { status: 'succeeded', metrics: parsed.data };
  }
}
