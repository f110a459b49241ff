import { describe, it, expect } from 'vitest';
import { TrialEvaluator, withTimeout } from '../../src/evaluation/TrialEvaluator.js';
import { TimeoutError } from '@paramlab/utils';
import { metrics, stubEvaluator, trial } from '../fixtures.js';

describe('TrialEvaluator', () => {
  it('should return the parsed metrics on success', async () => {
    const evaluator = new TrialEvaluator(
      stubEvaluator(() => ({ ...metrics(1.5), profitFactor: 2 })),
      { timeoutMs: 0 }
    );

    expect(await evaluator.evaluate(trial(0))).toEqual({
      status: 'succeeded',
      metrics: { ...metrics(1.5), profitFactor: 2 },
    });
  });

  it('should pass the trial request through to the evaluator', async () => {
    const stub = stubEvaluator(() => metrics(1));
    await new TrialEvaluator(stub, { timeoutMs: 0 }).evaluate(trial(4, { p: 4 }));

    expect(stub.calls).toEqual([
      {
        strategyId: 'test-strategy',
        combination: { p: 4 },
        symbols: ['AAPL'],
        startDate: '2024-01-01',
        endDate: '2024-01-31',
        capital: 10_000,
      },
    ]);
  });

  it('should turn a synchronous throw into an evaluator_error outcome', async () => {
    const evaluator = new TrialEvaluator(
      {
        evaluate: () => {
          throw new Error('strategy crashed');
        },
      },
      { timeoutMs: 0 }
    );

    expect(await evaluator.evaluate(trial(0))).toEqual({
      status: 'failed',
      failure: { reason: 'evaluator_error', message: 'strategy crashed' },
    });
  });

  it('should turn a rejection into an evaluator_error outcome', async () => {
    const evaluator = new TrialEvaluator(
      { evaluate: () => Promise.reject(new Error('no data')) },
      { timeoutMs: 0 }
    );

    expect(await evaluator.evaluate(trial(0))).toEqual({
      status: 'failed',
      failure: { reason: 'evaluator_error', message: 'no data' },
    });
  });

  it('should time out slow evaluations', async () => {
    const evaluator = new TrialEvaluator({ evaluate: () => new Promise(() => undefined) }, { timeoutMs: 20 });

    expect(await evaluator.evaluate(trial(2))).toEqual({
      status: 'failed',
      failure: { reason: 'timeout', message: 'Trial 2 exceeded 20ms' },
    });
  });

  it('should reject malformed metrics', async () => {
    const evaluator = new TrialEvaluator(
      stubEvaluator(() => ({ ...metrics(1), sharpeRatio: 'high' })),
      { timeoutMs: 0 }
    );

    expect(await evaluator.evaluate(trial(0))).toEqual({
      status: 'failed',
      failure: { reason: 'invalid_metrics', message: 'sharpeRatio: Expected number, received string' },
    });
  });

  describe('withTimeout', () => {
    it('should resolve when the promise settles first', async () => {
      await expect(withTimeout(Promise.resolve('ok'), 50)).resolves.toBe('ok');
    });

    it('should reject with TimeoutError when the timer fires first', async () => {
      await expect(withTimeout(new Promise(() => undefined), 10, 'too slow')).rejects.toBeInstanceOf(
        TimeoutError
      );
    });
  });
});
