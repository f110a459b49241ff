import { describe, it, expect, vi } from 'vitest';
import type { Trial } from '@paramlab/core';
import { InvalidArgumentError } from '@paramlab/utils';
import { CancelToken } from '../../src/scheduler/CancelToken.js';
import { delay, metrics, numberParam, schedulerFor, stubEvaluator, trial } from '../fixtures.js';

function trials(count: number): Trial[] {
  return Array.from({ length: count }, (_, i) => trial(i));
}

describe('TrialScheduler', () => {
  it('should isolate failing trials from their siblings', async () => {
    const scheduler = schedulerFor(
      stubEvaluator((request) => {
        if (numberParam(request.combination, 'p') % 2 === 1) {
          throw new Error('odd');
        }
        return metrics(1);
      })
    );

    const { results, cancelled } = await scheduler.run(trials(10), { concurrency: 3 });

    expect(cancelled).toBe(false);
    expect(results).toHaveLength(10);
    expect(results.filter((r) => r.outcome.status === 'failed')).toHaveLength(5);
  });

  it('should evaluate every trial exactly once', async () => {
    const stub = stubEvaluator(async () => {
      await delay(1);
      return metrics(1);
    });

    const { results } = await schedulerFor(stub).run(trials(12), { concurrency: 4 });

    expect(results.map((r) => r.trial.index).sort((a, b) => a - b)).toEqual(
      Array.from({ length: 12 }, (_, i) => i)
    );
    expect(stub.calls).toHaveLength(12);
  });

  it('should never exceed the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const scheduler = schedulerFor(
      stubEvaluator(async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await delay(10);
        inFlight--;
        return metrics(1);
      })
    );

    await scheduler.run(trials(9), { concurrency: 3 });

    expect(peak).toBe(3);
  });

  it('should report progress after every outcome', async () => {
    const onProgress = vi.fn();

    await schedulerFor(stubEvaluator(() => metrics(1))).run(trials(3), {
      concurrency: 1,
      total: 3,
      onProgress,
    });

    expect(onProgress.mock.calls).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
  });

  it('should report a null total when none is given', async () => {
    const onProgress = vi.fn();

    await schedulerFor(stubEvaluator(() => metrics(1))).run(trials(1), { concurrency: 1, onProgress });

    expect(onProgress).toHaveBeenCalledWith(1, null);
  });

  it('should stop starting trials once cancelled', async () => {
    const token = new CancelToken();
    const stub = stubEvaluator(() => metrics(1));

    const { results, cancelled } = await schedulerFor(stub).run(trials(10), {
      concurrency: 1,
      cancelToken: token,
      onResult: () => {
        if (stub.calls.length === 2) token.cancel('user');
      },
    });

    expect(cancelled).toBe(true);
    expect(results).toHaveLength(2);
    expect(stub.calls).toHaveLength(2);
    expect(token.reason).toBe('user');
  });

  it('should let in-flight trials finish after cancellation', async () => {
    const token = new CancelToken();
    const scheduler = schedulerFor(
      stubEvaluator(async (request) => {
        // Cancel while trial 0 is still running and trial 1 has just started
        if (request.combination.p === 1) token.cancel();
        await delay(request.combination.p === 0 ? 10 : 1);
        return metrics(1);
      })
    );

    const { results, cancelled } = await scheduler.run(trials(6), { concurrency: 2, cancelToken: token });

    expect(cancelled).toBe(true);
    expect(results.map((r) => r.trial.index).sort()).toEqual([0, 1]);
  });

  it('should pull lazily so results are seen before the next pull', async () => {
    const seen: number[] = [];
    let reported = 0;
    function* source(): Generator<Trial> {
      for (let i = 0; i < 3; i++) {
        seen.push(reported);
        yield trial(i);
      }
    }

    await schedulerFor(stubEvaluator(() => metrics(1))).run(source(), {
      concurrency: 1,
      onResult: () => {
        reported++;
      },
    });

    expect(seen).toEqual([0, 1, 2]);
  });

  it('should accept async sources', async () => {
    async function* source(): AsyncGenerator<Trial> {
      yield trial(0);
      await delay(1);
      yield trial(1);
    }

    const { results } = await schedulerFor(stubEvaluator(() => metrics(1))).run(source(), { concurrency: 2 });

    expect(results).toHaveLength(2);
  });

  it('should reject invalid concurrency', async () => {
    const scheduler = schedulerFor(stubEvaluator(() => metrics(1)));

    await expect(scheduler.run(trials(1), { concurrency: 0 })).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(scheduler.run(trials(1), { concurrency: 1.5 })).rejects.toThrow(
      'concurrency must be an integer >= 1, got 1.5'
    );
  });

  it('should propagate an onResult failure after workers stop', async () => {
    const scheduler = schedulerFor(stubEvaluator(() => metrics(1)));

    await expect(
      scheduler.run(trials(5), {
        concurrency: 2,
        onResult: () => {
          throw new Error('sink failed');
        },
      })
    ).rejects.toThrow('sink failed');
  });

  it('should propagate a failing source', async () => {
    function* source(): Generator<Trial> {
      yield trial(0);
      throw new Error('source broke');
    }

    await expect(
      schedulerFor(stubEvaluator(() => metrics(1))).run(source(), { concurrency: 1 })
    ).rejects.toThrow('source broke');
  });
});
