import { describe, it, expect, vi } from 'vitest';
import { generateRunId, toIndexEntry } from '@paramlab/core';
import type {
  ClockPort,
  ComparisonTable,
  ParameterCombination,
  ResultsStorePort,
  RunIndexEntry,
  RunRecord,
  SearchBackend,
  SearchKind,
} from '@paramlab/core';
import { InvalidSpaceError, NoViableResultError, ValidationError } from '@paramlab/utils';
import { Optimizer } from '../../src/Optimizer.js';
import { CancelToken } from '../../src/scheduler/CancelToken.js';
import { metrics, numberParam, stubEvaluator } from '../fixtures.js';

class MemoryStore implements ResultsStorePort {
  readonly records = new Map<string, RunRecord>();
  private readonly reserved = new Set<string>();

  async reserveRunId(strategyId: string, searchKind: SearchKind, timestampMs: number): Promise<string> {
    let n = 0;
    let id = generateRunId(strategyId, searchKind, timestampMs);
    while (this.records.has(id) || this.reserved.has(id)) {
      id = generateRunId(strategyId, searchKind, timestampMs, ++n);
    }
    this.reserved.add(id);
    return id;
  }

  async save(record: RunRecord): Promise<string> {
    this.records.set(record.runId, record);
    return record.runId;
  }

  async list(): Promise<RunIndexEntry[]> {
    return [...this.records.values()].map(toIndexEntry);
  }

  async get(runId: string): Promise<RunRecord> {
    const record = this.records.get(runId);
    if (!record) throw new Error(`unknown run ${runId}`);
    return record;
  }

  async delete(runId: string): Promise<void> {
    this.records.delete(runId);
  }

  async compare(): Promise<ComparisonTable> {
    throw new Error('not used');
  }
}

const JAN_FIRST: ClockPort = { nowMs: () => Date.UTC(2024, 0, 1) };

const SCENARIO_A = {
  strategyId: 'scenario-a',
  symbols: ['AAPL'],
  startDate: '2024-01-01',
  endDate: '2024-01-31',
  capital: 10_000,
  concurrency: 2,
  trialTimeoutMs: 0,
  parameters: [
    { name: 'p', kind: 'discrete', values: [1, 2] },
    { name: 'q', kind: 'discrete', values: [10, 20] },
  ],
};

const productSharpe = () =>
  stubEvaluator((request) =>
    metrics((numberParam(request.combination, 'p') * numberParam(request.combination, 'q')) / 100)
  );

describe('Optimizer', () => {
  it('should run a grid search and persist the record', async () => {
    const store = new MemoryStore();
    const optimizer = new Optimizer({ evaluator: productSharpe(), store, clock: JAN_FIRST });

    const record = await optimizer.run(SCENARIO_A);

    expect(record.runId).toBe('scenario-a_grid_20240101T000000Z');
    expect(record.createdAtIso).toBe('2024-01-01T00:00:00.000Z');
    expect(record.searchKind).toBe('grid');
    expect(record.best?.combination).toEqual({ p: 2, q: 20 });
    expect(record.best?.metrics.sharpeRatio).toBe(0.4);
    expect(record.statistics.totalTrials).toBe(4);
    expect(record.statistics.succeededTrials).toBe(4);
    expect(record.cancelled).toBe(false);
    expect(record.config.strategyId).toBe('scenario-a');
    expect(store.records.get(record.runId)).toBe(record);
  });

  it('should give a second run at the same instant a distinct id', async () => {
    const store = new MemoryStore();
    const optimizer = new Optimizer({ evaluator: productSharpe(), store, clock: JAN_FIRST });

    await optimizer.run(SCENARIO_A);
    const second = await optimizer.run(SCENARIO_A);

    expect(second.runId).toBe('scenario-a_grid_20240101T000000Z_1');
    expect(store.records.size).toBe(2);
  });

  it('should not persist a run without a successful trial', async () => {
    const store = new MemoryStore();
    const evaluator = stubEvaluator(() => {
      throw new Error('no fills');
    });

    await expect(
      new Optimizer({ evaluator, store, clock: JAN_FIRST }).run(SCENARIO_A)
    ).rejects.toThrow(NoViableResultError);
    expect(evaluator.calls).toHaveLength(4);
    expect(store.records.size).toBe(0);
  });

  it('should reject a malformed config', async () => {
    const evaluator = productSharpe();

    await expect(
      new Optimizer({ evaluator, store: new MemoryStore() }).run({ ...SCENARIO_A, capital: -1 })
    ).rejects.toThrow(ValidationError);
    expect(evaluator.calls).toHaveLength(0);
  });

  it('should reject an invalid space before any trial runs', async () => {
    const evaluator = productSharpe();

    await expect(
      new Optimizer({ evaluator, store: new MemoryStore() }).run({
        ...SCENARIO_A,
        parameters: [{ name: 'p', kind: 'range', low: 5, high: 1, step: 1 }],
      })
    ).rejects.toThrow(InvalidSpaceError);
    expect(evaluator.calls).toHaveLength(0);
  });

  it('should enforce the combination ceiling', async () => {
    await expect(
      new Optimizer({ evaluator: productSharpe(), store: new MemoryStore() }).run({
        ...SCENARIO_A,
        maxCombinations: 3,
      })
    ).rejects.toThrow(InvalidSpaceError);
  });

  it('should save a cancelled run that has a success', async () => {
    const store = new MemoryStore();
    const token = new CancelToken();

    const record = await new Optimizer({ evaluator: productSharpe(), store, clock: JAN_FIRST }).run(
      { ...SCENARIO_A, concurrency: 1 },
      {
        cancelToken: token,
        onProgress: (completed) => {
          if (completed === 2) token.cancel();
        },
      }
    );

    expect(record.cancelled).toBe(true);
    expect(record.statistics.totalTrials).toBe(2);
    expect(store.records.has(record.runId)).toBe(true);
  });

  it('should run an adaptive search with the given backend', async () => {
    const script: ParameterCombination[] = [
      { p: 1, q: 10 },
      { p: 2, q: 20 },
    ];
    let cursor = 0;
    const backend: SearchBackend = {
      name: 'scripted',
      suggest: () => script[cursor++ % script.length],
      report: vi.fn(),
    };

    const record = await new Optimizer({ evaluator: productSharpe(), store: new MemoryStore(), clock: JAN_FIRST }).run(
      { ...SCENARIO_A, concurrency: 1, searchKind: 'adaptive', adaptive: { maxTrials: 4 } },
      { backend }
    );

    expect(record.runId).toBe('scenario-a_adaptive_20240101T000000Z');
    if (record.searchKind !== 'adaptive') throw new Error('expected an adaptive record');
    expect(record.backend).toBe('scripted');
    expect(record.stopReason).toBe('trial_budget');
    expect(record.trials).toHaveLength(4);
    expect(record.best.combination).toEqual({ p: 2, q: 20 });
    expect(backend.report).toHaveBeenCalledTimes(4);
  });

  it('should default adaptive runs to the seeded random sampler', async () => {
    const record = await new Optimizer({ evaluator: productSharpe(), store: new MemoryStore(), clock: JAN_FIRST }).run({
      ...SCENARIO_A,
      searchKind: 'adaptive',
      adaptive: { maxTrials: 3, seed: 5 },
    });

    if (record.searchKind !== 'adaptive') throw new Error('expected an adaptive record');
    expect(record.backend).toBe('random');
    expect(record.trials).toHaveLength(3);
  });

  it('should run a walk-forward search', async () => {
    const record = await new Optimizer({ evaluator: productSharpe(), store: new MemoryStore(), clock: JAN_FIRST }).run({
      ...SCENARIO_A,
      endDate: '2024-04-09',
      searchKind: 'walk_forward',
      walkForward: { inSampleDays: 60, outOfSampleDays: 20, stepDays: 20 },
    });

    if (record.searchKind !== 'walk_forward') throw new Error('expected a walk-forward record');
    expect(record.periods).toHaveLength(2);
    expect(record.summary.succeededPeriods).toBe(2);
    expect(record.summary.meanDegradation).toBe(0);
    expect(record.robust).toBe(true);
    expect(record.best?.combination).toEqual({ p: 2, q: 20 });
    expect(record.statistics.totalTrials).toBe(10);
  });
});
