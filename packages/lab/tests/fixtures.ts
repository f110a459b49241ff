/**
 * Shared test fixtures: in-process evaluators and trial builders
 */

import type {
  DateRange,
  EvaluationRequest,
  EvaluatorPort,
  MetricsRecord,
  ParameterCombination,
  SucceededTrialResult,
  Trial,
  TrialResult,
} from '@paramlab/core';
import { TrialEvaluator } from '../src/evaluation/TrialEvaluator.js';
import type { TrialContext } from '../src/optimization/types.js';
import { TrialScheduler } from '../src/scheduler/TrialScheduler.js';

export const CONTEXT: TrialContext = { strategyId: 'test-strategy', symbols: ['AAPL'], capital: 10_000 };

export const RANGE: DateRange = { start: '2024-01-01', end: '2024-01-31' };

export function metrics(sharpeRatio: number, overrides: Partial<MetricsRecord> = {}): MetricsRecord {
  return {
    sharpeRatio,
    totalReturn: 0.1,
    maxDrawdown: -0.05,
    winRate: 0.5,
    tradeCount: 10,
    ...overrides,
  };
}

export interface StubEvaluator extends EvaluatorPort {
  calls: EvaluationRequest[];
}

export function stubEvaluator(fn: (request: EvaluationRequest) => unknown): StubEvaluator {
  const calls: EvaluationRequest[] = [];
  return {
    calls,
    async evaluate(request) {
      calls.push(request);
      return fn(request);
    },
  };
}

export function numberParam(combination: ParameterCombination, name: string): number {
  const value = combination[name];
  if (typeof value !== 'number') {
    throw new Error(`parameter ${name} is not a number`);
  }
  return value;
}

export function schedulerFor(evaluator: EvaluatorPort, timeoutMs = 0): TrialScheduler {
  return new TrialScheduler(new TrialEvaluator(evaluator, { timeoutMs }));
}

export function trial(index: number, combination: ParameterCombination = { p: index }): Trial {
  return {
    index,
    strategyId: CONTEXT.strategyId,
    combination,
    symbols: [...CONTEXT.symbols],
    startDate: RANGE.start,
    endDate: RANGE.end,
    capital: CONTEXT.capital,
  };
}

export function succeeded(index: number, record: MetricsRecord): SucceededTrialResult {
  return { trial: trial(index), outcome: { status: 'succeeded', metrics: record }, durationMs: 1 };
}

export function failed(index: number): TrialResult {
  return {
    trial: trial(index),
    outcome: { status: 'failed', failure: { reason: 'evaluator_error', message: 'boom' } },
    durationMs: 1,
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
