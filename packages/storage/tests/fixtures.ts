/**
 * Run record builders for store tests
 */

import type { GridRunRecord, ParameterCombination, WalkForwardRunRecord } from '@paramlab/core';

export interface RecordOptions {
  strategyId?: string;
  createdAtIso?: string;
  symbols?: string[];
  sharpeRatio?: number;
  totalReturn?: number;
  combination?: ParameterCombination;
}

const STATISTICS = {
  totalTrials: 4,
  succeededTrials: 4,
  failedTrials: 0,
  meanSharpe: 0.25,
  stdSharpe: 0.1,
  minSharpe: 0.1,
  maxSharpe: 0.4,
  meanReturn: 0.1,
};

export function gridRecord(runId: string, options: RecordOptions = {}): GridRunRecord {
  return {
    version: 1,
    runId,
    createdAtIso: options.createdAtIso ?? '2024-01-01T00:00:00.000Z',
    strategyId: options.strategyId ?? 'ma-cross',
    config: { strategyId: options.strategyId ?? 'ma-cross' },
    symbols: options.symbols ?? ['AAPL'],
    startDate: '2024-01-01',
    endDate: '2024-01-31',
    cancelled: false,
    statistics: STATISTICS,
    searchKind: 'grid',
    best: {
      combination: options.combination ?? { fast: 5, slow: 20 },
      metrics: {
        sharpeRatio: options.sharpeRatio ?? 1,
        totalReturn: options.totalReturn ?? 0.1,
        maxDrawdown: -0.05,
        winRate: 0.5,
        tradeCount: 10,
      },
    },
    trials: [],
  };
}

export function fragileRecord(runId: string, createdAtIso = '2024-01-02T00:00:00.000Z'): WalkForwardRunRecord {
  return {
    version: 1,
    runId,
    createdAtIso,
    strategyId: 'breakout',
    config: {},
    symbols: ['MSFT'],
    startDate: '2024-01-01',
    endDate: '2024-04-09',
    cancelled: false,
    statistics: { ...STATISTICS, totalTrials: 6 },
    searchKind: 'walk_forward',
    best: null,
    periods: [],
    summary: {
      totalPeriods: 0,
      succeededPeriods: 0,
      failedPeriods: 0,
      meanDegradation: null,
      medianDegradation: null,
      meanInSampleSharpe: null,
      meanOutOfSampleSharpe: null,
      positiveOutOfSampleFraction: null,
    },
    robust: false,
  };
}
