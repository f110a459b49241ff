/**
 * Run Record Types
 *
 * A RunRecord is the result of one full optimization invocation. It is
 * written once and never mutated; the RunIndexEntry is its compact projection.
 */

import { z } from 'zod';
import { ParameterCombinationSchema } from './params.js';
import {
  DateRangeSchema,
  IsoDateSchema,
  MetricsRecordSchema,
  TrialFailureSchema,
  TrialResultSchema,
} from './trial.js';

export const SearchKindSchema = z.enum(['grid', 'walk_forward', 'adaptive']);

export type SearchKind = z.infer<typeof SearchKindSchema>;

export const BestResultSchema = z.object({
  combination: ParameterCombinationSchema,
  metrics: MetricsRecordSchema,
});

export type BestResult = z.infer<typeof BestResultSchema>;

/**
 * Aggregate statistics over every trial of a run
 */
export const RunStatisticsSchema = z.object({
  totalTrials: z.number().int().min(0),
  succeededTrials: z.number().int().min(0),
  failedTrials: z.number().int().min(0),
  meanSharpe: z.number().nullable(),
  stdSharpe: z.number().nullable(),
  minSharpe: z.number().nullable(),
  maxSharpe: z.number().nullable(),
  meanReturn: z.number().nullable(),
});

export type RunStatistics = z.infer<typeof RunStatisticsSchema>;

/**
 * Walk-forward window: in-sample strictly precedes out-of-sample
 */
export const PeriodSchema = z.object({
  index: z.number().int().min(0),
  inSample: DateRangeSchema,
  outOfSample: DateRangeSchema,
});

export type Period = z.infer<typeof PeriodSchema>;

export const PeriodFailureReasonSchema = z.enum([
  'no_viable_in_sample',
  'out_of_sample_failed',
  'cancelled',
]);

export type PeriodFailureReason = z.infer<typeof PeriodFailureReasonSchema>;

export const PeriodResultSchema = z.object({
  period: PeriodSchema,
  status: z.enum(['succeeded', 'failed']),
  /** In-sample winner, absent when the in-sample search produced nothing */
  best: BestResultSchema.optional(),
  inSampleTrials: z.array(TrialResultSchema),
  outOfSample: TrialResultSchema.optional(),
  degradation: z.number().optional(),
  failure: z
    .object({
      reason: PeriodFailureReasonSchema,
      message: z.string(),
      trialFailure: TrialFailureSchema.optional(),
    })
    .optional(),
});

export type PeriodResult = z.infer<typeof PeriodResultSchema>;

export const WalkForwardSummarySchema = z.object({
  totalPeriods: z.number().int().min(0),
  succeededPeriods: z.number().int().min(0),
  failedPeriods: z.number().int().min(0),
  meanDegradation: z.number().nullable(),
  medianDegradation: z.number().nullable(),
  meanInSampleSharpe: z.number().nullable(),
  meanOutOfSampleSharpe: z.number().nullable(),
  positiveOutOfSampleFraction: z.number().nullable(),
});

export type WalkForwardSummary = z.infer<typeof WalkForwardSummarySchema>;

const RunRecordBaseSchema = z.object({
  version: z.literal(1),
  runId: z.string().min(1),
  createdAtIso: z.string(),
  strategyId: z.string().min(1),
  /** Configuration snapshot as submitted */
  config: z.record(z.unknown()),
  symbols: z.array(z.string()),
  startDate: IsoDateSchema,
  endDate: IsoDateSchema,
  cancelled: z.boolean(),
  statistics: RunStatisticsSchema,
});

export const GridRunRecordSchema = RunRecordBaseSchema.extend({
  searchKind: z.literal('grid'),
  best: BestResultSchema,
  trials: z.array(TrialResultSchema),
});

export const AdaptiveStopReasonSchema = z.enum(['trial_budget', 'time_budget', 'cancelled']);

export type AdaptiveStopReason = z.infer<typeof AdaptiveStopReasonSchema>;

export const AdaptiveRunRecordSchema = RunRecordBaseSchema.extend({
  searchKind: z.literal('adaptive'),
  best: BestResultSchema,
  trials: z.array(TrialResultSchema),
  backend: z.string(),
  stopReason: AdaptiveStopReasonSchema,
});

export const WalkForwardRunRecordSchema = RunRecordBaseSchema.extend({
  searchKind: z.literal('walk_forward'),
  best: BestResultSchema.nullable(),
  periods: z.array(PeriodResultSchema),
  summary: WalkForwardSummarySchema,
  robust: z.boolean(),
});

export const RunRecordSchema = z.discriminatedUnion('searchKind', [
  GridRunRecordSchema,
  AdaptiveRunRecordSchema,
  WalkForwardRunRecordSchema,
]);

export type GridRunRecord = z.infer<typeof GridRunRecordSchema>;
export type AdaptiveRunRecord = z.infer<typeof AdaptiveRunRecordSchema>;
export type WalkForwardRunRecord = z.infer<typeof WalkForwardRunRecordSchema>;
export type RunRecord = z.infer<typeof RunRecordSchema>;

/**
 * Compact projection kept in the index for listing without loading detail
 */
export const RunIndexEntrySchema = z.object({
  runId: z.string().min(1),
  createdAtIso: z.string(),
  strategyId: z.string(),
  searchKind: SearchKindSchema,
  bestSharpe: z.number().nullable(),
  bestReturn: z.number().nullable(),
  symbols: z.array(z.string()),
  startDate: IsoDateSchema,
  endDate: IsoDateSchema,
  trialCount: z.number().int().min(0),
  cancelled: z.boolean(),
  robust: z.boolean().optional(),
});

export type RunIndexEntry = z.infer<typeof RunIndexEntrySchema>;

/**
 * Project a run record onto its index entry
 */
export function toIndexEntry(record: RunRecord): RunIndexEntry {
  const entry: RunIndexEntry = {
    runId: record.runId,
    createdAtIso: record.createdAtIso,
    strategyId: record.strategyId,
    searchKind: record.searchKind,
    bestSharpe: record.best?.metrics.sharpeRatio ?? null,
    bestReturn: record.best?.metrics.totalReturn ?? null,
    symbols: [...record.symbols],
    startDate: record.startDate,
    endDate: record.endDate,
    trialCount: record.statistics.totalTrials,
    cancelled: record.cancelled,
  };
  if (record.searchKind === 'walk_forward') {
    entry.robust = record.robust;
  }
  return entry;
}
