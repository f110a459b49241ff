/**
 * Trial Types
 *
 * A trial is one evaluation of a single parameter combination.
 */

import { z } from 'zod';
import { ParameterCombinationSchema } from './params.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const IsoDateSchema = z.string().regex(ISO_DATE, 'expected YYYY-MM-DD');

/**
 * Inclusive calendar date range
 */
export const DateRangeSchema = z.object({
  start: IsoDateSchema,
  end: IsoDateSchema,
});

export type DateRange = z.infer<typeof DateRangeSchema>;

/**
 * Performance metrics reported by the evaluator.
 * Extra strategy-reported fields are kept verbatim.
 */
export const MetricsRecordSchema = z
  .object({
    sharpeRatio: z.number().finite(),
    totalReturn: z.number().finite(),
    maxDrawdown: z.number().finite(),
    winRate: z.number().finite(),
    tradeCount: z.number().int().min(0),
  })
  .catchall(z.unknown());

export type MetricsRecord = z.infer<typeof MetricsRecordSchema>;

export const RankableMetricSchema = z.enum([
  'sharpeRatio',
  'totalReturn',
  'maxDrawdown',
  'winRate',
  'tradeCount',
]);

export type RankableMetric = z.infer<typeof RankableMetricSchema>;

export const TrialFailureReasonSchema = z.enum([
  'evaluator_error',
  'timeout',
  'invalid_metrics',
  'invalid_combination',
]);

export type TrialFailureReason = z.infer<typeof TrialFailureReasonSchema>;

export const TrialFailureSchema = z.object({
  reason: TrialFailureReasonSchema,
  message: z.string(),
});

export type TrialFailure = z.infer<typeof TrialFailureSchema>;

export const TrialOutcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('succeeded'), metrics: MetricsRecordSchema }),
  z.object({ status: z.literal('failed'), failure: TrialFailureSchema }),
]);

export type TrialOutcome = z.infer<typeof TrialOutcomeSchema>;
export type SucceededOutcome = Extract<TrialOutcome, { status: 'succeeded' }>;

export const TrialSchema = z.object({
  /** Submission sequence number, used as the final ranking tie-break */
  index: z.number().int().min(0),
  strategyId: z.string().min(1),
  combination: ParameterCombinationSchema,
  symbols: z.array(z.string()),
  startDate: IsoDateSchema,
  endDate: IsoDateSchema,
  capital: z.number().positive(),
});

export type Trial = z.infer<typeof TrialSchema>;

export const TrialResultSchema = z.object({
  trial: TrialSchema,
  outcome: TrialOutcomeSchema,
  durationMs: z.number().min(0),
});

export type TrialResult = z.infer<typeof TrialResultSchema>;

/**
 * Trial result narrowed to a successful outcome
 */
export type SucceededTrialResult = TrialResult & { outcome: SucceededOutcome };

export function isSucceeded(result: TrialResult): result is SucceededTrialResult {
  return result.outcome.status === 'succeeded';
}
