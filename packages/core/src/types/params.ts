/**
 * Parameter Space Types
 *
 * Declarative parameter definitions and the combinations drawn from them.
 */

import { z } from 'zod';

export const ParameterValueSchema = z.union([z.number().finite(), z.string(), z.boolean()]);

export type ParameterValue = z.infer<typeof ParameterValueSchema>;

/**
 * Explicit list of values to try
 */
export const DiscreteParameterSpecSchema = z.object({
  name: z.string().min(1),
  kind: z.literal('discrete'),
  values: z.array(ParameterValueSchema),
});

/**
 * Numeric range expanded as low, low+step, ... (inclusive of high when reachable)
 */
export const RangeParameterSpecSchema = z.object({
  name: z.string().min(1),
  kind: z.literal('range'),
  low: z.number().finite(),
  high: z.number().finite(),
  step: z.number().finite(),
});

/**
 * Shape only. Semantic checks (empty sets, inverted bounds) belong to
 * ParameterSpace so they surface as InvalidSpaceError.
 */
export const ParameterSpecSchema = z.discriminatedUnion('kind', [
  DiscreteParameterSpecSchema,
  RangeParameterSpecSchema,
]);

export type DiscreteParameterSpec = z.infer<typeof DiscreteParameterSpecSchema>;
export type RangeParameterSpec = z.infer<typeof RangeParameterSpecSchema>;
export type ParameterSpec = z.infer<typeof ParameterSpecSchema>;

export const ParameterCombinationSchema = z.record(z.string(), ParameterValueSchema);

/**
 * One point in the space: exactly one value per declared parameter
 */
export type ParameterCombination = Readonly<Record<string, ParameterValue>>;
