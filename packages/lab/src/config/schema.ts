/**
 * Optimization Configuration
 * ==========================
 * Schema, presets and file loading for one optimization run.
 *
 * Structural checks only: parameter semantics (empty sets, inverted ranges)
 * are left to ParameterSpace so they surface as InvalidSpaceError.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { load } from 'js-yaml';
import { DateTime } from 'luxon';
import { z } from 'zod';
import {
  IsoDateSchema,
  ParameterSpecSchema,
  RankableMetricSchema,
  SearchKindSchema,
} from '@paramlab/core';
import { NotFoundError, ValidationError, errorMessage, logger } from '@paramlab/utils';
import { AdaptiveConfigSchema } from '../optimization/AdaptiveSearch.js';
import { ParameterSpace } from '../optimization/ParameterSpace.js';
import { generatePeriods } from '../windows/PeriodGenerator.js';

export const RankingConfigSchema = z.object({
  metric: RankableMetricSchema.default('sharpeRatio'),
  direction: z.enum(['asc', 'desc']).default('desc'),
});

export const WalkForwardConfigSchema = z.object({
  inSampleDays: z.number().int().positive(),
  outOfSampleDays: z.number().int().positive(),
  stepDays: z.number().int().positive().optional(),
  degradationEpsilon: z.number().positive().default(0.01),
});

export type WalkForwardConfig = z.infer<typeof WalkForwardConfigSchema>;

export const OptimizationConfigSchema = z
  .object({
    strategyId: z.string().min(1),
    symbols: z.array(z.string().min(1)).min(1),
    startDate: IsoDateSchema,
    endDate: IsoDateSchema,
    capital: z.number().positive(),
    parameters: z.array(ParameterSpecSchema),
    searchKind: SearchKindSchema.default('grid'),
    concurrency: z.number().int().positive().optional(),
    /** 0 disables the per-trial timeout */
    trialTimeoutMs: z.number().int().min(0).optional(),
    ranking: RankingConfigSchema.default({}),
    maxCombinations: z.number().int().positive().optional(),
    walkForward: WalkForwardConfigSchema.optional(),
    adaptive: AdaptiveConfigSchema.optional(),
  })
  .superRefine((config, ctx) => {
    if (config.startDate > config.endDate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['endDate'],
        message: `endDate (${config.endDate}) is before startDate (${config.startDate})`,
      });
    }
    if (config.searchKind === 'walk_forward' && !config.walkForward) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['walkForward'],
        message: 'walk_forward search needs a walkForward block',
      });
    }
    if (config.searchKind === 'adaptive' && !config.adaptive) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['adaptive'],
        message: 'adaptive search needs an adaptive block',
      });
    }
  });

export type OptimizationConfig = z.infer<typeof OptimizationConfigSchema>;
export type OptimizationConfigInput = z.input<typeof OptimizationConfigSchema>;

const PresetSchema = z
  .object({
    description: z.string().optional(),
  })
  .passthrough();

const PresetFileSchema = z.record(z.string(), PresetSchema);

const PRESETS_PATH = fileURLToPath(new URL('../../config/presets.json', import.meta.url));

let cachedPresets: Record<string, Record<string, unknown>> | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursive merge: nested objects merge, everything else is replaced
 */
export function deepMerge(
  base: Record<string, unknown>,
  overrides: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    const current = result[key];
    result[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
  }
  return result;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * Validate a raw configuration object
 *
 * @throws ValidationError listing every issue
 */
export function parseOptimizationConfig(raw: unknown): OptimizationConfig {
  const parsed = OptimizationConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid optimization config: ${formatIssues(parsed.error)}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/**
 * Named presets from presets.json, description stripped
 */
export function loadPresets(): Record<string, Record<string, unknown>> {
  if (cachedPresets !== null) {
    return cachedPresets;
  }
  const parsed = PresetFileSchema.parse(JSON.parse(readFileSync(PRESETS_PATH, 'utf-8')));
  const presets: Record<string, Record<string, unknown>> = {};
  for (const [name, preset] of Object.entries(parsed)) {
    const values: Record<string, unknown> = { ...preset };
    delete values.description;
    presets[name] = values;
  }
  cachedPresets = presets;
  return presets;
}

export function listPresets(): string[] {
  return Object.keys(loadPresets()).sort();
}

/**
 * Deep-merge overrides onto a named preset and validate the result
 *
 * @throws NotFoundError for an unknown preset
 */
export function resolvePreset(name: string, overrides: Record<string, unknown>): OptimizationConfig {
  const preset = loadPresets()[name];
  if (!preset) {
    throw new NotFoundError('Preset', name, { available: listPresets() });
  }
  logger.debug('Resolving preset', { preset: name, overrides: Object.keys(overrides) });
  return parseOptimizationConfig(deepMerge(preset, overrides));
}

/**
 * Load a YAML or JSON config file. A top-level `preset` key is resolved
 * against presets.json with the rest of the file as overrides.
 */
export function loadOptimizationConfig(path: string): OptimizationConfig {
  let raw: unknown;
  try {
    raw = load(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ValidationError(`Could not read optimization config ${path}: ${errorMessage(error)}`, { path });
  }

  if (isRecord(raw) && typeof raw.preset === 'string') {
    const preset = raw.preset;
    const overrides = { ...raw };
    delete overrides.preset;
    logger.info('Loaded optimization config', { path, preset });
    return resolvePreset(preset, overrides);
  }

  logger.info('Loaded optimization config', { path });
  return parseOptimizationConfig(raw);
}

/**
 * Human-readable summary of a configuration
 */
export function describeConfig(config: OptimizationConfig): string {
  const start = DateTime.fromISO(config.startDate, { zone: 'utc' });
  const end = DateTime.fromISO(config.endDate, { zone: 'utc' });
  const days = Math.round(end.diff(start, 'days').days) + 1;

  const lines = [
    `Strategy: ${config.strategyId}`,
    `Symbols: ${config.symbols.join(', ')}`,
    `Period: ${config.startDate} to ${config.endDate} (${days} days)`,
    `Capital: ${config.capital}`,
    `Search: ${config.searchKind}`,
    `Ranking: ${config.ranking.metric} ${config.ranking.direction}`,
    'Parameters:',
  ];

  const problems = ParameterSpace.validate(config.parameters);
  if (problems.length > 0) {
    lines.push(...problems.map((p) => `  invalid: ${p}`));
  } else {
    const space = new ParameterSpace(config.parameters, {
      maxCombinations: Number.MAX_SAFE_INTEGER,
      warnThreshold: Number.MAX_SAFE_INTEGER,
    });
    for (const name of space.names()) {
      const values = space.valuesOf(name);
      lines.push(`  ${name}: ${values.length} values [${values.join(', ')}]`);
    }
    lines.push(`Total combinations: ${space.size()}`);
  }

  if (config.walkForward) {
    const wf = config.walkForward;
    const step = wf.stepDays ?? wf.outOfSampleDays;
    const periods = generatePeriods(
      { start: config.startDate, end: config.endDate },
      { inSampleDays: wf.inSampleDays, outOfSampleDays: wf.outOfSampleDays, stepDays: step }
    );
    lines.push(
      `Walk-forward: in-sample ${wf.inSampleDays}d, out-of-sample ${wf.outOfSampleDays}d, step ${step}d, ${periods.length} periods`
    );
  }

  if (config.adaptive) {
    const budget = [
      config.adaptive.maxTrials !== undefined ? `${config.adaptive.maxTrials} trials` : undefined,
      config.adaptive.maxDurationMs !== undefined ? `${config.adaptive.maxDurationMs}ms` : undefined,
    ].filter((part): part is string => part !== undefined);
    lines.push(`Adaptive: budget ${budget.join(' / ')}, seed ${config.adaptive.seed}`);
  }

  return lines.join('\n');
}
