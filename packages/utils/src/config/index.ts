/**
 * Configuration loading from environment variables
 *
 * Provides typed settings for the results store and the trial scheduler.
 * Priority: config.yaml > environment variable > default.
 */

import { availableParallelism } from 'os';
import { ConfigurationError } from '../errors.js';
import { loadConfigFromYaml } from './yaml-config.js';

export { loadConfigFromYaml, clearConfigCache, type AppConfig } from './yaml-config.js';

export interface ResultsConfig {
  dir: string;
}

export interface OptimizerDefaults {
  concurrency: number;
  trialTimeoutMs: number;
  maxCombinations: number;
}

export const DEFAULT_TRIAL_TIMEOUT_MS = 300_000;
export const DEFAULT_MAX_COMBINATIONS = 100_000;

function readPositiveInt(key: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${key} must be a positive integer, got '${raw}'`, key);
  }
  return value;
}

/**
 * Load results store location
 */
export function getResultsConfig(): ResultsConfig {
  const yaml = loadConfigFromYaml();
  return {
    dir: yaml.results?.dir || process.env.PARAMLAB_RESULTS_DIR || 'results',
  };
}

/**
 * Load scheduler defaults
 */
export function getOptimizerDefaults(): OptimizerDefaults {
  const yaml = loadConfigFromYaml().optimizer ?? {};
  const { PARAMLAB_CONCURRENCY, PARAMLAB_TRIAL_TIMEOUT_MS, PARAMLAB_MAX_COMBINATIONS } =
    process.env;

  return {
    concurrency:
      yaml.concurrency ??
      readPositiveInt('PARAMLAB_CONCURRENCY', PARAMLAB_CONCURRENCY) ??
      availableParallelism(),
    trialTimeoutMs:
      yaml.trialTimeoutMs ??
      readPositiveInt('PARAMLAB_TRIAL_TIMEOUT_MS', PARAMLAB_TRIAL_TIMEOUT_MS) ??
      DEFAULT_TRIAL_TIMEOUT_MS,
    maxCombinations:
      yaml.maxCombinations ??
      readPositiveInt('PARAMLAB_MAX_COMBINATIONS', PARAMLAB_MAX_COMBINATIONS) ??
      DEFAULT_MAX_COMBINATIONS,
  };
}
