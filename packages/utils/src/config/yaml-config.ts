/**
 * YAML Configuration Loader
 * ==========================
 * Loads configuration from config.yaml file with fallback to environment variables
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { logger } from '../logger.js';

export const AppConfigSchema = z
  .object({
    results: z.object({ dir: z.string().min(1).optional() }).optional(),
    optimizer: z
      .object({
        concurrency: z.number().int().positive().optional(),
        trialTimeoutMs: z.number().int().positive().optional(),
        maxCombinations: z.number().int().positive().optional(),
      })
      .optional(),
  })
  .passthrough();

export type AppConfig = z.infer<typeof AppConfigSchema>;

let cachedConfig: AppConfig | null = null;

/**
 * Load configuration from config.yaml file
 */
export function loadConfigFromYaml(configPath?: string): AppConfig {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const defaultPath = configPath || process.env.PARAMLAB_CONFIG || join(process.cwd(), 'config.yaml');

  if (!existsSync(defaultPath)) {
    logger.debug('config.yaml not found, using environment variables only');
    cachedConfig = {};
    return cachedConfig;
  }

  try {
    const content = readFileSync(defaultPath, 'utf-8');
    const parsed = AppConfigSchema.safeParse(load(content) ?? {});
    if (!parsed.success) {
      const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new Error(msg);
    }
    cachedConfig = parsed.data;
    logger.info('Loaded configuration from config.yaml', { path: defaultPath });
    return cachedConfig;
  } catch (error) {
    logger.warn('Failed to load config.yaml, using environment variables only', {
      path: defaultPath,
      error: error instanceof Error ? error.message : String(error),
    });
    cachedConfig = {};
    return cachedConfig;
  }
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
