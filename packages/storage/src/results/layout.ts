/**
 * Results Store Layout - Path conventions
 *
 *   <baseDir>/index.jsonl        one RunIndexEntry per line
 *   <baseDir>/runs/<runId>.json  full RunRecord
 *   <baseDir>/tmp/               staging for atomic writes
 *
 * Pure functions - no FS operations.
 */

import { join } from 'path';

export interface StorePaths {
  baseDir: string;
  indexFile: string;
  runsDir: string;
  tmpDir: string;
}

const RUN_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export function getStorePaths(baseDir: string): StorePaths {
  return {
    baseDir,
    indexFile: join(baseDir, 'index.jsonl'),
    runsDir: join(baseDir, 'runs'),
    tmpDir: join(baseDir, 'tmp'),
  };
}

/**
 * Whether a run id can be used as a file name inside runs/
 */
export function isSafeRunId(runId: string): boolean {
  return RUN_ID_PATTERN.test(runId);
}

export function getDetailPath(paths: StorePaths, runId: string): string {
  return join(paths.runsDir, `${runId}.json`);
}

/**
 * Run id of a detail file name, undefined for anything else
 */
export function runIdFromDetailFile(fileName: string): string | undefined {
  if (!fileName.endsWith('.json')) {
    return undefined;
  }
  const runId = fileName.slice(0, -'.json'.length);
  return isSafeRunId(runId) ? runId : undefined;
}
