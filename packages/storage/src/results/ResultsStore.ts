/**
 * ResultsStore - File-backed optimization history
 *
 * Keeps a compact append-only index beside one detail file per run.
 *
 * Write ordering:
 * - save: detail to tmp/, rename into runs/, then append the index line
 *   (on a fresh line even if the previous append was torn)
 * - delete: rewrite the index without the entry, then remove the detail
 *
 * So an index entry never points at a missing detail; a crash can at worst
 * leave an orphan detail or temp file, which reconcile() removes.
 *
 * Usage:
 * ```typescript
 * const store = new ResultsStore({ baseDir: './results' });
 * await store.initialize({ reconcile: true });
 * const runId = await store.reserveRunId('ma-cross', 'grid', Date.now());
 * await store.save(record);
 * const latest = await store.list({ strategyId: 'ma-cross' }, { limit: 10 });
 * ```
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { DateTime } from 'luxon';
import { RunIndexEntrySchema, RunRecordSchema, generateRunId, toIndexEntry } from '@paramlab/core';
import type {
  ComparisonRow,
  ComparisonTable,
  ListOptions,
  ParameterValue,
  ResultsStorePort,
  RunFilter,
  RunIndexEntry,
  RunRecord,
  RunSort,
  SearchKind,
} from '@paramlab/core';
import {
  InvalidArgumentError,
  NotFoundError,
  ValidationError,
  errorMessage,
  getResultsConfig,
} from '@paramlab/utils';
import { logger } from '../logger.js';
import { getDetailPath, getStorePaths, isSafeRunId, runIdFromDetailFile } from './layout.js';
import type { StorePaths } from './layout.js';
import { WriteLock } from './WriteLock.js';

export interface ResultsStoreOptions {
  /** Defaults to the configured results directory */
  baseDir?: string;
}

export interface InitializeOptions {
  /** Remove orphan details and stale temp files on startup */
  reconcile?: boolean;
}

export interface ReconcileReport {
  removedDetails: string[];
  removedTempFiles: string[];
}

export type BestRunMetric = 'bestSharpe' | 'bestReturn';

export interface StoreStatistics {
  totalRuns: number;
  strategies: string[];
  searchKinds: Record<SearchKind, number>;
  bestSharpe: number | null;
  avgSharpe: number | null;
  bestReturn: number | null;
  avgReturn: number | null;
}

export const DEFAULT_SORT: RunSort = { field: 'createdAtIso', direction: 'desc' };

const MIN_COMPARE = 2;
const MAX_COMPARE = 5;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function parseInstant(value: string, field: string): number {
  const instant = DateTime.fromISO(value, { zone: 'utc' });
  if (!instant.isValid) {
    throw new InvalidArgumentError(`${field} is not a valid ISO instant: '${value}'`, { [field]: value });
  }
  return instant.toMillis();
}

function compareValues(a: string | number, b: string | number): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Sort index entries; null values always sort last
 */
export function sortEntries(entries: readonly RunIndexEntry[], sort: RunSort = DEFAULT_SORT): RunIndexEntry[] {
  const sign = sort.direction === 'asc' ? 1 : -1;
  return [...entries].sort((a, b) => {
    const va = a[sort.field];
    const vb = b[sort.field];
    if (va === null && vb === null) return compareValues(a.runId, b.runId);
    if (va === null) return 1;
    if (vb === null) return -1;
    return sign * compareValues(va, vb) || compareValues(a.runId, b.runId);
  });
}

/**
 * Apply a RunFilter to index entries
 */
export function filterEntries(entries: readonly RunIndexEntry[], filter: RunFilter = {}): RunIndexEntry[] {
  const strategies =
    filter.strategyId === undefined
      ? undefined
      : new Set(Array.isArray(filter.strategyId) ? filter.strategyId : [filter.strategyId]);
  const symbols = filter.symbols ? new Set(filter.symbols) : undefined;
  const from = filter.createdFrom !== undefined ? parseInstant(filter.createdFrom, 'createdFrom') : undefined;
  const to = filter.createdTo !== undefined ? parseInstant(filter.createdTo, 'createdTo') : undefined;

  return entries.filter((entry) => {
    if (strategies && !strategies.has(entry.strategyId)) return false;
    if (filter.searchKind !== undefined && entry.searchKind !== filter.searchKind) return false;
    if (filter.minSharpe !== undefined && (entry.bestSharpe === null || entry.bestSharpe < filter.minSharpe)) {
      return false;
    }
    if (filter.maxSharpe !== undefined && (entry.bestSharpe === null || entry.bestSharpe > filter.maxSharpe)) {
      return false;
    }
    if (symbols && !entry.symbols.some((s) => symbols.has(s))) return false;
    if (from !== undefined || to !== undefined) {
      const created = DateTime.fromISO(entry.createdAtIso, { zone: 'utc' }).toMillis();
      if (from !== undefined && created < from) return false;
      if (to !== undefined && created > to) return false;
    }
    return true;
  });
}

function average(values: readonly number[]): number | null {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : null;
}

export class ResultsStore implements ResultsStorePort {
  readonly paths: StorePaths;
  private readonly lock = new WriteLock();
  private readonly reserved = new Set<string>();
  private readonly pendingTemp = new Set<string>();
  private tempCounter = 0;

  constructor(options: ResultsStoreOptions = {}) {
    this.paths = getStorePaths(options.baseDir ?? getResultsConfig().dir);
  }

  /**
   * Create directories; optionally reconcile leftovers of an earlier crash
   */
  async initialize(options: InitializeOptions = {}): Promise<ReconcileReport | undefined> {
    await fs.mkdir(this.paths.runsDir, { recursive: true });
    await fs.mkdir(this.paths.tmpDir, { recursive: true });
    logger.debug('Results store initialized', { baseDir: this.paths.baseDir });
    return options.reconcile ? this.reconcile() : undefined;
  }

  /**
   * First free id over disambiguators 0, 1, 2, ... Free means not indexed,
   * no detail file and not reserved by this process.
   */
  async reserveRunId(strategyId: string, searchKind: SearchKind, timestampMs: number): Promise<string> {
    return this.lock.run(async () => {
      const indexed = new Set((await this.readIndex()).map((e) => e.runId));
      for (let n = 0; ; n++) {
        const runId = generateRunId(strategyId, searchKind, timestampMs, n);
        if (indexed.has(runId) || this.reserved.has(runId) || (await this.detailExists(runId))) {
          continue;
        }
        this.reserved.add(runId);
        if (n > 0) {
          logger.debug('Run id collision resolved', { runId, disambiguator: n });
        }
        return runId;
      }
    });
  }

  async save(record: RunRecord): Promise<string> {
    const parsed = RunRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new ValidationError(`Invalid run record: ${parsed.error.issues.map((i) => i.message).join('; ')}`, {
        runId: record.runId,
      });
    }
    const runId = parsed.data.runId;
    if (!isSafeRunId(runId)) {
      throw new InvalidArgumentError(`Run id '${runId}' contains unsupported characters`, { runId });
    }

    // Staged outside the lock so detail writes for different runs overlap
    const tempFile = path.join(this.paths.tmpDir, `${runId}.${process.pid}.${this.tempCounter++}.json`);
    this.pendingTemp.add(tempFile);
    try {
      await fs.writeFile(tempFile, JSON.stringify(parsed.data, null, 2), 'utf-8');

      await this.lock.run(async () => {
        if ((await this.readIndex()).some((e) => e.runId === runId)) {
          throw new InvalidArgumentError(`Run '${runId}' is already saved`, { runId });
        }
        await fs.rename(tempFile, getDetailPath(this.paths, runId));
        await this.appendIndexLine(JSON.stringify(toIndexEntry(parsed.data)));
      });
    } catch (error) {
      await fs.rm(tempFile, { force: true });
      throw error;
    } finally {
      this.pendingTemp.delete(tempFile);
      this.reserved.delete(runId);
    }

    logger.info('Run saved', { runId, searchKind: parsed.data.searchKind });
    return runId;
  }

  async list(filter: RunFilter = {}, options: ListOptions = {}): Promise<RunIndexEntry[]> {
    if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit < 0)) {
      throw new InvalidArgumentError(`limit must be a non-negative integer, got ${options.limit}`);
    }
    const sorted = sortEntries(filterEntries(await this.readIndex(), filter), options.sort);
    return options.limit !== undefined ? sorted.slice(0, options.limit) : sorted;
  }

  async get(runId: string): Promise<RunRecord> {
    const entry = await this.findEntry(runId);
    if (!entry) {
      throw new NotFoundError('Run', runId);
    }

    let content: string;
    try {
      content = await fs.readFile(getDetailPath(this.paths, runId), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new NotFoundError('Run detail', runId);
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ValidationError(`Run detail '${runId}' is not valid JSON: ${errorMessage(error)}`, { runId });
    }
    const parsed = RunRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`Run detail '${runId}' does not match the run record schema`, {
        runId,
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
    return parsed.data;
  }

  async delete(runId: string): Promise<void> {
    await this.lock.run(async () => {
      const lines = await this.readIndexLines();
      if (!lines.some((line) => line.entry?.runId === runId)) {
        throw new NotFoundError('Run', runId);
      }
      const detailPath = getDetailPath(this.paths, runId);
      if (!(await this.detailExists(runId))) {
        throw new NotFoundError('Run detail', runId);
      }

      const kept = lines.filter((line) => line.entry !== undefined && line.entry.runId !== runId);
      const tempIndex = path.join(this.paths.tmpDir, `index.${process.pid}.${this.tempCounter++}.jsonl`);
      await fs.writeFile(tempIndex, kept.map((line) => line.raw + '\n').join(''), 'utf-8');
      await fs.rename(tempIndex, this.paths.indexFile);
      await fs.rm(detailPath, { force: true });
    });
    logger.info('Run deleted', { runId });
  }

  /**
   * Align best metrics and parameters of 2 to 5 runs
   */
  async compare(runIds: string[]): Promise<ComparisonTable> {
    if (runIds.length < MIN_COMPARE || runIds.length > MAX_COMPARE) {
      throw new InvalidArgumentError(
        `compare takes between ${MIN_COMPARE} and ${MAX_COMPARE} run ids, got ${runIds.length}`,
        { runIds }
      );
    }
    if (new Set(runIds).size !== runIds.length) {
      throw new InvalidArgumentError('compare run ids must be distinct', { runIds });
    }

    const indexed = new Set((await this.readIndex()).map((e) => e.runId));
    const unknown = runIds.filter((id) => !indexed.has(id));
    if (unknown.length > 0) {
      throw new InvalidArgumentError(`Unknown run ids: ${unknown.join(', ')}`, { unknown });
    }

    const records = await Promise.all(
      runIds.map(async (id) => {
        try {
          return await this.get(id);
        } catch (error) {
          if (error instanceof NotFoundError) {
            throw new InvalidArgumentError(`Run '${id}' has no readable detail`, { runId: id });
          }
          throw error;
        }
      })
    );
    const parameterNames = [
      ...new Set(records.flatMap((r) => (r.best ? Object.keys(r.best.combination) : []))),
    ].sort();

    const rows: ComparisonRow[] = records.map((record) => {
      const parameters: Record<string, ParameterValue | null> = {};
      for (const name of parameterNames) {
        parameters[name] = record.best?.combination[name] ?? null;
      }
      const metrics = record.best?.metrics;
      return {
        runId: record.runId,
        strategyId: record.strategyId,
        searchKind: record.searchKind,
        createdAtIso: record.createdAtIso,
        symbols: [...record.symbols],
        metrics: metrics
          ? {
              sharpeRatio: metrics.sharpeRatio,
              totalReturn: metrics.totalReturn,
              maxDrawdown: metrics.maxDrawdown,
              winRate: metrics.winRate,
              tradeCount: metrics.tradeCount,
            }
          : null,
        parameters,
      };
    });

    return { runIds: [...runIds], parameterNames, rows };
  }

  /**
   * Remove detail files with no index entry and stale temp files.
   * Index entries are never touched.
   */
  async reconcile(): Promise<ReconcileReport> {
    return this.lock.run(async () => {
      const indexed = new Set((await this.readIndex()).map((e) => e.runId));
      const report: ReconcileReport = { removedDetails: [], removedTempFiles: [] };

      for (const fileName of await this.readDir(this.paths.runsDir)) {
        const runId = runIdFromDetailFile(fileName);
        if (runId !== undefined && !indexed.has(runId) && !this.reserved.has(runId)) {
          await fs.rm(path.join(this.paths.runsDir, fileName), { force: true });
          report.removedDetails.push(runId);
        }
      }

      for (const fileName of await this.readDir(this.paths.tmpDir)) {
        const tempFile = path.join(this.paths.tmpDir, fileName);
        if (!this.pendingTemp.has(tempFile)) {
          await fs.rm(tempFile, { force: true });
          report.removedTempFiles.push(fileName);
        }
      }

      if (report.removedDetails.length > 0 || report.removedTempFiles.length > 0) {
        logger.warn('Reconciled results store', {
          removedDetails: report.removedDetails.length,
          removedTempFiles: report.removedTempFiles.length,
        });
      }
      return report;
    });
  }

  /**
   * Index entry with the highest metric value, optionally for one strategy
   */
  async getBestRun(strategyId?: string, metric: BestRunMetric = 'bestSharpe'): Promise<RunIndexEntry | undefined> {
    const entries = await this.list(strategyId !== undefined ? { strategyId } : {}, {
      sort: { field: metric, direction: 'desc' },
    });
    const best = entries[0];
    return best !== undefined && best[metric] !== null ? best : undefined;
  }

  async getStatistics(): Promise<StoreStatistics> {
    const entries = await this.readIndex();
    const sharpes = entries.flatMap((e) => (e.bestSharpe !== null ? [e.bestSharpe] : []));
    const returns = entries.flatMap((e) => (e.bestReturn !== null ? [e.bestReturn] : []));
    const searchKinds: Record<SearchKind, number> = { grid: 0, walk_forward: 0, adaptive: 0 };
    for (const entry of entries) {
      searchKinds[entry.searchKind]++;
    }

    return {
      totalRuns: entries.length,
      strategies: [...new Set(entries.map((e) => e.strategyId))].sort(),
      searchKinds,
      bestSharpe: sharpes.length > 0 ? Math.max(...sharpes) : null,
      avgSharpe: average(sharpes),
      bestReturn: returns.length > 0 ? Math.max(...returns) : null,
      avgReturn: average(returns),
    };
  }

  private async findEntry(runId: string): Promise<RunIndexEntry | undefined> {
    return (await this.readIndex()).find((e) => e.runId === runId);
  }

  private async readIndex(): Promise<RunIndexEntry[]> {
    return (await this.readIndexLines()).flatMap((line) => (line.entry ? [line.entry] : []));
  }

  /**
   * Index lines with their parsed entry; unparseable lines carry none
   */
  private async readIndexLines(): Promise<Array<{ raw: string; entry?: RunIndexEntry }>> {
    let content: string;
    try {
      content = await fs.readFile(this.paths.indexFile, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const lines: Array<{ raw: string; entry?: RunIndexEntry }> = [];
    content.split('\n').forEach((raw, lineNumber) => {
      if (raw.trim() === '') {
        return;
      }
      let value: unknown;
      try {
        value = JSON.parse(raw);
      } catch (error) {
        logger.warn('Skipping unreadable index line', { lineNumber: lineNumber + 1, error: errorMessage(error) });
        lines.push({ raw });
        return;
      }
      const parsed = RunIndexEntrySchema.safeParse(value);
      if (!parsed.success) {
        logger.warn('Skipping invalid index line', { lineNumber: lineNumber + 1 });
        lines.push({ raw });
        return;
      }
      lines.push({ raw, entry: parsed.data });
    });
    return lines;
  }

  /**
   * Append one index line. A torn tail left by a crash is closed off first
   * so the new entry starts on its own line.
   */
  private async appendIndexLine(line: string): Promise<void> {
    let prefix = '';
    try {
      const handle = await fs.open(this.paths.indexFile, 'r');
      try {
        const { size } = await handle.stat();
        if (size > 0) {
          const last = Buffer.alloc(1);
          await handle.read(last, 0, 1, size - 1);
          if (last[0] !== 0x0a) {
            logger.warn('Index ends with a torn line; starting a new one', { indexFile: this.paths.indexFile });
            prefix = '\n';
          }
        }
      } finally {
        await handle.close();
      }
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
    await fs.appendFile(this.paths.indexFile, `${prefix}${line}\n`, 'utf-8');
  }

  private async detailExists(runId: string): Promise<boolean> {
    try {
      await fs.access(getDetailPath(this.paths, runId));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  private async readDir(dir: string): Promise<string[]> {
    try {
      return await fs.readdir(dir);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }
}
