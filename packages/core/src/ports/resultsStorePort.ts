/**
 * Results Store Port
 *
 * Durable history of optimization runs: a compact index plus one detail
 * record per run. The optimizer depends on this port, not on the file layout.
 */

import type { ParameterValue } from '../types/params.js';
import type { RunIndexEntry, RunRecord, SearchKind } from '../types/run.js';

export interface RunFilter {
  strategyId?: string | string[];
  searchKind?: SearchKind;
  minSharpe?: number;
  maxSharpe?: number;
  /** Matches runs sharing at least one symbol */
  symbols?: string[];
  /** Inclusive bounds on createdAtIso (ISO instants) */
  createdFrom?: string;
  createdTo?: string;
}

export type RunSortField =
  | 'runId'
  | 'createdAtIso'
  | 'strategyId'
  | 'searchKind'
  | 'bestSharpe'
  | 'bestReturn'
  | 'startDate'
  | 'endDate'
  | 'trialCount';

export interface RunSort {
  field: RunSortField;
  direction: 'asc' | 'desc';
}

export interface ListOptions {
  sort?: RunSort;
  limit?: number;
}

export interface ComparisonMetrics {
  sharpeRatio: number;
  totalReturn: number;
  maxDrawdown: number;
  winRate: number;
  tradeCount: number;
}

export interface ComparisonRow {
  runId: string;
  strategyId: string;
  searchKind: SearchKind;
  createdAtIso: string;
  symbols: string[];
  /** Null when the run has no best combination (non-robust walk-forward) */
  metrics: ComparisonMetrics | null;
  /** Aligned on ComparisonTable.parameterNames; missing parameters are null */
  parameters: Record<string, ParameterValue | null>;
}

export interface ComparisonTable {
  runIds: string[];
  parameterNames: string[];
  rows: ComparisonRow[];
}

export interface ResultsStorePort {
  /** Allocate a run id that no saved or reserved run uses */
  reserveRunId(strategyId: string, searchKind: SearchKind, timestampMs: number): Promise<string>;
  save(record: RunRecord): Promise<string>;
  list(filter?: RunFilter, options?: ListOptions): Promise<RunIndexEntry[]>;
  get(runId: string): Promise<RunRecord>;
  delete(runId: string): Promise<void>;
  compare(runIds: string[]): Promise<ComparisonTable>;
}
