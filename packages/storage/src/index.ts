/**
 * @paramlab/storage - Storage Package
 *
 * File-backed persistence for optimization runs.
 */

export * from './results/layout.js';
export { WriteLock } from './results/WriteLock.js';
export {
  ResultsStore,
  DEFAULT_SORT,
  filterEntries,
  sortEntries,
} from './results/ResultsStore.js';
export type {
  BestRunMetric,
  InitializeOptions,
  ReconcileReport,
  ResultsStoreOptions,
  StoreStatistics,
} from './results/ResultsStore.js';
