/**
 * Ports Barrel Export
 *
 * All port interfaces are exported from here.
 */

export type { ClockPort } from './clockPort.js';
export { createSystemClock } from './clockPort.js';
export type { EvaluatorPort, EvaluationRequest } from './evaluatorPort.js';
export type { SearchBackend } from './searchBackendPort.js';
export type {
  ResultsStorePort,
  RunFilter,
  RunSort,
  RunSortField,
  ListOptions,
  ComparisonMetrics,
  ComparisonRow,
  ComparisonTable,
} from './resultsStorePort.js';
