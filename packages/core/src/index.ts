/**
 * @paramlab/core
 *
 * Foundational, shared types and interfaces for the optimization core.
 * This package has zero dependencies on other @paramlab packages.
 */

export * from './types/params.js';
export * from './types/trial.js';
export * from './types/run.js';
export * from './ports/index.js';
export { generateRunId, sanitizeStrategyId } from './run-id.js';
