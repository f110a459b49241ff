/**
 * @paramlab/lab - Optimization Lab Package
 *
 * Parameter spaces, trial scheduling and the grid, walk-forward and adaptive
 * search strategies, tied together by the Optimizer.
 */

export * from './optimization/types.js';
export * from './optimization/ParameterSpace.js';
export * from './optimization/ranking.js';
export * from './optimization/statistics.js';
export type { GridSearchResult, GridEvaluation } from './optimization/GridSearch.js';
export { GridSearch } from './optimization/GridSearch.js';
export * from './optimization/AdaptiveSearch.js';
export * from './optimization/RandomSampler.js';
export * from './evaluation/TrialEvaluator.js';
export * from './scheduler/CancelToken.js';
export * from './scheduler/TrialScheduler.js';
export * from './windows/types.js';
export * from './windows/PeriodGenerator.js';
export * from './windows/WalkForwardSearch.js';
export * from './config/schema.js';

export { Optimizer, defaultBackendFactory } from './Optimizer.js';
export type { BackendFactory, OptimizerDeps, OptimizerRunOptions } from './Optimizer.js';
