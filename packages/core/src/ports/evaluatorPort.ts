import type { ParameterCombination } from '../types/params.js';

/**
 * Backtest evaluation request
 */
export interface EvaluationRequest {
  strategyId: string;
  combination: ParameterCombination;
  symbols: readonly string[];
  /** Inclusive ISO date (YYYY-MM-DD) */
  startDate: string;
  /** Inclusive ISO date (YYYY-MM-DD) */
  endDate: string;
  capital: number;
}

/**
 * External backtest evaluator.
 *
 * Resolves with a metrics record (validated by the caller) or rejects.
 * Must be safe to call concurrently with different arguments.
 */
export interface EvaluatorPort {
  evaluate(request: EvaluationRequest): Promise<unknown>;
}
