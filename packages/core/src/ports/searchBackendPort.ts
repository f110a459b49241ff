import type { ParameterCombination } from '../types/params.js';

/**
 * Suggestion-based search backend (Bayesian, random, ...).
 *
 * The core only asks for suggestions and reports scalar scores back; higher
 * scores are better. Backends may suggest the same combination twice.
 */
export interface SearchBackend {
  readonly name: string;
  suggest(): ParameterCombination | Promise<ParameterCombination>;
  report(combination: ParameterCombination, score: number): void | Promise<void>;
}
