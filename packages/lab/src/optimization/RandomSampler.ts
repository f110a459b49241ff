/**
 * Random search backend
 *
 * Draws combinations uniformly from the space with a seeded linear
 * congruential generator. Same seed, same sequence of suggestions.
 */

import type { ParameterCombination, SearchBackend } from '@paramlab/core';
import type { ParameterSpace } from './ParameterSpace.js';

/**
 * Seeded LCG returning floats in [0, 1)
 */
export function createSeededRandom(seed: number): () => number {
  let randomState = Math.abs(Math.trunc(seed)) % 233280;
  return () => {
    randomState = (randomState * 9301 + 49297) % 233280;
    return randomState / 233280;
  };
}

export class RandomSampler implements SearchBackend {
  readonly name = 'random';
  private readonly random: () => number;
  private bestScore: number | undefined;
  private bestCombination: ParameterCombination | undefined;
  private reports = 0;

  constructor(
    private readonly space: ParameterSpace,
    seed: number
  ) {
    this.random = createSeededRandom(seed);
  }

  suggest(): ParameterCombination {
    return this.space.sample(this.random);
  }

  report(combination: ParameterCombination, score: number): void {
    this.reports++;
    if (this.bestScore === undefined || score > this.bestScore) {
      this.bestScore = score;
      this.bestCombination = combination;
    }
  }

  /**
   * Highest score reported so far, first reported wins ties
   */
  getBest(): { combination: ParameterCombination; score: number } | undefined {
    if (this.bestScore === undefined || this.bestCombination === undefined) {
      return undefined;
    }
    return { combination: this.bestCombination, score: this.bestScore };
  }

  get reportCount(): number {
    return this.reports;
  }
}
