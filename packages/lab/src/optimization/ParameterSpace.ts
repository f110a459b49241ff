/**
 * ParameterSpace
 *
 * Turns declarative parameter specs into an ordered, deduplicated sequence of
 * combinations, and answers queries for samplers.
 *
 * Input:
 *   - { name: 'ema_fast', kind: 'discrete', values: [5, 9, 12] }
 *   - { name: 'atr_mult', kind: 'range', low: 1.5, high: 2.5, step: 0.5 }
 *
 * Order: parameter names ascending, then each parameter's declared value
 * order, last name varying fastest.
 */

import type { ParameterCombination, ParameterSpec, ParameterValue } from '@paramlab/core';
import { DEFAULT_MAX_COMBINATIONS, InvalidSpaceError, logger } from '@paramlab/utils';

export interface ParameterSpaceOptions {
  /** Hard ceiling on size(); larger spaces are rejected */
  maxCombinations?: number;
  /** Log a warning above this size */
  warnThreshold?: number;
}

export const DEFAULT_WARN_THRESHOLD = 10_000;

/**
 * Number of decimals needed to print n exactly (handles 1e-7 notation)
 */
function decimalsOf(n: number): number {
  const text = String(n);
  const exp = text.match(/e-(\d+)$/);
  if (exp) {
    const mantissa = text.slice(0, text.indexOf('e'));
    const dot = mantissa.indexOf('.');
    return Number(exp[1]) + (dot === -1 ? 0 : mantissa.length - dot - 1);
  }
  const dot = text.indexOf('.');
  return dot === -1 ? 0 : text.length - dot - 1;
}

/**
 * Number of values a range spec expands to, without building them
 */
export function rangeArity(low: number, high: number, step: number): number {
  return Math.floor((high - low) / step + 1e-9) + 1;
}

/**
 * Expand a range spec. A step that does not divide the range stops at the
 * largest low + k*step not above high.
 */
export function expandRange(low: number, high: number, step: number): number[] {
  const decimals = Math.min(Math.max(decimalsOf(low), decimalsOf(step)), 15);
  const count = rangeArity(low, high, step);
  const values: number[] = [];
  for (let k = 0; k < count; k++) {
    values.push(Number((low + k * step).toFixed(decimals)));
  }
  return values;
}

/**
 * ParameterSpace
 */
export class ParameterSpace {
  private readonly paramNames: string[];
  private readonly paramValues: Map<string, readonly ParameterValue[]>;

  constructor(
    readonly specs: readonly ParameterSpec[],
    options: ParameterSpaceOptions = {}
  ) {
    const problems = ParameterSpace.validate(specs);
    if (problems.length > 0) {
      throw new InvalidSpaceError(problems);
    }

    // Ceiling is checked on arities so an oversized range is never expanded
    const size = specs.reduce(
      (product, spec) =>
        product *
        (spec.kind === 'discrete' ? new Set(spec.values).size : rangeArity(spec.low, spec.high, spec.step)),
      1
    );
    const maxCombinations = options.maxCombinations ?? DEFAULT_MAX_COMBINATIONS;
    if (size > maxCombinations) {
      throw new InvalidSpaceError(
        [`space has ${size} combinations, above the ceiling of ${maxCombinations}`],
        { size, maxCombinations }
      );
    }

    this.paramNames = specs.map((s) => s.name).sort();
    this.paramValues = new Map();
    for (const spec of specs) {
      const values =
        spec.kind === 'discrete'
          ? [...new Set(spec.values)]
          : expandRange(spec.low, spec.high, spec.step);
      this.paramValues.set(spec.name, values);
    }
    if (size > (options.warnThreshold ?? DEFAULT_WARN_THRESHOLD)) {
      logger.warn('Parameter space is very large', {
        totalConfigs: size,
        params: this.paramNames,
      });
    }
  }

  /**
   * Collect every problem with a set of specs (empty when valid)
   */
  static validate(specs: readonly ParameterSpec[]): string[] {
    const errors: string[] = [];

    if (specs.length === 0) {
      errors.push('at least one parameter is required');
    }

    const seen = new Set<string>();
    for (const spec of specs) {
      if (seen.has(spec.name)) {
        errors.push(`Parameter ${spec.name} is declared more than once`);
      }
      seen.add(spec.name);

      if (spec.kind === 'discrete') {
        if (spec.values.length === 0) {
          errors.push(`Parameter ${spec.name} has no values`);
          continue;
        }
        const firstType = typeof spec.values[0];
        if (!spec.values.every((v) => typeof v === firstType)) {
          errors.push(`Parameter ${spec.name} has mixed types`);
        }
      } else {
        if (spec.low > spec.high) {
          errors.push(`Parameter ${spec.name} has inverted bounds: low (${spec.low}) > high (${spec.high})`);
        }
        if (!(spec.step > 0)) {
          errors.push(`Parameter ${spec.name} must have a positive step, got ${spec.step}`);
        }
      }
    }

    return errors;
  }

  names(): string[] {
    return [...this.paramNames];
  }

  valuesOf(name: string): readonly ParameterValue[] {
    const values = this.paramValues.get(name);
    if (!values) {
      throw new InvalidSpaceError([`unknown parameter ${name}`]);
    }
    return values;
  }

  /**
   * Total combination count without generating them
   */
  size(): number {
    return this.paramNames.reduce((product, name) => product * this.valuesOf(name).length, 1);
  }

  /**
   * Lazily generate all combinations (cartesian product)
   */
  *enumerate(): Generator<ParameterCombination> {
    const columns = this.paramNames.map((name) => ({ name, values: this.valuesOf(name) }));
    const cursor = columns.map(() => 0);

    while (true) {
      const combination: Record<string, ParameterValue> = {};
      columns.forEach((column, i) => {
        combination[column.name] = column.values[cursor[i]];
      });
      yield Object.freeze(combination);

      // Advance the odometer, rightmost parameter first
      let position = columns.length - 1;
      for (; position >= 0; position--) {
        const next = cursor[position] + 1;
        if (next < columns[position].values.length) {
          cursor[position] = next;
          break;
        }
        cursor[position] = 0;
      }
      if (position < 0) {
        return;
      }
    }
  }

  /**
   * Draw one combination uniformly at random
   *
   * @param rng - returns floats in [0, 1)
   */
  sample(rng: () => number): ParameterCombination {
    const combination: Record<string, ParameterValue> = {};
    for (const name of this.paramNames) {
      const values = this.valuesOf(name);
      const pick = Math.min(Math.floor(rng() * values.length), values.length - 1);
      combination[name] = values[pick];
    }
    return Object.freeze(combination);
  }

  /**
   * True when the combination has exactly one declared value per parameter
   */
  contains(combination: ParameterCombination): boolean {
    const keys = Object.keys(combination);
    if (keys.length !== this.paramNames.length) {
      return false;
    }
    return this.paramNames.every((name) => {
      const value = combination[name];
      return value !== undefined && this.valuesOf(name).includes(value);
    });
  }
}
