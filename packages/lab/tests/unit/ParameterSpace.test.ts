import { describe, it, expect } from 'vitest';
import { InvalidSpaceError } from '@paramlab/utils';
import { ParameterSpace, expandRange, rangeArity } from '../../src/optimization/ParameterSpace.js';

describe('ParameterSpace', () => {
  describe('expandRange', () => {
    it('should round decimal steps to the step precision', () => {
      expect(expandRange(0.1, 0.5, 0.1)).toEqual([0.1, 0.2, 0.3, 0.4, 0.5]);
    });

    it('should stop at the largest value not above high', () => {
      expect(expandRange(1, 10, 4)).toEqual([1, 5, 9]);
    });

    it('should yield the single value when low equals high', () => {
      expect(expandRange(3, 3, 1)).toEqual([3]);
    });
  });

  it('should enumerate names ascending with the last name varying fastest', () => {
    const space = new ParameterSpace([
      { name: 'q', kind: 'discrete', values: [10, 20] },
      { name: 'p', kind: 'range', low: 1, high: 2, step: 1 },
    ]);

    expect(space.names()).toEqual(['p', 'q']);
    expect([...space.enumerate()]).toEqual([
      { p: 1, q: 10 },
      { p: 1, q: 20 },
      { p: 2, q: 10 },
      { p: 2, q: 20 },
    ]);
    expect(space.size()).toBe(4);
  });

  it('should keep declared value order and drop duplicates', () => {
    const space = new ParameterSpace([{ name: 'mode', kind: 'discrete', values: ['fast', 'slow', 'fast'] }]);

    expect(space.valuesOf('mode')).toEqual(['fast', 'slow']);
  });

  it('should freeze every combination', () => {
    const space = new ParameterSpace([{ name: 'p', kind: 'discrete', values: [1] }]);
    const [first] = [...space.enumerate()];

    expect(Object.isFrozen(first)).toBe(true);
  });

  it('should collect every validation problem', () => {
    expect(
      ParameterSpace.validate([
        { name: 'a', kind: 'discrete', values: [] },
        { name: 'b', kind: 'discrete', values: [1, 'x'] },
        { name: 'c', kind: 'range', low: 5, high: 1, step: 1 },
        { name: 'd', kind: 'range', low: 1, high: 5, step: 0 },
        { name: 'd', kind: 'discrete', values: [true] },
      ])
    ).toEqual([
      'Parameter a has no values',
      'Parameter b has mixed types',
      'Parameter c has inverted bounds: low (5) > high (1)',
      'Parameter d must have a positive step, got 0',
      'Parameter d is declared more than once',
    ]);
  });

  it('should reject an empty space', () => {
    expect(() => new ParameterSpace([])).toThrow(InvalidSpaceError);
    expect(() => new ParameterSpace([])).toThrow('Invalid parameter space: at least one parameter is required');
  });

  it('should reject a space above the combination ceiling', () => {
    const specs = [
      { name: 'p', kind: 'discrete' as const, values: [1, 2] },
      { name: 'q', kind: 'discrete' as const, values: [1, 2] },
    ];

    expect(() => new ParameterSpace(specs, { maxCombinations: 3 })).toThrow(
      'Invalid parameter space: space has 4 combinations, above the ceiling of 3'
    );
    expect(new ParameterSpace(specs, { maxCombinations: 4 }).size()).toBe(4);
  });

  it('should reject an oversized range without expanding it', () => {
    const started = performance.now();

    expect(
      () =>
        new ParameterSpace([{ name: 'x', kind: 'range', low: 0, high: 1e9, step: 1 }], {
          maxCombinations: 100,
        })
    ).toThrow('Invalid parameter space: space has 1000000001 combinations, above the ceiling of 100');
    expect(performance.now() - started).toBeLessThan(1000);
  });

  it('should count range values without building them', () => {
    expect(rangeArity(0, 1e9, 1)).toBe(1_000_000_001);
    expect(rangeArity(1.5, 2.5, 0.5)).toBe(expandRange(1.5, 2.5, 0.5).length);
    expect(rangeArity(0, 10, 3)).toBe(4);
  });

  it('should answer membership queries', () => {
    const space = new ParameterSpace([
      { name: 'p', kind: 'discrete', values: [1, 2] },
      { name: 'flag', kind: 'discrete', values: [true, false] },
    ]);

    expect(space.contains({ p: 2, flag: false })).toBe(true);
    expect(space.contains({ p: 3, flag: false })).toBe(false);
    expect(space.contains({ p: 1 })).toBe(false);
    expect(space.contains({ p: 1, flag: true, extra: 1 })).toBe(false);
  });

  it('should sample with the given random source', () => {
    const space = new ParameterSpace([
      { name: 'p', kind: 'discrete', values: [1, 2, 3] },
      { name: 'q', kind: 'discrete', values: ['a', 'b'] },
    ]);

    expect(space.sample(() => 0)).toEqual({ p: 1, q: 'a' });
    expect(space.sample(() => 0.999)).toEqual({ p: 3, q: 'b' });
  });

  it('should throw for an unknown parameter name', () => {
    const space = new ParameterSpace([{ name: 'p', kind: 'discrete', values: [1] }]);

    expect(() => space.valuesOf('nope')).toThrow(InvalidSpaceError);
  });
});
