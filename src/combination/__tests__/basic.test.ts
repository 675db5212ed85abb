import { describe, expect, it } from 'vitest';
import { FrameMismatchError, TotalConflictError, ValidationError } from '../../core/errors.js';
import { createMassFunction, createVacuousMassFunction } from '../../core/mass_function.js';
import {
  combineConjunctive,
  combineDempster,
  combineDisjunctive,
  combineMultiple,
  conflictBetween,
} from '../basic.js';
import { combinePcr5 } from '../pcr.js';

const m1 = createMassFunction({ '{a}': 0.4, '{b}': 0.2, '{a,b}': 0.4 });
const m2 = createMassFunction({ '{a}': 0.2, '{b}': 0.6, '{a,b}': 0.2 });

describe('combineConjunctive', () => {
  it('keeps the conflict on the empty set when not normalizing', () => {
    const raw = combineConjunctive(m1, m2, { normalize: false });
    expect(raw.conflict).toBeCloseTo(0.28, 12);
    expect(raw.mass('{a}')).toBeCloseTo(0.24, 12);
    expect(raw.mass('{b}')).toBeCloseTo(0.4, 12);
    expect(raw.mass('{a,b}')).toBeCloseTo(0.08, 12);
    expect(raw.total).toBeCloseTo(1, 12);
  });

  it('normalizes away the conflict by default', () => {
    const combined = combineConjunctive(m1, m2);
    expect(combined.conflict).toBe(0);
    expect(combined.mass('{a}')).toBeCloseTo(0.24 / 0.72, 12);
    expect(combined.mass('{b}')).toBeCloseTo(0.4 / 0.72, 12);
    expect(combined.mass('{a,b}')).toBeCloseTo(0.08 / 0.72, 12);
    expect(combined.isNormalized()).toBe(true);
  });

  it('is commutative', () => {
    expect(combineConjunctive(m1, m2).equals(combineConjunctive(m2, m1))).toBe(true);
  });

  it('has the vacuous mass function as neutral element', () => {
    const vacuous = createVacuousMassFunction(['a', 'b']);
    expect(combineConjunctive(m1, vacuous).equals(m1)).toBe(true);
  });

  it('raises total conflict for fully contradictory sources', () => {
    const onlyA = createMassFunction({ '{a}': 1 });
    const onlyB = createMassFunction({ '{b}': 1 });
    expect(() => combineConjunctive(onlyA, onlyB)).toThrow(TotalConflictError);
    expect(combineConjunctive(onlyA, onlyB, { normalize: false }).conflict).toBe(1);
  });
});

describe('frame compatibility', () => {
  it('rejects two different declared frames', () => {
    const left = createMassFunction({ '{a}': 1 }, { frame: ['a', 'b'] });
    const right = createMassFunction({ '{a}': 1 }, { frame: ['a', 'c'] });
    expect(() => combineConjunctive(left, right)).toThrow(FrameMismatchError);
  });

  it('inherits the only declared frame', () => {
    const declared = createMassFunction({ '{a,b,c}': 1 }, { frame: ['a', 'b', 'c'] });
    const inferred = createMassFunction({ '{a}': 0.5, '{b}': 0.5 });
    const combined = combineConjunctive(inferred, declared);
    expect(combined.hasDeclaredFrame).toBe(true);
    expect(combined.frame.elements).toEqual(['a', 'b', 'c']);
    expect(combined.toRecord()).toEqual({ '{a}': 0.5, '{b}': 0.5 });
  });

  it('infers the union of frames when none is declared', () => {
    const combined = combineConjunctive(createMassFunction({ '{a}': 1 }), createMassFunction({ '{a,b}': 1 }));
    expect(combined.hasDeclaredFrame).toBe(false);
    expect(combined.frame.elements).toEqual(['a', 'b']);
    expect(combined.toRecord()).toEqual({ '{a}': 1 });
  });
});

describe('conflictBetween and combineDempster', () => {
  it('measures the conflict mass', () => {
    expect(conflictBetween(m1, m2)).toBeCloseTo(0.28, 12);
  });

  it('reports the conflict it normalized away', () => {
    const result = combineDempster(m1, m2);
    expect(result.conflict).toBeCloseTo(0.28, 12);
    expect(result.normalized).toBe(true);
    expect(result.combined.equals(combineConjunctive(m1, m2))).toBe(true);
  });

  it('does not normalize conflict-free combinations', () => {
    const result = combineDempster(m1, createVacuousMassFunction(['a', 'b']));
    expect(result.conflict).toBe(0);
    expect(result.normalized).toBe(false);
  });

  it('raises total conflict', () => {
    expect(() => combineDempster(createMassFunction({ '{a}': 1 }), createMassFunction({ '{b}': 1 }))).toThrow(
      TotalConflictError
    );
  });
});

describe('combineDisjunctive', () => {
  it('sends products to unions', () => {
    const combined = combineDisjunctive(m1, m2);
    expect(combined.conflict).toBe(0);
    expect(combined.mass('{a}')).toBeCloseTo(0.08, 12);
    expect(combined.mass('{b}')).toBeCloseTo(0.12, 12);
    expect(combined.mass('{a,b}')).toBeCloseTo(0.8, 12);
  });

  it('has the vacuous mass function as absorbing element', () => {
    const vacuous = createVacuousMassFunction(['a', 'b']);
    expect(combineDisjunctive(m1, vacuous).equals(vacuous)).toBe(true);
  });
});

describe('combineMultiple', () => {
  it('rejects an empty list', () => {
    expect(() => combineMultiple([])).toThrow(ValidationError);
  });

  it('returns a copy of a single source', () => {
    const result = combineMultiple([m1]);
    expect(result).not.toBe(m1);
    expect(result.equals(m1)).toBe(true);
  });

  it('folds from left to right', () => {
    const m3 = createMassFunction({ '{a}': 0.5, '{a,b}': 0.5 });
    const folded = combineMultiple([m1, m2, m3]);
    expect(folded.equals(combineConjunctive(combineConjunctive(m1, m2), m3))).toBe(true);
  });

  it('keeps source order for rules that are not associative', () => {
    const a = createMassFunction({ '{a}': 0.6, '{b}': 0.3, '{a,b}': 0.1 });
    const b = createMassFunction({ '{a}': 0.2, '{b}': 0.7, '{a,b}': 0.1 });
    const c = createMassFunction({ '{a}': 0.5, '{b}': 0.5 });

    const folded = combineMultiple([a, b, c], combinePcr5);
    const rightGrouped = combinePcr5(a, combinePcr5(b, c));

    expect(folded.equals(combinePcr5(combinePcr5(a, b), c))).toBe(true);
    expect(folded.equals(rightGrouped)).toBe(false);
    expect(folded.mass('{a}')).toBeCloseTo(0.4424468, 6);
    expect(folded.mass('{b}')).toBeCloseTo(0.5575532, 6);
    expect(rightGrouped.mass('{a}')).toBeCloseTo(0.4683132, 6);
  });

  it('accepts any binary rule', () => {
    expect(combineMultiple([m1, m2], combineDisjunctive).equals(combineDisjunctive(m1, m2))).toBe(true);
  });
});
