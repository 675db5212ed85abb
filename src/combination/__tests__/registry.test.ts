import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../core/errors.js';
import { createMassFunction } from '../../core/mass_function.js';
import { combineYager } from '../advanced.js';
import { combineSources, getRule, isRuleName, listRules } from '../registry.js';

const m3 = createMassFunction({ '{a}': 0.8, '{b}': 0.2 });
const m4 = createMassFunction({ '{a}': 0.1, '{b}': 0.9 });

describe('rule registry', () => {
  it('lists every rule once', () => {
    expect(listRules().map((rule) => rule.name)).toEqual([
      'conjunctive',
      'dempster',
      'disjunctive',
      'yager',
      'dubois-prade',
      'zhang',
      'pcr5',
      'pcr6',
      'cautious',
      'bold',
    ]);
  });

  it('recognizes rule names', () => {
    expect(isRuleName('pcr6')).toBe(true);
    expect(isRuleName('average')).toBe(false);
  });

  it('rejects unknown rules', () => {
    expect(() => getRule('average')).toThrow(ValidationError);
  });

  it('folds binary rules over the sources', () => {
    expect(combineSources([m3, m4], 'yager').equals(combineYager(m3, m4))).toBe(true);
  });

  it('keeps the conflict under the unnormalized conjunctive rule', () => {
    expect(combineSources([m3, m4], 'conjunctive').conflict).toBeCloseTo(0.74, 12);
    expect(combineSources([m3, m4], 'dempster').conflict).toBe(0);
  });

  it('applies PCR6 to all sources at once', () => {
    const combined = combineSources(
      [createMassFunction({ '{a}': 1 }), createMassFunction({ '{b}': 1 }), createMassFunction({ '{b}': 1 })],
      'pcr6'
    );
    expect(combined.mass('{a}')).toBeCloseTo(1 / 3, 12);
  });

  it('rejects an empty source list', () => {
    expect(() => combineSources([], 'dempster')).toThrow(ValidationError);
    expect(() => combineSources([], 'pcr6')).toThrow(ValidationError);
  });
});
