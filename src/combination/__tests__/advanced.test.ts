import { describe, expect, it } from 'vitest';
import { createMassFunction } from '../../core/mass_function.js';
import { combineConjunctive } from '../basic.js';
import { combineDuboisPrade, combineYager, combineZhang } from '../advanced.js';

const m3 = createMassFunction({ '{a}': 0.8, '{b}': 0.2 });
const m4 = createMassFunction({ '{a}': 0.1, '{b}': 0.9 });

describe('combineYager', () => {
  it('moves the conflict to the whole frame', () => {
    const combined = combineYager(m3, m4);
    expect(combined.conflict).toBe(0);
    expect(combined.mass('{a}')).toBeCloseTo(0.08, 12);
    expect(combined.mass('{b}')).toBeCloseTo(0.18, 12);
    expect(combined.mass('{a,b}')).toBeCloseTo(0.74, 12);
  });

  it('yields the conflict-on-frame reading of two overlapping sources', () => {
    const m1 = createMassFunction({ '{a}': 0.4, '{b}': 0.2, '{a,b}': 0.4 });
    const m2 = createMassFunction({ '{a}': 0.2, '{b}': 0.6, '{a,b}': 0.2 });
    const combined = combineYager(m1, m2);
    expect(combined.mass('{a}')).toBeCloseTo(0.24, 12);
    expect(combined.mass('{b}')).toBeCloseTo(0.4, 12);
    expect(combined.mass('{a,b}')).toBeCloseTo(0.36, 12);
  });
});

describe('combineDuboisPrade', () => {
  it('matches Yager on a two-element frame', () => {
    const combined = combineDuboisPrade(m3, m4);
    expect(combined.mass('{a}')).toBeCloseTo(0.08, 12);
    expect(combined.mass('{b}')).toBeCloseTo(0.18, 12);
    expect(combined.mass('{a,b}')).toBeCloseTo(0.74, 12);
  });

  it('diverges from Yager on a three-element frame', () => {
    const left = createMassFunction({ '{a}': 0.6, '{a,b}': 0.4 });
    const right = createMassFunction({ '{c}': 0.5, '{b,c}': 0.5 });

    const yager = combineYager(left, right);
    expect(yager.frame.elements).toEqual(['a', 'b', 'c']);
    expect(yager.mass('{b}')).toBeCloseTo(0.2, 12);
    expect(yager.mass('{a,b,c}')).toBeCloseTo(0.8, 12);

    const duboisPrade = combineDuboisPrade(left, right);
    expect(duboisPrade.mass('{b}')).toBeCloseTo(0.2, 12);
    expect(duboisPrade.mass('{a,c}')).toBeCloseTo(0.3, 12);
    expect(duboisPrade.mass('{a,b,c}')).toBeCloseTo(0.5, 12);
  });
});

describe('combineZhang', () => {
  it('adds the conflict to each plausible focal set and renormalizes', () => {
    const combined = combineZhang(m3, m4);
    expect(combined.mass('{a}')).toBeCloseTo(0.82 / 1.74, 12);
    expect(combined.mass('{b}')).toBeCloseTo(0.92 / 1.74, 12);
    expect(combined.isNormalized()).toBe(true);
  });

  it('equals the conjunctive rule when there is no conflict', () => {
    const left = createMassFunction({ '{a}': 0.5, '{a,b}': 0.5 });
    const right = createMassFunction({ '{a,b}': 1 });
    expect(combineZhang(left, right).equals(combineConjunctive(left, right))).toBe(true);
  });

  it('weights intersections by their relative size in the center variant', () => {
    const m1 = createMassFunction({ '{a}': 0.4, '{b}': 0.2, '{a,b}': 0.4 });
    const m2 = createMassFunction({ '{a}': 0.2, '{b}': 0.6, '{a,b}': 0.2 });
    const combined = combineZhang(m1, m2, { redistribution: 'center' });
    expect(combined.mass('{a}')).toBeCloseTo(0.16 / 0.46, 12);
    expect(combined.mass('{b}')).toBeCloseTo(0.26 / 0.46, 12);
    expect(combined.mass('{a,b}')).toBeCloseTo(0.04 / 0.46, 12);
  });
});
