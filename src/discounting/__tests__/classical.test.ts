import { describe, expect, it } from 'vitest';
import { InvalidReliabilityError } from '../../core/errors.js';
import { createMassFunction } from '../../core/mass_function.js';
import { discountClassical } from '../classical.js';

const m = createMassFunction({ '{a}': 0.4, '{b}': 0.3, '{a,b}': 0.3 });

describe('discountClassical', () => {
  it('moves the unreliable share to the whole frame', () => {
    const discounted = discountClassical(m, 0.8);
    expect(discounted.mass('{a}')).toBeCloseTo(0.32, 12);
    expect(discounted.mass('{b}')).toBeCloseTo(0.24, 12);
    expect(discounted.mass('{a,b}')).toBeCloseTo(0.44, 12);
  });

  it('is the identity for a fully reliable source', () => {
    expect(discountClassical(m, 1).equals(m)).toBe(true);
  });

  it('collapses to the vacuous mass function for an unreliable source', () => {
    expect(discountClassical(m, 0).toRecord()).toEqual({ '{a,b}': 1 });
  });

  it('uses the declared frame as the whole frame', () => {
    const declared = createMassFunction({ '{a}': 1 }, { frame: ['a', 'b', 'c'] });
    expect(discountClassical(declared, 0.5).toRecord()).toEqual({ '{a}': 0.5, '{a,b,c}': 0.5 });
  });

  it.each([-0.1, 1.5, Number.NaN])('rejects reliability %s', (reliability) => {
    expect(() => discountClassical(m, reliability)).toThrow(InvalidReliabilityError);
  });
});
