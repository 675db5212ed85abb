import { describe, expect, it } from 'vitest';
import { InvalidPartitionError, InvalidReliabilityError, ValidationError } from '../../core/errors.js';
import { createMassFunction } from '../../core/mass_function.js';
import {
  discountContextual,
  discountThetaContextual,
  generalizationMatrix,
  thetaGeneralizationMatrix,
} from '../contextual.js';

const m = createMassFunction({ '{a}': 0.5, '{b}': 0.5 });

describe('generalizationMatrix', () => {
  it('has one row per non-empty subset', () => {
    const matrix = generalizationMatrix(['a', 'b'], { a: 0.2, b: 0.4 });
    expect(matrix.size).toBe(3);
    expect(matrix.get(0b01)?.get(0b01)).toBeCloseTo(0.8, 12);
    expect(matrix.get(0b11)?.get(0b01)).toBeCloseTo(0.8 * 0.4, 12);
    expect(matrix.get(0b11)?.get(0b11)).toBeCloseTo(0.8 * 0.6, 12);
    expect(matrix.get(0b01)?.size).toBe(1);
  });
});

describe('discountContextual', () => {
  it('removes support for a fully discounted context', () => {
    const discounted = discountContextual(m, { a: 1, b: 0 });
    expect(discounted.toRecord()).toEqual({ '{b}': 0.5, '{a,b}': 0.5 });
  });

  it('spreads mass to supersets and renormalizes', () => {
    const source = createMassFunction({ '{a}': 1 }, { frame: ['a', 'b'] });
    const discounted = discountContextual(source, new Map([['a', 0.2], ['b', 0.2]]));
    expect(discounted.mass('{a}')).toBeCloseTo(0.8 / 0.96, 12);
    expect(discounted.mass('{a,b}')).toBeCloseTo(0.16 / 0.96, 12);
  });

  it('is the identity when every rate is zero', () => {
    expect(discountContextual(m, { a: 0 }).equals(m)).toBe(true);
  });

  it('is vacuous when every rate is one', () => {
    expect(discountContextual(m, { a: 1, b: 1 }).toRecord()).toEqual({ '{a,b}': 1 });
  });

  it('is vacuous when no mass survives', () => {
    const source = createMassFunction({ '{a}': 1 }, { frame: ['a', 'b', 'c'] });
    expect(discountContextual(source, { a: 1 }).toRecord()).toEqual({ '{a,b,c}': 1 });
  });

  it('rejects unknown elements and invalid rates', () => {
    expect(() => discountContextual(m, { z: 0.5 })).toThrow(ValidationError);
    expect(() => discountContextual(m, { a: 2 })).toThrow(InvalidReliabilityError);
  });
});

describe('discountThetaContextual', () => {
  it('matches contextual discounting on a partition into singletons', () => {
    const theta = discountThetaContextual(m, [['a'], ['b']], [{ block: ['a'], rate: 1 }]);
    expect(theta.equals(discountContextual(m, { a: 1 }))).toBe(true);
  });

  it('builds the block matrix', () => {
    const matrix = thetaGeneralizationMatrix(['a', 'b'], [['a'], ['b']], [{ block: ['a'], rate: 0.2 }]);
    expect(matrix.get(0b11)?.get(0b01)).toBe(0);
    expect(matrix.get(0b11)?.get(0b10)).toBeCloseTo(0.2, 12);
  });

  it('is the identity when every block rate is zero', () => {
    expect(discountThetaContextual(m, [['a', 'b']], []).equals(m)).toBe(true);
  });

  it.each([
    { label: 'overlapping blocks', partition: [['a', 'b'], ['b', 'c']] },
    { label: 'uncovered elements', partition: [['a']] },
    { label: 'an empty block', partition: [[], ['a', 'b', 'c']] },
    { label: 'unknown elements', partition: [['a', 'b', 'c', 'z']] },
  ])('rejects $label', ({ partition }) => {
    const source = createMassFunction({ '{a}': 1 }, { frame: ['a', 'b', 'c'] });
    expect(() => discountThetaContextual(source, partition, [])).toThrow(InvalidPartitionError);
  });

  it('rejects rates for blocks outside the partition', () => {
    expect(() => discountThetaContextual(m, [['a'], ['b']], [{ block: ['a', 'b'], rate: 0.5 }])).toThrow(
      ValidationError
    );
  });
});
