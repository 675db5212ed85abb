/**
 * @fileoverview Classical (Shafer) discounting.
 *
 * A source trusted with reliability α keeps a fraction α of each focal
 * mass; the remaining 1 - α becomes ignorance on Ω:
 *
 *   m^α(A) = α·m(A)            for A ≠ Ω
 *   m^α(Ω) = α·m(Ω) + (1 - α)
 */

import { InvalidReliabilityError } from '../core/errors.js';
import { MassFunction } from '../core/mass_function.js';
import type { Subset } from '../core/subset.js';

/**
 * @throws InvalidReliabilityError if `reliability` is outside [0, 1]
 *
 * @example
 * ```typescript
 * const m = createMassFunction({ '{a}': 0.4, '{b}': 0.3, '{a,b}': 0.3 });
 * discountClassical(m, 0.8).toRecord();
 * // { '{a}': 0.32, '{b}': 0.24, '{a,b}': 0.44 }
 * ```
 */
export function discountClassical(m: MassFunction, reliability: number): MassFunction {
  assertRate(reliability);

  if (reliability === 1) return m.copy();
  if (reliability === 0) return vacuousOver(m);

  const full = m.frame.full;
  const discounted = [...m.entries()].map(([subset, mass]): [Subset, number] => [
    subset,
    reliability * mass,
  ]);
  discounted.push([full, 1 - reliability]);

  return MassFunction.fromSubsets(m.frame, discounted, {
    declared: m.hasDeclaredFrame,
    config: m.engineConfig,
  });
}

/**
 * @throws InvalidReliabilityError unless `rate` is a number in [0, 1]
 */
export function assertRate(rate: number, context?: string): void {
  if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
    throw new InvalidReliabilityError(rate, context);
  }
}

/** {Ω: 1} over the frame of `m`, keeping whether that frame was declared. */
export function vacuousOver(m: MassFunction): MassFunction {
  return MassFunction.fromSubsets(m.frame, [[m.frame.full, 1]], {
    declared: m.hasDeclaredFrame,
    config: m.engineConfig,
  });
}
