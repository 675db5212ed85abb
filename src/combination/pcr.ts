/**
 * @fileoverview Proportional Conflict Redistribution (PCR5, PCR6)
 *
 * Instead of discarding the conflict or parking it on Ω, the PCR rules
 * hand each conflicting product back to the focal sets that caused it,
 * in proportion to the masses those sets were given.
 *
 * PCR5 is defined for two sources. PCR6 (Martin & Osswald) generalizes it
 * to N sources and coincides with PCR5 when N = 2. PCR6 enumerates every
 * combination of one focal set per source, so its cost is the product of
 * the sources' focal counts.
 *
 * ## References
 *
 * - Smarandache, F. & Dezert, J. (2005) "Information Fusion Based on New
 *   Proportional Conflict Redistribution Rules"
 * - Martin, A. & Osswald, C. (2006) "A new generalization of the proportional
 *   conflict redistribution rule stable in terms of decision"
 *
 * @packageDocumentation
 */

import { ValidationError } from '../core/errors.js';
import { MassFunction } from '../core/mass_function.js';
import { EMPTY_SUBSET, intersect, type Subset } from '../core/subset.js';
import { logDebug } from '../telemetry/logger.js';
import { addMass, alignOperands, alignPair } from './operands.js';

/**
 * PCR5: for every conflicting pair (A, B) with A∩B = ∅,
 * A receives m1(A)²·m2(B) / (m1(A)+m2(B)) and
 * B receives m2(B)²·m1(A) / (m1(A)+m2(B)).
 */
export function combinePcr5(m1: MassFunction, m2: MassFunction): MassFunction {
  const operands = alignPair(m1, m2);
  const masses = new Map<Subset, number>();

  for (const [a, massA] of operands.left) {
    for (const [b, massB] of operands.right) {
      const product = massA * massB;
      const target = intersect(a, b);
      if (target !== EMPTY_SUBSET) {
        addMass(masses, target, product);
        continue;
      }
      const total = massA + massB;
      if (total > 0) {
        addMass(masses, a, (product * massA) / total);
        addMass(masses, b, (product * massB) / total);
      }
    }
  }

  return MassFunction.fromSubsets(operands.frame, masses, {
    declared: operands.declared,
    ensureNormalized: true,
    config: operands.config,
  });
}

export type Pcr6ConflictHandling = 'redistribute' | 'drop';

export interface Pcr6Options {
  /**
   * - `redistribute` (default): each conflicting product is shared among
   *   the chosen focal sets in proportion to their masses.
   * - `drop`: conflicting products are discarded and the result is
   *   renormalized, i.e. Dempster's rule over N sources.
   */
  readonly conflictHandling?: Pcr6ConflictHandling;
}

/**
 * PCR6 over any number of sources.
 *
 * For a combination (X1, ..., XN) of one focal set per source with an
 * empty intersection and product P = Π mi(Xi), each Xi receives
 * P · mi(Xi) / Σj mj(Xj). A set chosen by several sources accumulates
 * their shares.
 *
 * @throws ValidationError if `sources` is empty
 * @throws FrameMismatchError if two sources declare different frames
 */
export function combinePcr6(sources: readonly MassFunction[], options: Pcr6Options = {}): MassFunction {
  const [first] = sources;
  if (first === undefined) {
    throw new ValidationError('PCR6 needs at least one mass function');
  }

  const operands = alignOperands(sources);
  if (sources.length === 1) {
    return first.copy();
  }

  const redistribute = options.conflictHandling !== 'drop';
  const masses = new Map<Subset, number>();
  const focals = operands.focals;
  const chosen: Array<readonly [Subset, number]> = [];
  let dropped = 0;

  const visit = (index: number, intersection: Subset, product: number): void => {
    if (index === focals.length) {
      if (intersection !== EMPTY_SUBSET) {
        addMass(masses, intersection, product);
        return;
      }
      if (!redistribute) {
        dropped += product;
        return;
      }
      let total = 0;
      for (const [, mass] of chosen) total += mass;
      if (total === 0) return;
      for (const [subset, mass] of chosen) {
        addMass(masses, subset, (product * mass) / total);
      }
      return;
    }

    for (const entry of focals[index] ?? []) {
      chosen.push(entry);
      visit(index + 1, intersect(intersection, entry[0]), product * entry[1]);
      chosen.pop();
    }
  };
  visit(0, operands.frame.full, 1);

  if (dropped > 0) {
    logDebug('PCR6 dropped conflicting combinations before renormalizing', { conflict: dropped });
  }

  return MassFunction.fromSubsets(operands.frame, masses, {
    declared: operands.declared,
    ensureNormalized: true,
    config: operands.config,
  });
}
