/**
 * @fileoverview Conflict-redistributing combination rules
 *
 * Yager, Dubois-Prade and Zhang all start from the unnormalized
 * conjunctive combination and differ only in where the conflict mass
 * K = m(∅) ends up:
 *
 * - **Yager**: K goes to Ω. Conflict is read as ignorance.
 * - **Dubois-Prade**: each conflicting product m1(A)·m2(B) goes to A∪B,
 *   the most specific set both sources are consistent with.
 * - **Zhang**: K is shared among the non-Ω focal sets of the combination.
 *
 * On a two-element frame Yager and Dubois-Prade agree (every union of
 * disjoint non-empty sets is Ω); on larger frames they diverge.
 *
 * ## References
 *
 * - Yager, R. R. (1987) "On the Dempster-Shafer Framework and New Combination Rules"
 * - Dubois, D. & Prade, H. (1988) "Representation and Combination of Uncertainty
 *   with Belief Functions and Possibility Measures"
 * - Zhang, L. (1994) "Representation, Independence, and Combination of Evidence
 *   in the Dempster-Shafer Theory"
 *
 * @packageDocumentation
 */

import { MassFunction } from '../core/mass_function.js';
import { cardinality, EMPTY_SUBSET, intersect, intersects, union, type Subset } from '../core/subset.js';
import { combineConjunctive } from './basic.js';
import { addMass, alignPair, type FocalList } from './operands.js';

/**
 * Yager's rule: the conflict K is moved onto Ω.
 *
 * m(A) = Σ_{B∩C=A} m1(B)·m2(C) for A ≠ ∅, A ≠ Ω;
 * m(Ω) = m1(Ω)·m2(Ω) + K.
 *
 * @example
 * ```typescript
 * const m3 = createMassFunction({ '{a}': 0.8, '{b}': 0.2 });
 * const m4 = createMassFunction({ '{a}': 0.1, '{b}': 0.9 });
 * combineYager(m3, m4).toRecord();
 * // { '{a}': 0.08, '{b}': 0.18, '{a,b}': 0.74 }
 * ```
 */
export function combineYager(m1: MassFunction, m2: MassFunction): MassFunction {
  const raw = combineConjunctive(m1, m2, { normalize: false });
  const frame = raw.frame;
  const masses = new Map<Subset, number>();

  for (const [subset, mass] of raw.entries()) {
    if (subset !== EMPTY_SUBSET) addMass(masses, subset, mass);
  }
  addMass(masses, frame.full, raw.conflict);

  return MassFunction.fromSubsets(frame, masses, {
    declared: raw.hasDeclaredFrame,
    config: raw.engineConfig,
  });
}

/**
 * Dubois and Prade's rule: each conflicting product goes to the union of
 * the two focal sets.
 *
 * m(A) = Σ_{B∩C=A} m1(B)·m2(C) + Σ_{B∩C=∅, B∪C=A} m1(B)·m2(C)
 */
export function combineDuboisPrade(m1: MassFunction, m2: MassFunction): MassFunction {
  const operands = alignPair(m1, m2);
  const masses = new Map<Subset, number>();

  for (const [a, massA] of operands.left) {
    for (const [b, massB] of operands.right) {
      const target = intersects(a, b) ? intersect(a, b) : union(a, b);
      addMass(masses, target, massA * massB);
    }
  }

  return MassFunction.fromSubsets(operands.frame, masses, {
    declared: operands.declared,
    ensureNormalized: true,
    config: operands.config,
  });
}

// ============================================================================
// ZHANG
// ============================================================================

export type ZhangRedistribution = 'plausibility' | 'center';

export interface ZhangOptions {
  /**
   * - `plausibility` (default): K is added to every non-Ω focal set H of
   *   the conjunctive result that is focal in a source with positive
   *   plausibility there; the result is then renormalized.
   * - `center`: Zhang's measure-of-intersection weighting
   *   m(A) ∝ Σ_{B∩C=A} m1(B)·m2(C)·|A| / (|B|·|C|).
   */
  readonly redistribution?: ZhangRedistribution;
}

/**
 * Zhang's rule.
 *
 * With the default `plausibility` redistribution each qualifying set
 * absorbs the whole conflict K before renormalization, so K is shared
 * equally in absolute terms among them.
 *
 * @throws TotalConflictError if no non-conflict mass remains to renormalize
 */
export function combineZhang(m1: MassFunction, m2: MassFunction, options: ZhangOptions = {}): MassFunction {
  return options.redistribution === 'center' ? combineZhangCenter(m1, m2) : combineZhangPlausibility(m1, m2);
}

function combineZhangPlausibility(m1: MassFunction, m2: MassFunction): MassFunction {
  const operands = alignPair(m1, m2);
  const raw = combineConjunctive(m1, m2, { normalize: false });
  const conflict = raw.conflict;
  const full = operands.frame.full;

  const masses = new Map<Subset, number>();
  for (const [subset, mass] of raw.entries()) {
    if (subset === EMPTY_SUBSET) continue;
    let redistributed = mass;
    if (subset !== full) {
      const weight = focalPlausibility(operands.left, subset) + focalPlausibility(operands.right, subset);
      if (weight > 0) redistributed += conflict;
    }
    masses.set(subset, redistributed);
  }

  return MassFunction.fromSubsets(operands.frame, masses, {
    declared: operands.declared,
    ensureNormalized: true,
    config: operands.config,
  });
}

function combineZhangCenter(m1: MassFunction, m2: MassFunction): MassFunction {
  const operands = alignPair(m1, m2);
  const masses = new Map<Subset, number>();

  for (const [a, massA] of operands.left) {
    for (const [b, massB] of operands.right) {
      const target = intersect(a, b);
      if (target === EMPTY_SUBSET) continue;
      const ratio = cardinality(target) / (cardinality(a) * cardinality(b));
      addMass(masses, target, massA * massB * ratio);
    }
  }

  return MassFunction.fromSubsets(operands.frame, masses, {
    declared: operands.declared,
    ensureNormalized: true,
    config: operands.config,
  });
}

/**
 * Plausibility of `subset` under a source, counted only when `subset` is
 * itself one of that source's focal sets.
 */
function focalPlausibility(focals: FocalList, subset: Subset): number {
  if (!focals.some(([focal]) => focal === subset)) return 0;
  let pl = 0;
  for (const [focal, mass] of focals) {
    if (intersects(focal, subset)) pl += mass;
  }
  return pl;
}
