/**
 * @fileoverview Conjunctive and disjunctive combination
 *
 * The conjunctive rule assumes both sources are reliable: for each pair of
 * focal sets the product of their masses goes to the intersection. Mass
 * landing on ∅ is the conflict K. Dempster's rule is the conjunctive rule
 * followed by normalization (drop K, rescale by 1/(1-K)).
 *
 * The disjunctive rule assumes at least one source is reliable and sends
 * each product to the union instead. It never produces conflict.
 *
 * ## Key Properties
 *
 * - Both rules are commutative and associative.
 * - The vacuous mass function {Ω: 1} is neutral for the conjunctive rule
 *   and absorbing for the disjunctive rule.
 * - High conflict (K close to 1) makes Dempster's normalization produce
 *   counter-intuitive results (Zadeh's example); see the rules in
 *   `advanced.ts` and `pcr.ts` for alternatives.
 *
 * @packageDocumentation
 */

import { TotalConflictError, ValidationError } from '../core/errors.js';
import type { MassFunction } from '../core/mass_function.js';
import { EMPTY_SUBSET, intersect, union } from '../core/subset.js';
import { logDebug } from '../telemetry/logger.js';
import { addMass, alignPair, buildResult } from './operands.js';

// ============================================================================
// TYPES
// ============================================================================

/** A binary combination rule. */
export type CombinationRule = (m1: MassFunction, m2: MassFunction) => MassFunction;

export interface ConjunctiveOptions {
  /** Remove the conflict mass and rescale. Defaults to true (Dempster's rule). */
  readonly normalize?: boolean;
}

/**
 * Result of Dempster's rule with the conflict that was normalized away.
 */
export interface CombinationResult {
  /** Combined, normalized mass function */
  combined: MassFunction;

  /** Conflict mass K before normalization */
  conflict: number;

  /** Whether normalization changed anything (K > 0) */
  normalized: boolean;
}

// ============================================================================
// CONJUNCTIVE
// ============================================================================

/**
 * Conjunctive combination: m(C) = Σ_{A∩B=C} m1(A)·m2(B).
 *
 * With `normalize: false` the conflict stays on ∅; this unnormalized form
 * is what the conflict-redistributing rules start from.
 *
 * @throws TotalConflictError when normalizing and the sources fully
 *   contradict each other (K = 1)
 * @throws FrameMismatchError if both operands declare different frames
 *
 * @example
 * ```typescript
 * const m1 = createMassFunction({ '{a}': 0.4, '{b}': 0.2, '{a,b}': 0.4 });
 * const m2 = createMassFunction({ '{a}': 0.2, '{b}': 0.6, '{a,b}': 0.2 });
 * combineConjunctive(m1, m2, { normalize: false }).toRecord();
 * // { '{}': 0.28, '{a}': 0.24, '{b}': 0.4, '{a,b}': 0.08 }
 * ```
 */
export function combineConjunctive(
  m1: MassFunction,
  m2: MassFunction,
  options: ConjunctiveOptions = {}
): MassFunction {
  const operands = alignPair(m1, m2);
  const combined = new Map<number, number>();

  for (const [a, massA] of operands.left) {
    for (const [b, massB] of operands.right) {
      addMass(combined, intersect(a, b), massA * massB);
    }
  }

  const raw = buildResult(operands, combined);
  if (options.normalize === false) return raw;

  const conflict = combined.get(EMPTY_SUBSET) ?? 0;
  if (Math.abs(1 - conflict) < operands.config.tolerance) {
    throw new TotalConflictError(conflict);
  }
  return raw.normalize();
}

/**
 * Conflict mass K = Σ_{A∩B=∅} m1(A)·m2(B) between two sources.
 */
export function conflictBetween(m1: MassFunction, m2: MassFunction): number {
  const operands = alignPair(m1, m2);
  let conflict = 0;
  for (const [a, massA] of operands.left) {
    for (const [b, massB] of operands.right) {
      if (intersect(a, b) === EMPTY_SUBSET) conflict += massA * massB;
    }
  }
  return conflict;
}

/**
 * Dempster's rule, reporting the conflict it normalized away.
 *
 * @throws TotalConflictError if K = 1
 */
export function combineDempster(m1: MassFunction, m2: MassFunction): CombinationResult {
  const raw = combineConjunctive(m1, m2, { normalize: false });
  const conflict = raw.conflict;

  if (Math.abs(1 - conflict) < raw.engineConfig.tolerance) {
    throw new TotalConflictError(conflict);
  }
  if (conflict > 0) {
    logDebug('Dempster combination normalized conflict', { conflict });
  }

  return {
    combined: conflict > 0 ? raw.normalize() : raw,
    conflict,
    normalized: conflict > 0,
  };
}

// ============================================================================
// DISJUNCTIVE
// ============================================================================

/**
 * Disjunctive combination: m(C) = Σ_{A∪B=C} m1(A)·m2(B).
 */
export function combineDisjunctive(m1: MassFunction, m2: MassFunction): MassFunction {
  const operands = alignPair(m1, m2);
  const combined = new Map<number, number>();

  for (const [a, massA] of operands.left) {
    for (const [b, massB] of operands.right) {
      addMass(combined, union(a, b), massA * massB);
    }
  }

  return buildResult(operands, combined);
}

// ============================================================================
// N-ARY
// ============================================================================

/**
 * Left fold of `rule` over the sources, in the order given:
 * rule(rule(rule(m1, m2), m3), ...). The order matters for rules that are
 * not associative (PCR5, cautious, bold).
 *
 * @throws ValidationError if `sources` is empty
 */
export function combineMultiple(
  sources: readonly MassFunction[],
  rule: CombinationRule = combineConjunctive
): MassFunction {
  const [first, ...rest] = sources;
  if (first === undefined) {
    throw new ValidationError('Cannot combine an empty list of mass functions');
  }
  if (rest.length === 0) return first.copy();

  return rest.reduce((acc, source) => rule(acc, source), first);
}
