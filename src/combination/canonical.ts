/**
 * @fileoverview Canonical decomposition and the cautious and bold rules
 *
 * A non-dogmatic mass function (m(∅) = 0 and m(Ω) > 0) is the conjunctive
 * combination of simple support functions A^w(A), one per A ⊊ Ω, each
 * putting 1 - w(A) on A and w(A) on Ω. The weights come from the
 * commonality function by Möbius inversion over the subset lattice:
 *
 *   ln w(A) = -Σ_{B ⊇ A} (-1)^{|B|-|A|} ln q(B)
 *
 * Weights may exceed 1 for mass functions that are not separable.
 *
 * The cautious rule takes the pointwise minimum of the weights of both
 * operands and the bold rule the pointwise maximum. Both are idempotent,
 * which makes them suitable for combining sources that are not
 * independent.
 *
 * Every function here enumerates all 2^|Ω| subsets, so frames larger than
 * `maxPowersetFrameSize` are rejected.
 *
 * ## References
 *
 * - Denœux, T. (2008) "Conjunctive and disjunctive combination of belief
 *   functions induced by nondistinct bodies of evidence"
 * - Smets, P. (1995) "The canonical decomposition of a weighted belief"
 *
 * @packageDocumentation
 */

import { configOf, type ConfigOptions, type EngineConfig } from '../config/engine_config.js';
import { DogmaticInputError, ValidationError } from '../core/errors.js';
import type { Frame } from '../core/frame.js';
import { assertPowersetSize, denseVector, supersetMobius, supersetZeta } from '../core/lattice.js';
import { MassFunction } from '../core/mass_function.js';
import { EMPTY_SUBSET, type Subset } from '../core/subset.js';
import { logWarning } from '../telemetry/logger.js';
import { alignPair, type FocalList } from './operands.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Conjunctive weights of a mass function, for every A ⊊ Ω.
 */
export interface WeightFunction {
  readonly frame: Frame;
  /** Whether the mass function the weights came from had a declared frame. */
  readonly declared: boolean;
  /** w(A) for every proper subset A of the frame; absent subsets weigh 1. */
  readonly weights: ReadonlyMap<Subset, number>;
}

/** One simple support function A^w of the canonical decomposition. */
export interface SimpleSupportFunction {
  readonly labels: readonly string[];
  readonly subset: Subset;
  readonly weight: number;
}

export interface ReconstructionOptions extends ConfigOptions {
  /** Remove conflict mass and rescale the result. Defaults to true. */
  readonly normalize?: boolean;
}

// ============================================================================
// COMMONALITY AND WEIGHTS
// ============================================================================

/**
 * Commonality q(A) = Σ_{B ⊇ A} m(B) for every subset of the frame, ∅ and Ω
 * included.
 */
export function commonalityFunction(m: MassFunction): Map<Subset, number> {
  assertPowersetSize(m.frame, m.engineConfig, 'Commonality function');
  const q = supersetZeta(denseMass(m.frame, [...m.entries()]), m.frame.size);
  return toSparse(q, () => true);
}

/**
 * Conjunctive weight function of a non-dogmatic mass function.
 *
 * @throws DogmaticInputError if m(∅) > 0 or m(Ω) = 0
 * @throws ValidationError if the frame is too large
 */
export function weightFunction(m: MassFunction): WeightFunction {
  const weights = denseWeights(m.frame, [...m.entries()], m.engineConfig);
  const full = m.frame.full;
  return {
    frame: m.frame,
    declared: m.hasDeclaredFrame,
    weights: toSparse(weights, (subset) => subset !== full),
  };
}

/**
 * The simple support functions whose weight differs from 1, ordered by
 * subset mask.
 *
 * @throws DogmaticInputError if m(∅) > 0 or m(Ω) = 0
 */
export function canonicalDecomposition(m: MassFunction): SimpleSupportFunction[] {
  const { weights } = weightFunction(m);
  const tolerance = m.engineConfig.tolerance;
  const components: SimpleSupportFunction[] = [];

  for (const [subset, weight] of [...weights].sort(([a], [b]) => a - b)) {
    if (Math.abs(weight - 1) <= tolerance) continue;
    components.push({ labels: m.frame.labelsOf(subset), subset, weight });
  }
  return components;
}

/**
 * Rebuilds the mass function ∩_{A ⊊ Ω} A^w(A) from its weights.
 *
 * Tiny negative masses from floating-point error are clamped to zero;
 * larger negatives (weights that describe no valid mass function) are
 * clamped with a warning.
 *
 * @throws TotalConflictError when normalizing a result that is all conflict
 */
export function massFromWeights(weightFn: WeightFunction, options: ReconstructionOptions = {}): MassFunction {
  const config = configOf(options);
  assertPowersetSize(weightFn.frame, config, 'Mass reconstruction');

  const dense = denseVector(weightFn.frame);
  dense.fill(1);
  for (const [subset, weight] of weightFn.weights) {
    if (subset !== weightFn.frame.full) dense[subset] = weight;
  }

  return reconstruct(weightFn.frame, weightFn.declared, dense, {
    normalize: options.normalize,
    config,
  });
}

// ============================================================================
// CAUTIOUS AND BOLD RULES
// ============================================================================

/**
 * Cautious conjunctive rule: w12(A) = min(w1(A), w2(A)).
 *
 * @throws DogmaticInputError if either operand is dogmatic on its own frame
 * @throws ValidationError if an operand's inferred frame is widened to the
 *   union frame and so loses its mass on Ω
 */
export function combineCautious(
  m1: MassFunction,
  m2: MassFunction,
  options: { readonly normalize?: boolean } = {}
): MassFunction {
  return combineWeights(m1, m2, Math.min, options.normalize);
}

/**
 * Bold rule over conjunctive weights: w12(A) = max(w1(A), w2(A)).
 *
 * Denœux's bold disjunctive rule works on disjunctive weights, which are
 * undefined for normalized mass functions (they need m(∅) > 0). Taking the
 * maximum of the conjunctive weights keeps the rule idempotent and defined
 * on the same inputs as the cautious rule.
 *
 * @throws DogmaticInputError if either operand is dogmatic on its own frame
 * @throws ValidationError if an operand's inferred frame is widened to the
 *   union frame and so loses its mass on Ω
 */
export function combineBold(
  m1: MassFunction,
  m2: MassFunction,
  options: { readonly normalize?: boolean } = {}
): MassFunction {
  return combineWeights(m1, m2, Math.max, options.normalize);
}

function combineWeights(
  m1: MassFunction,
  m2: MassFunction,
  pick: (a: number, b: number) => number,
  normalize: boolean | undefined
): MassFunction {
  const operands = alignPair(m1, m2);
  assertKeepsFrameMass(m1, operands.left, operands.frame);
  assertKeepsFrameMass(m2, operands.right, operands.frame);
  const w1 = denseWeights(operands.frame, operands.left, operands.config);
  const w2 = denseWeights(operands.frame, operands.right, operands.config);
  const combined = w1.map((value, subset) => pick(value, w2[subset] ?? 1));

  return reconstruct(operands.frame, operands.declared, combined, {
    normalize,
    config: operands.config,
  });
}

/**
 * An operand with mass on its own Ω has none on a strictly larger union
 * frame. That is a consequence of frame inference, not of the evidence.
 */
function assertKeepsFrameMass(source: MassFunction, focals: FocalList, frame: Frame): void {
  if (source.frame.equals(frame) || source.conflict > 0 || source.mass(source.frame.full) === 0) return;
  if (!focals.some(([subset]) => subset === frame.full)) {
    throw new ValidationError(
      `Widening frame ${source.frame.toString()} to ${frame.toString()} leaves no mass on the combined frame; ` +
        'declare a common frame for both operands'
    );
  }
}

// ============================================================================
// DENSE TRANSFORMS
// ============================================================================

function denseMass(frame: Frame, focals: FocalList): Float64Array {
  const dense = denseVector(frame);
  for (const [subset, mass] of focals) {
    dense[subset] = (dense[subset] ?? 0) + mass;
  }
  return dense;
}

/**
 * Weights for every subset; the slot for Ω holds 1 and is never read.
 */
function denseWeights(frame: Frame, focals: FocalList, config: EngineConfig): Float64Array {
  assertPowersetSize(frame, config, 'Weight function');

  const conflict = focals.find(([subset]) => subset === EMPTY_SUBSET)?.[1] ?? 0;
  if (conflict > 0) {
    throw new DogmaticInputError('conflict_mass', conflict);
  }
  if (!focals.some(([subset]) => subset === frame.full)) {
    throw new DogmaticInputError('no_frame_mass', 0);
  }

  const mass = denseMass(frame, focals);
  let total = 0;
  for (const value of mass) total += value;

  // q(A) ≥ m(Ω) > 0 for every A, so the logarithm is defined everywhere.
  const logQ = supersetZeta(mass.map((value) => value / total), frame.size).map(Math.log);
  const weights = supersetMobius(logQ, frame.size).map((value) => Math.exp(-value));
  weights[frame.full] = 1;
  return weights;
}

function reconstruct(
  frame: Frame,
  declared: boolean,
  weights: Float64Array,
  options: ReconstructionOptions
): MassFunction {
  const config = configOf(options);
  const full = frame.full;

  // f = Möbius(ln q): -ln w(A) below Ω, and ln q(Ω) = Σ ln w(A) so that q(∅) = 1.
  const logQ = weights.map((weight) => -Math.log(weight));
  let logFull = 0;
  for (let subset = 0; subset < full; subset++) logFull += Math.log(weights[subset] ?? 1);
  logQ[full] = logFull;

  const q = supersetZeta(logQ, frame.size).map(Math.exp);
  const mass = supersetMobius(q, frame.size);

  const entries: Array<[Subset, number]> = [];
  let clamped = 0;
  mass.forEach((value, subset) => {
    if (value >= 0) {
      entries.push([subset, value]);
    } else if (value < -config.negativeClampTolerance) {
      clamped += value;
    }
  });
  if (clamped < 0) {
    logWarning('Clamped negative masses while reconstructing from weights', {
      frame: frame.toString(),
      clampedMass: clamped,
    });
  }

  const raw = MassFunction.fromSubsets(frame, entries, { declared, config });
  if (options.normalize === false) return raw;
  return raw.conflict > 0 || !raw.isNormalized() ? raw.normalize() : raw;
}

function toSparse(values: Float64Array, keep: (subset: Subset) => boolean): Map<Subset, number> {
  const sparse = new Map<Subset, number>();
  values.forEach((value, subset) => {
    if (keep(subset)) sparse.set(subset, value);
  });
  return sparse;
}
