/**
 * @fileoverview Mass functions (basic belief assignments)
 *
 * A mass function m: 2^Ω → [0,1] assigns belief mass to *sets* of
 * hypotheses rather than to single outcomes. Mass on a set means the
 * evidence supports "one of these" without saying which; mass on Ω is
 * ignorance; mass on ∅ is conflict.
 *
 * ## Key Concepts
 *
 * - **Belief**: Bel(H) = Σ m(A) for ∅ ≠ A ⊆ H. Lower bound on support for H.
 * - **Plausibility**: Pl(H) = Σ m(A) for A ∩ H ≠ ∅. Upper bound.
 * - **Commonality**: Q(H) = Σ m(A) for H ⊆ A. The domain of the
 *   canonical decomposition.
 *
 * ## Construction
 *
 * There are two named ways in, and they differ on purpose:
 *
 * - {@link createMassFunction} validates the input, merges equivalent keys
 *   and normalizes: m(∅) is dropped and the rest sums to 1.
 * - {@link createRawMassFunction} validates and merges but keeps the
 *   masses as given, ∅ included. This is the transient, unnormalized state
 *   that combination rules produce before handling conflict.
 *
 * Instances never change after construction. Rules and discounting
 * operators return new instances.
 *
 * ## References
 *
 * - Shafer, G. (1976) "A Mathematical Theory of Evidence"
 * - Smets, P. (1990) "The Combination of Evidence in the Transferable Belief Model"
 *
 * @packageDocumentation
 */

import { configOf, type ConfigOptions, type EngineConfig } from '../config/engine_config.js';
import { TotalConflictError, ValidationError } from './errors.js';
import { Frame, toFrame, type FrameInput } from './frame.js';
import {
  cardinality,
  EMPTY_SUBSET,
  formatFocalSet,
  intersects,
  isFocalSetText,
  isSubsetOf,
  parseFocalSet,
  type Subset,
} from './subset.js';
import { entriesOf, isIterable, type KeyedInput } from '../utils/entries.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * A focal set as supplied by callers: either the interchange text form
 * (`"{A,B}"`), a single label (`"A"`), or a collection of labels.
 */
export type FocalKey = string | Iterable<string>;

/** A hypothesis for queries: a {@link FocalKey} or a canonical subset. */
export type Hypothesis = FocalKey | Subset;

export type MassEntry = readonly [FocalKey, number];

/**
 * Raw masses. Records are keyed by focal set text (or single labels);
 * iterables and Maps may use label collections as keys.
 *
 * @example
 * ```typescript
 * { '{a}': 0.6, '{a,b}': 0.4 }
 * new Map([[['a'], 0.6], [['a', 'b'], 0.4]])
 * ```
 */
export type MassInput = Readonly<Record<string, number>> | Iterable<MassEntry>;

export interface MassFunctionOptions extends ConfigOptions {
  /** Declared frame. When absent the frame is inferred from the focal sets. */
  readonly frame?: FrameInput;
}

export interface FromSubsetsOptions extends ConfigOptions {
  /** Whether `frame` was declared by the caller rather than inferred. */
  readonly declared: boolean;
  /** Normalize when the masses carry ∅ or do not sum to 1. */
  readonly ensureNormalized?: boolean;
}

/** A focal element with its labels, canonical subset and mass. */
export interface FocalElement {
  readonly labels: readonly string[];
  readonly subset: Subset;
  readonly mass: number;
}

// ============================================================================
// MASS FUNCTION
// ============================================================================

export class MassFunction {
  private constructor(
    /** The frame: declared by the caller, or the union of the focal sets. */
    readonly frame: Frame,
    /** True when the frame was supplied explicitly rather than inferred. */
    readonly hasDeclaredFrame: boolean,
    private readonly masses: ReadonlyMap<Subset, number>,
    private readonly config: EngineConfig
  ) {}

  /**
   * Builds a mass function from canonical subsets of `frame`.
   *
   * Duplicate subsets are summed, masses at or below the prune epsilon are
   * dropped and floating-point negatives within tolerance are clamped.
   *
   * @throws ValidationError for non-finite or clearly negative masses, or
   *   subsets outside the frame
   * @throws TotalConflictError if normalization leaves no mass
   */
  static fromSubsets(
    frame: Frame,
    entries: Iterable<readonly [Subset, number]>,
    options: FromSubsetsOptions
  ): MassFunction {
    const config = configOf(options);
    const merged = new Map<Subset, number>();

    for (const [subset, mass] of entries) {
      if (!frame.contains(subset)) {
        throw new ValidationError(`Subset mask ${subset} is outside frame ${frame.toString()}`);
      }
      if (!Number.isFinite(mass)) {
        throw new ValidationError(`Mass for ${frame.format(subset)} must be finite, got ${mass}`);
      }
      if (mass < -config.negativeClampTolerance) {
        throw new ValidationError(`Mass for ${frame.format(subset)} must be non-negative, got ${mass}`);
      }
      merged.set(subset, (merged.get(subset) ?? 0) + mass);
    }

    const pruned = new Map<Subset, number>();
    for (const [subset, mass] of merged) {
      if (mass > config.pruneEpsilon) pruned.set(subset, mass);
    }

    const result = new MassFunction(frame, options.declared, pruned, config);
    if (options.ensureNormalized && (result.conflict > 0 || !result.isNormalized())) {
      return result.normalize();
    }
    return result;
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  /** Number of focal elements. */
  get size(): number {
    return this.masses.size;
  }

  /** Sum of all stored masses. */
  get total(): number {
    let sum = 0;
    for (const mass of this.masses.values()) sum += mass;
    return sum;
  }

  /** Conflict mass K = m(∅). */
  get conflict(): number {
    return this.masses.get(EMPTY_SUBSET) ?? 0;
  }

  /** The engine configuration this instance was built with. */
  get engineConfig(): EngineConfig {
    return this.config;
  }

  /** Resolves a hypothesis to a subset of this mass function's frame. */
  subsetOf(hypothesis: Hypothesis): Subset {
    if (typeof hypothesis === 'number') {
      if (!Number.isInteger(hypothesis) || !this.frame.contains(hypothesis)) {
        throw new ValidationError(`Subset mask ${hypothesis} is outside frame ${this.frame.toString()}`);
      }
      return hypothesis;
    }
    return this.frame.toSubset(labelsOfKey(hypothesis));
  }

  /** m(H); 0 for sets that are not focal. */
  mass(hypothesis: Hypothesis): number {
    return this.masses.get(this.subsetOf(hypothesis)) ?? 0;
  }

  /** Canonical (subset, mass) pairs, in insertion order. */
  entries(): IterableIterator<[Subset, number]> {
    return this.masses.entries();
  }

  focalElements(): FocalElement[] {
    return this.sortedSubsets().map((subset) => ({
      labels: this.frame.labelsOf(subset),
      subset,
      mass: this.masses.get(subset) ?? 0,
    }));
  }

  isNormalized(tolerance: number = this.config.tolerance): boolean {
    return Math.abs(this.total - 1) < tolerance;
  }

  // --------------------------------------------------------------------------
  // Measures
  // --------------------------------------------------------------------------

  /**
   * Bel(H) = Σ m(A) over focal A with ∅ ≠ A ⊆ H.
   *
   * Conflict mass is never counted, so Bel(∅) = 0 and Bel(H) ≤ Pl(H) also
   * hold for unnormalized functions; there Bel(Ω) = Pl(Ω) = 1 - m(∅).
   * Only the stored focal elements are visited.
   */
  belief(hypothesis: Hypothesis): number {
    const target = this.subsetOf(hypothesis);
    let bel = 0;
    for (const [subset, mass] of this.masses) {
      if (subset !== EMPTY_SUBSET && isSubsetOf(subset, target)) bel += mass;
    }
    return bel;
  }

  /** Pl(H) = Σ m(A) over focal A with A ∩ H ≠ ∅. */
  plausibility(hypothesis: Hypothesis): number {
    const target = this.subsetOf(hypothesis);
    let pl = 0;
    for (const [subset, mass] of this.masses) {
      if (intersects(subset, target)) pl += mass;
    }
    return pl;
  }

  /** Q(H) = Σ m(A) over focal A ⊇ H. */
  commonality(hypothesis: Hypothesis): number {
    const target = this.subsetOf(hypothesis);
    let q = 0;
    for (const [subset, mass] of this.masses) {
      if (isSubsetOf(target, subset)) q += mass;
    }
    return q;
  }

  /**
   * The belief interval [Bel(H), Pl(H)]. Its width is the part of the
   * evidence that neither supports nor refutes H.
   */
  beliefInterval(hypothesis: Hypothesis): [number, number] {
    return [this.belief(hypothesis), this.plausibility(hypothesis)];
  }

  /**
   * Pignistic probability BetP(x) = Σ_{A ∋ x} m(A) / |A|, divided by
   * 1 - m(∅) when the function carries conflict.
   */
  pignisticProbability(label: string): number {
    const element = this.frame.toSubset([label]);
    let prob = 0;
    for (const [subset, mass] of this.masses) {
      if (intersects(subset, element)) prob += mass / cardinality(subset);
    }
    const nonConflict = this.total - this.conflict;
    return nonConflict > 0 ? prob / nonConflict : 0;
  }

  /**
   * Specificity: 1 when all mass is on singletons, 0 when all mass is on Ω.
   */
  specificity(): number {
    const n = this.frame.size;
    if (n <= 1) return 1;

    let specificity = 0;
    for (const [subset, mass] of this.masses) {
      specificity += (mass * (n - cardinality(subset))) / (n - 1);
    }
    return specificity;
  }

  /**
   * Non-specificity (Hartley measure): Σ m(A) · log2|A| over |A| > 1.
   */
  nonSpecificity(): number {
    let ns = 0;
    for (const [subset, mass] of this.masses) {
      const size = cardinality(subset);
      if (size > 1) ns += mass * Math.log2(size);
    }
    return ns;
  }

  // --------------------------------------------------------------------------
  // Derived instances
  // --------------------------------------------------------------------------

  /**
   * Drops the conflict mass m(∅) without redistributing it and rescales
   * the rest to sum to 1.
   *
   * @throws TotalConflictError if nothing but conflict is left
   */
  normalize(): MassFunction {
    const remaining = [...this.masses].filter(([subset]) => subset !== EMPTY_SUBSET);
    if (remaining.length === 0) {
      throw new TotalConflictError(this.conflict);
    }

    let total = 0;
    for (const [, mass] of remaining) total += mass;

    return new MassFunction(
      this.frame,
      this.hasDeclaredFrame,
      new Map(remaining.map(([subset, mass]) => [subset, mass / total])),
      this.config
    );
  }

  /**
   * Rescales every mass, conflict included, so the total is 1. Unlike
   * {@link normalize} this keeps m(∅).
   *
   * @throws ValidationError if there is no mass to rescale
   */
  rescale(): MassFunction {
    const total = this.total;
    if (total <= 0) {
      throw new ValidationError('Cannot rescale a mass function without mass');
    }
    return new MassFunction(
      this.frame,
      this.hasDeclaredFrame,
      new Map([...this.masses].map(([subset, mass]) => [subset, mass / total])),
      this.config
    );
  }

  copy(): MassFunction {
    return new MassFunction(this.frame, this.hasDeclaredFrame, new Map(this.masses), this.config);
  }

  /**
   * Re-expresses this mass function over a declared frame containing all
   * of its focal elements.
   *
   * @throws ValidationError if a focal element has a label outside `frame`
   */
  withFrame(frame: FrameInput): MassFunction {
    const target = toFrame(frame, { config: this.config });
    return MassFunction.fromSubsets(
      target,
      [...this.masses].map(([subset, mass]) => [this.frame.translate(subset, target), mass] as const),
      { declared: true, config: this.config }
    );
  }

  // --------------------------------------------------------------------------
  // Comparison and serialization
  // --------------------------------------------------------------------------

  /**
   * Compares focal sets by their labels, so mass functions over different
   * (inferred) frames can be compared.
   */
  equals(other: MassFunction, tolerance = 1e-9): boolean {
    const mine = this.toRecord();
    const theirs = other.toRecord();
    const keys = new Set([...Object.keys(mine), ...Object.keys(theirs)]);
    for (const key of keys) {
      if (Math.abs((mine[key] ?? 0) - (theirs[key] ?? 0)) > tolerance) return false;
    }
    return true;
  }

  /**
   * Masses keyed by the interchange text form, ordered by cardinality and
   * then by text.
   */
  toRecord(): Record<string, number> {
    const record: Record<string, number> = {};
    for (const subset of this.sortedSubsets()) {
      record[this.frame.format(subset)] = this.masses.get(subset) ?? 0;
    }
    return record;
  }

  toJSON(): Record<string, number> {
    return this.toRecord();
  }

  toString(): string {
    const parts = this.sortedSubsets().map(
      (subset) => `${this.frame.format(subset)}: ${(this.masses.get(subset) ?? 0).toFixed(4)}`
    );
    return `{${parts.join(', ')}}`;
  }

  private sortedSubsets(): Subset[] {
    return [...this.masses.keys()].sort((a, b) => {
      const bySize = cardinality(a) - cardinality(b);
      if (bySize !== 0) return bySize;
      const left = this.frame.format(a);
      const right = this.frame.format(b);
      return left < right ? -1 : left > right ? 1 : 0;
    });
  }
}

// ============================================================================
// CONSTRUCTION
// ============================================================================

/**
 * Creates a validated, normalized mass function.
 *
 * Keys naming the same set are merged by summation and masses at or below
 * the prune epsilon are dropped. Conflict mass on ∅ is removed and the
 * rest rescaled to sum to 1; use {@link createRawMassFunction} to keep it.
 *
 * @throws ValidationError for negative, NaN or infinite masses, labels
 *   outside a declared frame, or input without any mass above the prune
 *   epsilon
 * @throws TotalConflictError if the only positive mass is on ∅
 *
 * @example
 * ```typescript
 * const m = createMassFunction({ '{a}': 0.4, '{b}': 0.2, '{a,b}': 0.4 });
 * m.belief(['a']);        // 0.4
 * m.plausibility(['a']);  // 0.8
 * ```
 */
export function createMassFunction(input: MassInput, options: MassFunctionOptions = {}): MassFunction {
  const { frame, declared, entries } = resolveInput(input, options);
  const raw = MassFunction.fromSubsets(frame, entries, { declared, config: options.config });
  if (raw.size === 0) {
    throw new ValidationError('Mass function needs at least one positive mass');
  }
  return raw.conflict > 0 || !raw.isNormalized() ? raw.normalize() : raw;
}

/**
 * Creates a validated mass function without normalizing it. Conflict mass
 * on ∅ and totals other than 1 are preserved.
 */
export function createRawMassFunction(input: MassInput, options: MassFunctionOptions = {}): MassFunction {
  const { frame, declared, entries } = resolveInput(input, options);
  return MassFunction.fromSubsets(frame, entries, { declared, config: options.config });
}

/**
 * The vacuous mass function {Ω: 1}: complete ignorance. Neutral element of
 * the conjunctive rule, absorbing element of the disjunctive rule.
 */
export function createVacuousMassFunction(frame: FrameInput, options: ConfigOptions = {}): MassFunction {
  const resolved = toFrame(frame, options);
  return MassFunction.fromSubsets(resolved, [[resolved.full, 1]], {
    declared: true,
    config: options.config,
  });
}

/**
 * A Bayesian mass function: every focal element is a singleton, so belief
 * and plausibility coincide with the given probabilities.
 */
export function createBayesianMassFunction(
  frame: FrameInput,
  probabilities: KeyedInput<string, number>,
  options: ConfigOptions = {}
): MassFunction {
  return createMassFunction(
    entriesOf(probabilities).map(([label, probability]): MassEntry => [[label], probability]),
    { frame, config: options.config }
  );
}

function labelsOfKey(key: FocalKey): string[] {
  if (typeof key === 'string') {
    return isFocalSetText(key) ? parseFocalSet(key) : [key];
  }
  return [...key];
}

function resolveInput(
  input: MassInput,
  options: MassFunctionOptions
): { frame: Frame; declared: boolean; entries: Array<[Subset, number]> } {
  const pairs: Array<readonly [FocalKey, number]> = isIterable<MassEntry>(input)
    ? [...input]
    : Object.entries(input);

  const labelled = pairs.map(([key, mass]) => {
    if (typeof mass !== 'number' || Number.isNaN(mass)) {
      throw new ValidationError(`Mass for ${describeKey(key)} must be a number, got ${String(mass)}`);
    }
    if (!Number.isFinite(mass)) {
      throw new ValidationError(`Mass for ${describeKey(key)} must be finite, got ${mass}`);
    }
    if (mass < 0) {
      throw new ValidationError(`Mass for ${describeKey(key)} must be non-negative, got ${mass}`);
    }
    return { labels: labelsOfKey(key), mass };
  });

  const declared = options.frame !== undefined;
  const frame = options.frame !== undefined
    ? toFrame(options.frame, options)
    : new Frame(labelled.flatMap(({ labels }) => labels), options);

  return {
    frame,
    declared,
    entries: labelled.map(({ labels, mass }) => [frame.toSubset(labels), mass]),
  };
}

function describeKey(key: FocalKey): string {
  return typeof key === 'string' ? `"${key}"` : formatFocalSet(key);
}
