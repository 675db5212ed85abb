/**
 * @fileoverview Contextual and Θ-contextual discounting
 *
 * Classical discounting trusts a source uniformly. Contextual discounting
 * lets the reliability depend on the true state: a sensor may be reliable
 * when the target is a car and unreliable when it is a truck. Each
 * context carries its own discount rate α, and the discounted mass is
 *
 *   m_α(A) = Σ_{B ⊆ A} G(A, B)·m(B)
 *
 * where the generalization matrix G spreads the mass of B over its
 * supersets. The result is renormalized.
 *
 * - Contextual: contexts are the singletons of Ω,
 *   G(A, B) = Π_{ω ∈ B} (1 - α_ω) · Π_{ω ∈ A∖B} α_ω.
 * - Θ-contextual: contexts are the blocks θ of a partition of Ω,
 *   G(A, B) = Π_{θ ∩ B ≠ ∅} (1 - α_θ) · Π_{θ ∩ B = ∅, θ ∩ A ≠ ∅} α_θ.
 *
 * The matrix has one entry per pair B ⊆ A, i.e. 3^|Ω| entries, so frames
 * larger than `maxPowersetFrameSize` are rejected.
 *
 * ## References
 *
 * - Mercier, D., Quost, B. & Denœux, T. (2005) "Contextual Discounting of
 *   Belief Functions"
 *
 * @packageDocumentation
 */

import { configOf, type ConfigOptions } from '../config/engine_config.js';
import { InvalidPartitionError, ValidationError } from '../core/errors.js';
import { toFrame, type Frame, type FrameInput } from '../core/frame.js';
import { assertPowersetSize } from '../core/lattice.js';
import { MassFunction } from '../core/mass_function.js';
import { EMPTY_SUBSET, intersects, subsetsOf, supersetsOf, type Subset } from '../core/subset.js';
import { logDebug } from '../telemetry/logger.js';
import { entriesOf, type KeyedInput } from '../utils/entries.js';
import { assertRate, vacuousOver } from './classical.js';

// ============================================================================
// TYPES
// ============================================================================

/** Discount rate per frame element. Elements left out have rate 0. */
export type ContextRates = KeyedInput<string, number>;

/** Discount rate for one block of a partition. */
export interface BlockRate {
  readonly block: readonly string[];
  readonly rate: number;
}

/** G(A, B) for every non-empty A and every non-empty B ⊆ A, keyed by A then B. */
export type GeneralizationMatrix = Map<Subset, Map<Subset, number>>;

type Coefficient = (a: Subset, b: Subset) => number;

// ============================================================================
// CONTEXTUAL DISCOUNTING
// ============================================================================

/**
 * @throws ValidationError if a rate names an element outside the frame
 * @throws InvalidReliabilityError if a rate is outside [0, 1]
 */
export function generalizationMatrix(
  frame: FrameInput,
  rates: ContextRates,
  options: ConfigOptions = {}
): GeneralizationMatrix {
  const resolved = toFrame(frame, options);
  assertPowersetSize(resolved, configOf(options), 'Generalization matrix');
  return buildMatrix(resolved, elementCoefficient(resolveElementRates(resolved, rates)));
}

/**
 * Contextual discounting with one rate per element.
 *
 * All rates 0 returns a copy; all rates 1 returns the vacuous mass
 * function. If every focal set lies inside fully discounted contexts no
 * mass survives and the vacuous mass function is returned as well.
 *
 * @throws ValidationError if a rate names an element outside the frame
 * @throws InvalidReliabilityError if a rate is outside [0, 1]
 */
export function discountContextual(m: MassFunction, rates: ContextRates): MassFunction {
  assertPowersetSize(m.frame, m.engineConfig, 'Contextual discounting');
  const elementRates = resolveElementRates(m.frame, rates);

  if (elementRates.every((rate) => rate === 0)) return m.copy();
  if (elementRates.every((rate) => rate === 1)) return vacuousOver(m);

  return applyGeneralization(m, elementCoefficient(elementRates));
}

// ============================================================================
// Θ-CONTEXTUAL DISCOUNTING
// ============================================================================

/**
 * @throws InvalidPartitionError if the blocks are empty, overlap, or do not
 *   cover the frame
 */
export function thetaGeneralizationMatrix(
  frame: FrameInput,
  partition: ReadonlyArray<readonly string[]>,
  rates: readonly BlockRate[],
  options: ConfigOptions = {}
): GeneralizationMatrix {
  const resolved = toFrame(frame, options);
  assertPowersetSize(resolved, configOf(options), 'Generalization matrix');
  const blocks = resolvePartition(resolved, partition);
  return buildMatrix(resolved, blockCoefficient(blocks, resolveBlockRates(resolved, blocks, rates)));
}

/**
 * Θ-contextual discounting with one rate per block of a partition of the
 * frame. Blocks without a rate have rate 0.
 *
 * @throws InvalidPartitionError if the blocks are empty, overlap, or do not
 *   cover the frame
 * @throws ValidationError if a rate names a block that is not in the partition
 * @throws InvalidReliabilityError if a rate is outside [0, 1]
 */
export function discountThetaContextual(
  m: MassFunction,
  partition: ReadonlyArray<readonly string[]>,
  rates: readonly BlockRate[]
): MassFunction {
  assertPowersetSize(m.frame, m.engineConfig, 'Θ-contextual discounting');
  const blocks = resolvePartition(m.frame, partition);
  const blockRates = resolveBlockRates(m.frame, blocks, rates);

  if (blockRates.every((rate) => rate === 0)) return m.copy();
  if (blockRates.every((rate) => rate === 1)) return vacuousOver(m);

  return applyGeneralization(m, blockCoefficient(blocks, blockRates));
}

// ============================================================================
// SHARED
// ============================================================================

function applyGeneralization(m: MassFunction, coefficient: Coefficient): MassFunction {
  const full = m.frame.full;
  const discounted = new Map<Subset, number>();

  for (const [b, mass] of m.entries()) {
    if (b === EMPTY_SUBSET) continue;
    for (const a of supersetsOf(b, full)) {
      const g = coefficient(a, b);
      if (g > 0) discounted.set(a, (discounted.get(a) ?? 0) + g * mass);
    }
  }

  let total = 0;
  for (const value of discounted.values()) total += value;
  if (total <= m.engineConfig.pruneEpsilon) {
    logDebug('Contextual discounting removed all mass; returning vacuous mass function', {
      frame: m.frame.toString(),
    });
    return vacuousOver(m);
  }

  return MassFunction.fromSubsets(
    m.frame,
    [...discounted].map(([subset, value]): [Subset, number] => [subset, value / total]),
    { declared: m.hasDeclaredFrame, config: m.engineConfig }
  );
}

function buildMatrix(frame: Frame, coefficient: Coefficient): GeneralizationMatrix {
  const matrix: GeneralizationMatrix = new Map();
  for (const a of frame.powerset()) {
    if (a === EMPTY_SUBSET) continue;
    const row = new Map<Subset, number>();
    for (const b of subsetsOf(a)) {
      if (b !== EMPTY_SUBSET) row.set(b, coefficient(a, b));
    }
    matrix.set(a, row);
  }
  return matrix;
}

function resolveElementRates(frame: Frame, rates: ContextRates): number[] {
  const resolved = frame.elements.map(() => 0);
  for (const [label, rate] of entriesOf(rates)) {
    const index = frame.elements.indexOf(label);
    if (index < 0) {
      throw new ValidationError(`Element "${label}" is not in frame ${frame.toString()}`);
    }
    assertRate(rate, `element "${label}"`);
    resolved[index] = rate;
  }
  return resolved;
}

function elementCoefficient(rates: readonly number[]): Coefficient {
  return (a, b) => {
    let g = 1;
    rates.forEach((rate, index) => {
      const bit = 1 << index;
      if (b & bit) g *= 1 - rate;
      else if (a & bit) g *= rate;
    });
    return g;
  };
}

function resolvePartition(frame: Frame, partition: ReadonlyArray<readonly string[]>): Subset[] {
  let covered: Subset = EMPTY_SUBSET;
  const blocks = partition.map((block, index) => {
    if (block.length === 0) {
      throw new InvalidPartitionError(`block ${index} is empty`);
    }
    const outside = block.filter((label) => !frame.has(label));
    if (outside.length > 0) {
      throw new InvalidPartitionError(`elements ${outside.join(', ')} are not in frame ${frame.toString()}`);
    }
    const mask = frame.toSubset(block);
    if (intersects(mask, covered)) {
      throw new InvalidPartitionError(`blocks overlap on ${frame.format(mask & covered)}`);
    }
    covered |= mask;
    return mask;
  });

  if (covered !== frame.full) {
    throw new InvalidPartitionError(`elements ${frame.format(frame.full & ~covered)} are not covered`);
  }
  return blocks;
}

function resolveBlockRates(frame: Frame, blocks: readonly Subset[], rates: readonly BlockRate[]): number[] {
  const resolved = blocks.map(() => 0);
  for (const { block, rate } of rates) {
    const index = block.every((label) => frame.has(label)) ? blocks.indexOf(frame.toSubset(block)) : -1;
    if (index < 0) {
      throw new ValidationError(`Block {${block.join(',')}} is not part of the partition`);
    }
    assertRate(rate, `block ${frame.format(blocks[index] ?? EMPTY_SUBSET)}`);
    resolved[index] = rate;
  }
  return resolved;
}

function blockCoefficient(blocks: readonly Subset[], rates: readonly number[]): Coefficient {
  return (a, b) => {
    let g = 1;
    blocks.forEach((block, index) => {
      const rate = rates[index] ?? 0;
      if (intersects(block, b)) g *= 1 - rate;
      else if (intersects(block, a)) g *= rate;
    });
    return g;
  };
}
