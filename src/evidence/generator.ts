/**
 * @fileoverview Random evidence for fixtures and property checks.
 *
 * Each generated source has one to three singletons, up to two composite
 * sets, optionally the empty set, and at most seven focal sets. With a
 * seeded random source the output is reproducible.
 */

import { configOf, type ConfigOptions } from '../config/engine_config.js';
import { ValidationError } from '../core/errors.js';
import { toFrame, type Frame, type FrameInput } from '../core/frame.js';
import { assertPowersetSize } from '../core/lattice.js';
import { MassFunction } from '../core/mass_function.js';
import { cardinality, EMPTY_SUBSET, type Subset } from '../core/subset.js';
import type { EvidenceDocument } from './document.js';

/** Uniform random numbers in [0, 1). */
export type RandomSource = () => number;

export interface RandomMassOptions extends ConfigOptions {
  /** Allow a focal set on ∅ (added with probability 0.3). */
  readonly includeEmpty?: boolean;
  /** Upper bound on focal sets per source. Defaults to 7. */
  readonly maxFocalSets?: number;
}

export interface GenerateDocumentOptions extends RandomMassOptions {
  readonly elements: readonly string[];
  readonly sources: number;
  readonly description?: string;
  readonly random?: RandomSource;
  readonly now?: () => Date;
}

const EMPTY_SET_PROBABILITY = 0.3;
const DEFAULT_MAX_FOCAL_SETS = 7;
const DOCUMENT_PRECISION = 4;

/**
 * Mulberry32: a small, fast 32-bit generator. Not for cryptographic use.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * @throws ValidationError if the frame is empty or too large to enumerate
 */
export function generateRandomMassFunction(
  frame: FrameInput,
  options: RandomMassOptions = {},
  random: RandomSource = Math.random
): MassFunction {
  const resolved = toFrame(frame, options);
  return MassFunction.fromSubsets(resolved, randomMasses(resolved, options, random), {
    declared: true,
    config: options.config,
  });
}

/**
 * Builds an evidence document with `sources` random mass functions named
 * `source_1`, `source_2`, ... Masses are rounded to four decimals.
 */
export function generateEvidenceDocument(options: GenerateDocumentOptions): EvidenceDocument {
  if (!Number.isInteger(options.sources) || options.sources < 1) {
    throw new ValidationError(`Number of sources must be a positive integer, got ${options.sources}`);
  }
  const frame = toFrame(options.elements, options);
  const random = options.random ?? Math.random;
  const now = options.now ?? (() => new Date());
  const scale = 10 ** DOCUMENT_PRECISION;

  const sources = Array.from({ length: options.sources }, (_, index) => {
    const bba: Record<string, number> = {};
    for (const [subset, mass] of randomMasses(frame, options, random)) {
      bba[frame.format(subset)] = Math.round(mass * scale) / scale;
    }
    return { id: `source_${index + 1}`, bba };
  });

  return {
    metadata: {
      format: 'DASS',
      version: '1.0',
      description:
        options.description ?? `Generated evidence: ${frame.size} elements, ${options.sources} sources`,
      generated_at: now().toISOString(),
      generated_by: 'evidence-algebra',
    },
    frame_of_discernment: [...frame.elements],
    bba_sources: sources,
  };
}

function randomMasses(frame: Frame, options: RandomMassOptions, random: RandomSource): Array<[Subset, number]> {
  if (frame.size === 0) {
    throw new ValidationError('Cannot generate evidence over an empty frame');
  }
  assertPowersetSize(frame, configOf(options), 'Random evidence generation');

  const singletons = shuffle(
    frame.elements.map((_, index) => 1 << index),
    random
  ).slice(0, randomInt(1, Math.min(3, frame.size), random));

  const composites: Subset[] = [];
  for (const subset of frame.powerset()) {
    if (cardinality(subset) > 1) composites.push(subset);
  }
  const chosenComposites = shuffle(composites, random).slice(0, randomInt(0, Math.min(2, composites.length), random));

  const focal = [...singletons, ...chosenComposites];
  if (options.includeEmpty && random() < EMPTY_SET_PROBABILITY) {
    focal.push(EMPTY_SUBSET);
  }

  const limit = options.maxFocalSets ?? DEFAULT_MAX_FOCAL_SETS;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`maxFocalSets must be a positive integer, got ${limit}`);
  }
  const selected = focal.slice(0, limit);
  const weights = selected.map(() => random());
  const total = weights.reduce((sum, weight) => sum + weight, 0);

  return selected.map((subset, index): [Subset, number] => [
    subset,
    total > 0 ? (weights[index] ?? 0) / total : 1 / selected.length,
  ]);
}

function randomInt(min: number, max: number, random: RandomSource): number {
  return min + Math.floor(random() * (max - min + 1));
}

function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const current = result[i];
    const other = result[j];
    if (current === undefined || other === undefined) continue;
    result[i] = other;
    result[j] = current;
  }
  return result;
}
