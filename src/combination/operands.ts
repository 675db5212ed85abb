/**
 * @fileoverview Frame resolution for combination operands.
 *
 * Every rule combines mass functions over one frame. Operands that carry a
 * declared frame must agree; an operand with an inferred frame adopts the
 * declared one; when nobody declares a frame the result lives on the
 * union of the inferred frames.
 */

import type { EngineConfig } from '../config/engine_config.js';
import { FrameMismatchError, ValidationError } from '../core/errors.js';
import type { Frame } from '../core/frame.js';
import { MassFunction } from '../core/mass_function.js';
import type { Subset } from '../core/subset.js';

export type FocalList = ReadonlyArray<readonly [Subset, number]>;

export interface AlignedOperands {
  readonly frame: Frame;
  readonly declared: boolean;
  readonly config: EngineConfig;
  /** Focal elements of each source, re-expressed over `frame`, in source order. */
  readonly focals: readonly FocalList[];
}

/**
 * @throws FrameMismatchError if two sources declare different frames
 * @throws ValidationError if there are no sources, or a source uses labels
 *   outside the declared frame
 */
export function alignOperands(sources: readonly MassFunction[]): AlignedOperands {
  const [first] = sources;
  if (first === undefined) {
    throw new ValidationError('At least one mass function is required');
  }
  const config = first.engineConfig;

  let declaredFrame: Frame | undefined;
  for (const source of sources) {
    if (!source.hasDeclaredFrame) continue;
    if (declaredFrame === undefined) {
      declaredFrame = source.frame;
    } else if (!declaredFrame.equals(source.frame)) {
      throw new FrameMismatchError(declaredFrame.elements, source.frame.elements);
    }
  }

  const frame = declaredFrame
    ?? sources.slice(1).reduce((acc, source) => acc.union(source.frame, { config }), first.frame);

  return {
    frame,
    declared: declaredFrame !== undefined,
    config,
    focals: sources.map((source) =>
      [...source.entries()].map(([subset, mass]) => [source.frame.translate(subset, frame), mass] as const)
    ),
  };
}

/** Two-source form of {@link alignOperands}. */
export function alignPair(
  m1: MassFunction,
  m2: MassFunction
): { frame: Frame; declared: boolean; config: EngineConfig; left: FocalList; right: FocalList } {
  const aligned = alignOperands([m1, m2]);
  const [left = [], right = []] = aligned.focals;
  return { frame: aligned.frame, declared: aligned.declared, config: aligned.config, left, right };
}

/**
 * Accumulates masses per subset and builds the result over the aligned frame.
 */
export function buildResult(
  operands: { frame: Frame; declared: boolean; config: EngineConfig },
  masses: ReadonlyMap<Subset, number>
): MassFunction {
  return MassFunction.fromSubsets(operands.frame, masses, {
    declared: operands.declared,
    config: operands.config,
  });
}

export function addMass(target: Map<Subset, number>, subset: Subset, mass: number): void {
  target.set(subset, (target.get(subset) ?? 0) + mass);
}
