/**
 * @fileoverview Transforms over the subset lattice of a frame.
 *
 * Dense vectors are indexed by subset mask, so `values[A]` holds the value
 * for subset A. The superset zeta and Möbius transforms run in n·2^n steps
 * instead of the 4^n of the naive double sum.
 */

import type { EngineConfig } from '../config/engine_config.js';
import { ValidationError } from './errors.js';
import type { Frame } from './frame.js';

/**
 * @throws ValidationError if the frame is too large to enumerate its powerset
 */
export function assertPowersetSize(frame: Frame, config: EngineConfig, operation: string): void {
  if (frame.size > config.maxPowersetFrameSize) {
    throw new ValidationError(
      `${operation} enumerates all subsets; frame has ${frame.size} elements, limit is ${config.maxPowersetFrameSize}`
    );
  }
}

/** A zeroed vector with one slot per subset of `frame`. */
export function denseVector(frame: Frame): Float64Array {
  return new Float64Array(frame.full + 1);
}

/**
 * In place: values[A] ← Σ_{B ⊇ A} values[B].
 */
export function supersetZeta(values: Float64Array, size: number): Float64Array {
  for (let bit = 0; bit < size; bit++) {
    const flag = 1 << bit;
    for (let mask = 0; mask < values.length; mask++) {
      if ((mask & flag) === 0) {
        values[mask] = (values[mask] ?? 0) + (values[mask | flag] ?? 0);
      }
    }
  }
  return values;
}

/**
 * In place inverse of {@link supersetZeta}:
 * values[A] ← Σ_{B ⊇ A} (-1)^{|B∖A|} values[B].
 */
export function supersetMobius(values: Float64Array, size: number): Float64Array {
  for (let bit = 0; bit < size; bit++) {
    const flag = 1 << bit;
    for (let mask = 0; mask < values.length; mask++) {
      if ((mask & flag) === 0) {
        values[mask] = (values[mask] ?? 0) - (values[mask | flag] ?? 0);
      }
    }
  }
  return values;
}
