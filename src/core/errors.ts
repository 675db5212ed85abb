/**
 * @fileoverview Error taxonomy for the evidence algebra.
 *
 * Every failure an operation can report is one of the typed errors below.
 * Numeric clean-up (pruning masses below epsilon, clamping floating-point
 * negatives) is the only recovery done locally; everything else reaches
 * the caller as one of these.
 *
 * @packageDocumentation
 */

export type EvidenceErrorKind =
  | 'frame_mismatch'
  | 'total_conflict'
  | 'dogmatic_input'
  | 'invalid_reliability'
  | 'invalid_partition'
  | 'validation';

/**
 * Base class for all errors raised by the engine.
 */
export class EvidenceError extends Error {
  constructor(
    message: string,
    public readonly kind: EvidenceErrorKind
  ) {
    super(message);
    this.name = 'EvidenceError';
  }
}

/**
 * Two operands declare frames with different elements.
 */
export class FrameMismatchError extends EvidenceError {
  constructor(
    public readonly left: readonly string[],
    public readonly right: readonly string[]
  ) {
    super(
      `Frames of discernment must be equal: {${left.join(',')}} vs {${right.join(',')}}`,
      'frame_mismatch'
    );
    this.name = 'FrameMismatchError';
  }
}

/**
 * Normalization was requested but all mass sits on the empty set (K = 1).
 *
 * This is a legitimate evidential outcome: the sources fully contradict
 * each other.
 */
export class TotalConflictError extends EvidenceError {
  constructor(public readonly conflict: number = 1) {
    super(
      'Total conflict (K=1): sources completely contradict each other and cannot be normalized',
      'total_conflict'
    );
    this.name = 'TotalConflictError';
  }
}

export type DogmaticReason = 'conflict_mass' | 'no_frame_mass';

/**
 * Canonical decomposition requested on a mass function it is undefined for.
 */
export class DogmaticInputError extends EvidenceError {
  constructor(public readonly reason: DogmaticReason, detail: number) {
    super(
      reason === 'conflict_mass'
        ? `Cannot decompose a dogmatic mass function: m(∅) = ${detail}`
        : 'Cannot decompose a mass function with no mass on the frame: some commonality is 0',
      'dogmatic_input'
    );
    this.name = 'DogmaticInputError';
  }
}

/**
 * A reliability or discount rate outside [0, 1].
 */
export class InvalidReliabilityError extends EvidenceError {
  constructor(
    public readonly value: number,
    public readonly context?: string
  ) {
    super(
      context
        ? `Discount rate for ${context} must be in [0,1], got ${value}`
        : `Reliability factor must be in [0,1], got ${value}`,
      'invalid_reliability'
    );
    this.name = 'InvalidReliabilityError';
  }
}

/**
 * A partition that does not exactly cover the frame, or has overlapping blocks.
 */
export class InvalidPartitionError extends EvidenceError {
  constructor(public readonly reason: string) {
    super(`Invalid partition of the frame: ${reason}`, 'invalid_partition');
    this.name = 'InvalidPartitionError';
  }
}

/**
 * Malformed input: bad masses, unknown labels, unusable arguments.
 */
export class ValidationError extends EvidenceError {
  constructor(message: string) {
    super(message, 'validation');
    this.name = 'ValidationError';
  }
}

export function isEvidenceError(value: unknown): value is EvidenceError {
  return value instanceof EvidenceError;
}
