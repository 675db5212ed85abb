/**
 * @fileoverview CLI error envelopes and exit codes.
 *
 * Every failure leaving the CLI is reported as an envelope
 * `{ code, message, kind? }`, printed as text or JSON, and mapped to a
 * process exit code.
 */

import { isEvidenceError, type EvidenceErrorKind } from '../core/errors.js';

export type ErrorCode =
  | 'INVALID_ARGUMENT'
  | 'FILE_NOT_FOUND'
  | 'INVALID_DOCUMENT'
  | 'VALIDATION_FAILED'
  | 'FRAME_MISMATCH'
  | 'TOTAL_CONFLICT'
  | 'DOGMATIC_INPUT'
  | 'INVALID_RELIABILITY'
  | 'INVALID_PARTITION'
  | 'INTERNAL';

export interface ErrorEnvelope {
  code: ErrorCode;
  message: string;
  /** Engine error kind, when the failure came from the evidence algebra. */
  kind?: EvidenceErrorKind;
  context?: Record<string, unknown>;
}

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export function createError(code: ErrorCode, message: string): CliError {
  return new CliError(message, code);
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  context?: Record<string, unknown>
): ErrorEnvelope {
  return context ? { code, message, context } : { code, message };
}

const CODE_BY_KIND: Record<EvidenceErrorKind, ErrorCode> = {
  frame_mismatch: 'FRAME_MISMATCH',
  total_conflict: 'TOTAL_CONFLICT',
  dogmatic_input: 'DOGMATIC_INPUT',
  invalid_reliability: 'INVALID_RELIABILITY',
  invalid_partition: 'INVALID_PARTITION',
  validation: 'VALIDATION_FAILED',
};

const EXIT_CODES: Record<ErrorCode, number> = {
  INTERNAL: 1,
  INVALID_ARGUMENT: 2,
  FILE_NOT_FOUND: 3,
  INVALID_DOCUMENT: 4,
  VALIDATION_FAILED: 4,
  FRAME_MISMATCH: 5,
  TOTAL_CONFLICT: 5,
  DOGMATIC_INPUT: 5,
  INVALID_RELIABILITY: 5,
  INVALID_PARTITION: 5,
};

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function classifyError(error: unknown): ErrorEnvelope {
  if (error instanceof CliError) {
    return createErrorEnvelope(error.code, error.message);
  }
  if (isEvidenceError(error)) {
    return { code: CODE_BY_KIND[error.kind], message: error.message, kind: error.kind };
  }
  if (isMissingFileError(error)) {
    const path = error instanceof Error && 'path' in error ? String(error.path) : undefined;
    return createErrorEnvelope('FILE_NOT_FOUND', path ? `File not found: ${path}` : 'File not found', path ? { path } : undefined);
  }
  return createErrorEnvelope('INTERNAL', error instanceof Error ? error.message : String(error));
}

export function getExitCode(envelope: ErrorEnvelope): number {
  return EXIT_CODES[envelope.code];
}

export function formatError(envelope: ErrorEnvelope): string {
  return `Error [${envelope.code}]: ${envelope.message}`;
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}
