import { describe, expect, it } from 'vitest';
import { TotalConflictError, ValidationError } from '../../core/errors.js';
import {
  classifyError,
  createError,
  createErrorEnvelope,
  formatError,
  formatErrorJson,
  getExitCode,
} from '../errors.js';

describe('classifyError', () => {
  it('keeps the code of CLI errors', () => {
    const envelope = classifyError(createError('INVALID_ARGUMENT', '--alpha is required'));
    expect(envelope).toEqual({ code: 'INVALID_ARGUMENT', message: '--alpha is required' });
    expect(getExitCode(envelope)).toBe(2);
  });

  it('maps engine errors by kind', () => {
    const conflict = classifyError(new TotalConflictError());
    expect(conflict.code).toBe('TOTAL_CONFLICT');
    expect(conflict.kind).toBe('total_conflict');
    expect(getExitCode(conflict)).toBe(5);

    const invalid = classifyError(new ValidationError('bad mass'));
    expect(invalid).toEqual({ code: 'VALIDATION_FAILED', message: 'bad mass', kind: 'validation' });
    expect(getExitCode(invalid)).toBe(4);
  });

  it('recognizes missing files', () => {
    const missing = Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT', path: 'doc.json' });
    const envelope = classifyError(missing);
    expect(envelope).toEqual({ code: 'FILE_NOT_FOUND', message: 'File not found: doc.json', context: { path: 'doc.json' } });
    expect(getExitCode(envelope)).toBe(3);
  });

  it('treats anything else as internal', () => {
    const envelope = classifyError('boom');
    expect(envelope).toEqual({ code: 'INTERNAL', message: 'boom' });
    expect(getExitCode(envelope)).toBe(1);
  });
});

describe('formatting', () => {
  const envelope = createErrorEnvelope('INVALID_DOCUMENT', 'empty frame');

  it('formats text errors', () => {
    expect(formatError(envelope)).toBe('Error [INVALID_DOCUMENT]: empty frame');
  });

  it('wraps JSON errors', () => {
    expect(JSON.parse(formatErrorJson(envelope))).toEqual({
      error: { code: 'INVALID_DOCUMENT', message: 'empty frame' },
    });
  });
});
