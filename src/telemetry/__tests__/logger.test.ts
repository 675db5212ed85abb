import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { logDebug, logError, logInfo, logWarning } from '../logger.js';

const ENV_KEYS = ['EVIDENCE_LOG_LEVEL', 'EVIDENCE_VERBOSE', 'EVIDENCE_NO_TELEMETRY'] as const;

describe('logger', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved.set(key, process.env[key]);
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved.get(key);
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    vi.restoreAllMocks();
  });

  it('emits warnings and errors by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    logInfo('loaded');
    logWarning('clamped', { mass: -0.01 });
    logError('failed');

    expect(warn).toHaveBeenCalledWith('clamped', { mass: -0.01 });
    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith('failed');
  });

  it('lowers the threshold to info when verbose', () => {
    process.env.EVIDENCE_VERBOSE = '1';
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    logInfo('loaded');
    logDebug('details');

    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith('loaded');
  });

  it('honors an explicit level', () => {
    process.env.EVIDENCE_LOG_LEVEL = 'debug';
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    logDebug('details', {});

    expect(error).toHaveBeenCalledWith('details');
  });

  it.each(['silent', 'off'])('emits nothing at level %s', (level) => {
    process.env.EVIDENCE_LOG_LEVEL = level;
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    logError('failed');

    expect(error).not.toHaveBeenCalled();
  });

  it('emits nothing when telemetry is disabled', () => {
    process.env.EVIDENCE_NO_TELEMETRY = 'true';
    process.env.EVIDENCE_LOG_LEVEL = 'debug';
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    logWarning('clamped');

    expect(warn).not.toHaveBeenCalled();
  });
});
