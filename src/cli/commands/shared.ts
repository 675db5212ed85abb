import { ZodError } from 'zod';
import { resolveEngineConfig, type ConfigOptions, type EngineConfig } from '../../config/engine_config.js';
import { readEvidenceDocument, type LoadedEvidence } from '../../evidence/document.js';
import { createError } from '../errors.js';

/**
 * The engine configuration for one CLI run, from the `EVIDENCE_*`
 * environment variables.
 *
 * @throws CliError (INVALID_ARGUMENT) if a variable is out of range
 */
export function resolveCliConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  try {
    return resolveEngineConfig({}, env);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw createError('INVALID_ARGUMENT', `Invalid engine configuration: ${issues.join('; ')}`);
    }
    throw error;
  }
}

/** Reads the document named by the first positional argument. */
export async function loadDocumentArg(
  positionals: readonly string[],
  usage: string,
  options: ConfigOptions = {}
): Promise<LoadedEvidence> {
  const file = positionals[0];
  if (!file) {
    throw createError('INVALID_ARGUMENT', `A document path is required. Usage: ${usage}`);
  }
  return readEvidenceDocument(file, options);
}

export function stringValue(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

/**
 * @throws CliError if the value is present but not a finite number
 */
export function numberValue(value: string | boolean | undefined, flag: string): number | undefined {
  const raw = stringValue(value);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw createError('INVALID_ARGUMENT', `${flag} must be a number, got "${raw}"`);
  }
  return parsed;
}
