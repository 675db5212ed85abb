import { parseArgs } from 'node:util';
import type { ConfigOptions } from '../../config/engine_config.js';
import { createSeededRandom, generateEvidenceDocument } from '../../evidence/generator.js';
import { writeEvidenceDocument } from '../../evidence/document.js';
import { logInfo } from '../../telemetry/logger.js';
import { createError } from '../errors.js';
import { emitJsonOutput } from '../json_output.js';
import { numberValue, stringValue } from './shared.js';

export interface GenerateCommandOptions extends ConfigOptions {
  args: string[];
}

const USAGE = 'evidence-algebra generate --elements A,B,C --sources N [--seed N] [--include-empty] [--out <path>]';

export async function generateCommand(options: GenerateCommandOptions): Promise<number> {
  const { values } = parseArgs({
    args: options.args,
    options: {
      elements: { type: 'string' },
      sources: { type: 'string', default: '2' },
      seed: { type: 'string' },
      'include-empty': { type: 'boolean', default: false },
      out: { type: 'string' },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  const elements = (stringValue(values.elements) ?? '')
    .split(',')
    .map((element) => element.trim())
    .filter((element) => element.length > 0);
  if (elements.length === 0) {
    throw createError('INVALID_ARGUMENT', `--elements is required. Usage: ${USAGE}`);
  }

  const sources = numberValue(values.sources, '--sources') ?? 2;
  if (!Number.isInteger(sources) || sources < 1) {
    throw createError('INVALID_ARGUMENT', `--sources must be a positive integer, got ${sources}`);
  }
  const seed = numberValue(values.seed, '--seed');

  const document = generateEvidenceDocument({
    elements,
    sources,
    includeEmpty: values['include-empty'] === true,
    random: seed === undefined ? undefined : createSeededRandom(seed),
    config: options.config,
  });

  const out = stringValue(values.out);
  if (out) {
    await writeEvidenceDocument(out, document);
    logInfo('Wrote generated evidence document', { path: out, sources });
    return 0;
  }
  await emitJsonOutput(document);
  return 0;
}
