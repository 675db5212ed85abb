import { parseArgs } from 'node:util';
import type { ConfigOptions } from '../../config/engine_config.js';
import { readJsonFile, validateEvidenceDocument } from '../../evidence/document.js';
import { createError } from '../errors.js';
import { emitJsonOutput } from '../json_output.js';

export interface ValidateCommandOptions extends ConfigOptions {
  args: string[];
}

export async function validateCommand(options: ValidateCommandOptions): Promise<number> {
  const { values, positionals } = parseArgs({
    args: options.args,
    options: {
      json: { type: 'boolean', default: false },
      out: { type: 'string' },
    },
    allowPositionals: true,
    strict: false,
  });

  const file = positionals[0];
  if (!file) {
    throw createError('INVALID_ARGUMENT', 'A document path is required. Usage: evidence-algebra validate <file>');
  }

  const result = validateEvidenceDocument(await readJsonFile(file), options);
  const exitCode = result.valid ? 0 : 4;

  if (values.json === true) {
    await emitJsonOutput({ file, ...result }, typeof values.out === 'string' ? values.out : undefined);
    return exitCode;
  }

  if (result.valid) {
    console.log(`${file}: valid evidence document`);
    return exitCode;
  }

  console.log(`${file}: invalid evidence document (${result.errors.length} problem${result.errors.length === 1 ? '' : 's'})`);
  for (const error of result.errors) {
    console.log(`  - ${error}`);
  }
  return exitCode;
}
