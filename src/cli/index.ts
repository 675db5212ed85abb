#!/usr/bin/env node
/**
 * @fileoverview evidence-algebra CLI
 *
 * Commands:
 *   evidence-algebra validate <file>             - Check an evidence document
 *   evidence-algebra combine <file> --rule <r>   - Combine all sources with one rule
 *   evidence-algebra measure <file> --hypothesis - Bel / Pl / Q of a hypothesis
 *   evidence-algebra discount <file> --alpha <a> - Discount every source
 *   evidence-algebra generate --elements A,B,C   - Generate a random document
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import type { EngineConfig } from '../config/engine_config.js';
import { EVIDENCE_ALGEBRA_VERSION } from '../version.js';
import { combineCommand } from './commands/combine.js';
import { discountCommand } from './commands/discount.js';
import { generateCommand } from './commands/generate.js';
import { measureCommand } from './commands/measure.js';
import { resolveCliConfig } from './commands/shared.js';
import { validateCommand } from './commands/validate.js';
import {
  classifyError,
  createErrorEnvelope,
  formatError,
  formatErrorJson,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';
import { showHelp } from './help.js';

type Command = 'validate' | 'combine' | 'measure' | 'discount' | 'generate' | 'help';

type CommandRunner = (args: string[], config: EngineConfig) => Promise<number>;

const COMMANDS: Record<Command, { description: string; run?: CommandRunner }> = {
  validate: { description: 'Check an evidence document', run: (args, config) => validateCommand({ args, config }) },
  combine: { description: 'Combine all sources of a document', run: (args, config) => combineCommand({ args, config }) },
  measure: { description: 'Measures of one hypothesis', run: (args, config) => measureCommand({ args, config }) },
  discount: { description: 'Discount every source', run: (args, config) => discountCommand({ args, config }) },
  generate: { description: 'Generate a random evidence document', run: (args, config) => generateCommand({ args, config }) },
  help: { description: 'Show help information' },
};

function isCommand(value: string): value is Command {
  return Object.keys(COMMANDS).includes(value);
}

function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  console.error(useJson ? formatErrorJson(envelope) : formatError(envelope));
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      verbose: { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  if (values.version === true) {
    console.log(`evidence-algebra ${EVIDENCE_ALGEBRA_VERSION}`);
    return;
  }

  const command = positionals[0];
  if (values.verbose === true) {
    process.env.EVIDENCE_VERBOSE = '1';
  }

  if (values.help === true || !command || command === 'help') {
    showHelp(command === 'help' ? positionals[1] : command);
    return;
  }

  const jsonMode = values.json === true;
  // stdout is reserved for machine-readable output in JSON mode.
  if (jsonMode && !process.env.EVIDENCE_LOG_LEVEL) {
    process.env.EVIDENCE_LOG_LEVEL = 'silent';
  }

  if (!isCommand(command)) {
    const envelope = createErrorEnvelope('INVALID_ARGUMENT', `Unknown command: ${command}`, {
      available: Object.keys(COMMANDS),
    });
    outputStructuredError(envelope, jsonMode);
    process.exitCode = getExitCode(envelope);
    return;
  }

  const run = COMMANDS[command].run;
  if (!run) {
    showHelp();
    return;
  }

  try {
    const config = resolveCliConfig();
    process.exitCode = await run(args.slice(args.indexOf(command) + 1), config);
  } catch (error) {
    const envelope = classifyError(error);
    envelope.context = { ...envelope.context, command };
    outputStructuredError(envelope, jsonMode);
    process.exitCode = getExitCode(envelope);
  }
}

main()
  .catch((error: unknown) => {
    const envelope = classifyError(error);
    outputStructuredError(envelope, process.argv.includes('--json'));
    process.exitCode = getExitCode(envelope);
  })
  .finally(() => {
    setImmediate(() => {
      process.exit(process.exitCode ?? 0);
    });
  });
