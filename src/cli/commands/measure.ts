import { parseArgs } from 'node:util';
import type { ConfigOptions } from '../../config/engine_config.js';
import { combineSources, getRule } from '../../combination/registry.js';
import type { MassFunction } from '../../core/mass_function.js';
import { createError } from '../errors.js';
import { emitJsonOutput } from '../json_output.js';
import { formatMass, printKeyValue } from '../output.js';
import { DEFAULT_RULE } from './combine.js';
import { loadDocumentArg, stringValue } from './shared.js';

export interface MeasureCommandOptions extends ConfigOptions {
  args: string[];
}

const USAGE = 'evidence-algebra measure <file> --hypothesis "{A,B}" [--source <id> | --rule <name>]';

export async function measureCommand(options: MeasureCommandOptions): Promise<number> {
  const { values, positionals } = parseArgs({
    args: options.args,
    options: {
      hypothesis: { type: 'string' },
      source: { type: 'string' },
      rule: { type: 'string' },
      json: { type: 'boolean', default: false },
      out: { type: 'string' },
    },
    allowPositionals: true,
    strict: false,
  });

  const hypothesis = stringValue(values.hypothesis);
  if (!hypothesis) {
    throw createError('INVALID_ARGUMENT', `--hypothesis is required. Usage: ${USAGE}`);
  }
  const sourceId = stringValue(values.source);
  const ruleName = stringValue(values.rule);
  if (sourceId && ruleName) {
    throw createError('INVALID_ARGUMENT', 'Use only one of --source or --rule.');
  }

  const evidence = await loadDocumentArg(positionals, USAGE, options);
  let mass: MassFunction;
  let origin: string;
  if (sourceId) {
    const source = evidence.sources.find((candidate) => candidate.id === sourceId);
    if (!source) {
      throw createError('INVALID_ARGUMENT', `Unknown source "${sourceId}". Available: ${evidence.sources.map((s) => s.id).join(', ')}`);
    }
    mass = source.mass;
    origin = `source ${source.id}`;
  } else {
    const rule = getRule(ruleName ?? DEFAULT_RULE);
    mass = combineSources(evidence.sources.map((source) => source.mass), rule.name);
    origin = `${rule.name} combination of all sources`;
  }

  const subset = evidence.frame.parse(hypothesis);
  const payload = {
    hypothesis: evidence.frame.format(subset),
    origin,
    belief: mass.belief(subset),
    plausibility: mass.plausibility(subset),
    commonality: mass.commonality(subset),
  };

  if (values.json === true) {
    await emitJsonOutput(payload, stringValue(values.out));
    return 0;
  }

  console.log(`Hypothesis ${payload.hypothesis} (${origin})\n`);
  printKeyValue([
    { key: 'Belief', value: formatMass(payload.belief) },
    { key: 'Plausibility', value: formatMass(payload.plausibility) },
    { key: 'Commonality', value: formatMass(payload.commonality) },
  ]);
  return 0;
}
