import { parseArgs } from 'node:util';
import type { ConfigOptions } from '../../config/engine_config.js';
import { combineSources, getRule } from '../../combination/registry.js';
import { emitJsonOutput } from '../json_output.js';
import { formatMass, printKeyValue } from '../output.js';
import { loadDocumentArg, stringValue } from './shared.js';

export interface CombineCommandOptions extends ConfigOptions {
  args: string[];
}

export const DEFAULT_RULE = 'dempster';

export async function combineCommand(options: CombineCommandOptions): Promise<number> {
  const { values, positionals } = parseArgs({
    args: options.args,
    options: {
      rule: { type: 'string', default: DEFAULT_RULE },
      json: { type: 'boolean', default: false },
      out: { type: 'string' },
    },
    allowPositionals: true,
    strict: false,
  });

  const rule = getRule(stringValue(values.rule) ?? DEFAULT_RULE);
  const evidence = await loadDocumentArg(positionals, 'evidence-algebra combine <file> [--rule <name>]', options);
  const combined = combineSources(evidence.sources.map((source) => source.mass), rule.name);

  const payload = {
    rule: rule.name,
    frame: [...evidence.frame.elements],
    sources: evidence.sources.map((source) => source.id),
    conflict: combined.conflict,
    masses: combined.toRecord(),
  };

  if (values.json === true) {
    await emitJsonOutput(payload, stringValue(values.out));
    return 0;
  }

  console.log(`Combined ${payload.sources.length} source(s) with the ${rule.name} rule`);
  console.log(`Frame: ${evidence.frame.toString()}\n`);
  printKeyValue(combined.focalElements().map(({ subset, mass }) => ({
    key: evidence.frame.format(subset),
    value: formatMass(mass),
  })));
  return 0;
}
