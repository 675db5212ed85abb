import { parseArgs } from 'node:util';
import type { ConfigOptions } from '../../config/engine_config.js';
import { discountClassical } from '../../discounting/classical.js';
import { serializeEvidenceDocument, writeEvidenceDocument } from '../../evidence/document.js';
import { logInfo } from '../../telemetry/logger.js';
import { createError } from '../errors.js';
import { emitJsonOutput } from '../json_output.js';
import { loadDocumentArg, numberValue, stringValue } from './shared.js';

export interface DiscountCommandOptions extends ConfigOptions {
  args: string[];
}

/**
 * Discounts every source of a document by the same reliability and emits
 * the resulting document.
 */
export async function discountCommand(options: DiscountCommandOptions): Promise<number> {
  const { values, positionals } = parseArgs({
    args: options.args,
    options: {
      alpha: { type: 'string' },
      out: { type: 'string' },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  const alpha = numberValue(values.alpha, '--alpha');
  if (alpha === undefined) {
    throw createError('INVALID_ARGUMENT', '--alpha is required. Usage: evidence-algebra discount <file> --alpha <reliability>');
  }

  const evidence = await loadDocumentArg(positionals, 'evidence-algebra discount <file> --alpha <reliability>', options);
  const discounted = evidence.sources.map((source) => ({
    id: source.id,
    mass: discountClassical(source.mass, alpha),
  }));
  const document = serializeEvidenceDocument(evidence.frame, discounted, {
    ...evidence.metadata,
    discount_reliability: alpha,
  });

  const out = stringValue(values.out);
  if (out) {
    await writeEvidenceDocument(out, document);
    logInfo('Wrote discounted evidence document', { path: out, sources: discounted.length });
    return 0;
  }
  await emitJsonOutput(document);
  return 0;
}
