import { once } from 'node:events';
import { toJsonText, writeJsonFile, type EvidenceDocument } from '../evidence/document.js';
import { logInfo } from '../telemetry/logger.js';

/** What a command prints under --json: a report object or a whole evidence document. */
export type JsonPayload = EvidenceDocument | Readonly<Record<string, unknown>>;

/**
 * Writes `payload` to stdout, waiting for the stream to drain so piped
 * output is complete before the process exits. With `outPath` the payload
 * goes to that file instead and stdout stays empty.
 */
export async function emitJsonOutput(payload: JsonPayload, outPath?: string): Promise<void> {
  if (outPath) {
    const written = await writeJsonFile(outPath, payload);
    logInfo('Wrote JSON output', { path: written });
    return;
  }
  if (!process.stdout.write(toJsonText(payload))) {
    await once(process.stdout, 'drain');
  }
}
