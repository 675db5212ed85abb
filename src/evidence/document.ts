/**
 * @fileoverview Evidence documents: a frame plus named mass functions.
 *
 * The JSON layout is shared with external test fixtures and harnesses:
 *
 * ```json
 * {
 *   "metadata": { "format": "DASS", "version": "1.0" },
 *   "frame_of_discernment": ["A", "B", "C"],
 *   "bba_sources": [
 *     { "id": "source_1", "bba": { "{A}": 0.6, "{A,B}": 0.4 } }
 *   ]
 * }
 * ```
 *
 * Focal sets use the interchange text form; `"{}"` carries conflict mass.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { configOf, type ConfigOptions } from '../config/engine_config.js';
import { ValidationError } from '../core/errors.js';
import { Frame, labelProblem, toFrame, type FrameInput } from '../core/frame.js';
import { createRawMassFunction, type MassFunction } from '../core/mass_function.js';

/** Allowed deviation of a source's mass total from 1. */
export const DOCUMENT_SUM_TOLERANCE = 0.001;

const FOCAL_SET_KEY = /^\{([^{},]+(,[^{},]+)*)?\}$/;

const bbaSourceSchema = z.object({
  id: z.string().min(1).optional(),
  bba: z.record(z.string(), z.number()),
});

export const EvidenceDocumentSchema = z.object({
  metadata: z.record(z.string(), z.unknown()).optional(),
  frame_of_discernment: z.array(z.string().min(1)),
  bba_sources: z.array(bbaSourceSchema),
});

export type EvidenceDocument = z.infer<typeof EvidenceDocumentSchema>;

export interface DocumentValidation {
  valid: boolean;
  errors: string[];
}

export interface EvidenceSource {
  readonly id: string;
  readonly mass: MassFunction;
}

export interface LoadedEvidence {
  readonly frame: Frame;
  readonly sources: EvidenceSource[];
  readonly metadata?: Record<string, unknown>;
}

function formatValidationIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
}

/**
 * Checks shape and content: a non-empty frame of usable labels without
 * duplicates and within the configured size, at least one source, focal
 * sets in `{A,B}` form naming frame elements only, masses in [0, 1] and
 * per-source totals within 0.001 of 1.
 */
export function validateEvidenceDocument(data: unknown, options: ConfigOptions = {}): DocumentValidation {
  const parsed = EvidenceDocumentSchema.safeParse(data);
  if (!parsed.success) {
    return { valid: false, errors: formatValidationIssues(parsed.error) };
  }

  const document = parsed.data;
  const errors: string[] = [];
  const frame = document.frame_of_discernment;
  const known = new Set(frame);

  if (frame.length === 0) {
    errors.push('frame_of_discernment must not be empty');
  } else if (known.size !== frame.length) {
    errors.push('frame_of_discernment contains duplicates');
  }
  for (const label of known) {
    const problem = labelProblem(label);
    if (problem !== undefined) errors.push(`frame_of_discernment: ${problem}`);
  }
  const { maxFrameSize } = configOf(options);
  if (known.size > maxFrameSize) {
    errors.push(`frame_of_discernment has ${known.size} elements; at most ${maxFrameSize} are supported`);
  }
  if (document.bba_sources.length === 0) {
    errors.push('bba_sources must not be empty');
  }

  document.bba_sources.forEach((source, index) => {
    const label = source.id ?? `#${index}`;
    let total = 0;
    for (const [key, mass] of Object.entries(source.bba)) {
      if (mass < 0 || mass > 1) {
        errors.push(`Source ${label}: mass for '${key}' must be between 0 and 1`);
      }
      total += mass;

      const match = FOCAL_SET_KEY.exec(key);
      if (!match) {
        errors.push(`Source ${label}: invalid focal set '${key}'`);
        continue;
      }
      const elements = match[1] === undefined ? [] : match[1].split(',');
      for (const element of elements) {
        if (!known.has(element)) {
          errors.push(`Source ${label}: element '${element}' of '${key}' is not in the frame`);
        }
      }
    }
    if (Math.abs(total - 1) > DOCUMENT_SUM_TOLERANCE) {
      errors.push(`Source ${label}: masses sum to ${total.toFixed(4)}, expected 1.0 ±${DOCUMENT_SUM_TOLERANCE}`);
    }
  });

  return { valid: errors.length === 0, errors };
}

/**
 * Builds mass functions over the document's declared frame. Totals are
 * rescaled to exactly 1 with conflict mass on `{}` preserved.
 *
 * @throws ValidationError if the document does not validate
 */
export function loadEvidenceDocument(data: unknown, options: ConfigOptions = {}): LoadedEvidence {
  const validation = validateEvidenceDocument(data, options);
  const parsed = EvidenceDocumentSchema.safeParse(data);
  if (!validation.valid || !parsed.success) {
    throw new ValidationError(`Invalid evidence document: ${validation.errors.join('; ')}`);
  }

  const document = parsed.data;
  const frame = new Frame(document.frame_of_discernment, options);
  const sources = document.bba_sources.map((source, index): EvidenceSource => {
    const raw = createRawMassFunction(source.bba, { frame, config: options.config });
    return {
      id: source.id ?? `source_${index + 1}`,
      mass: raw.isNormalized() ? raw : raw.rescale(),
    };
  });

  return { frame, sources, metadata: document.metadata };
}

/**
 * @throws ValidationError if a source uses labels outside `frame`
 */
export function serializeEvidenceDocument(
  frame: FrameInput,
  sources: readonly EvidenceSource[],
  metadata?: Record<string, unknown>
): EvidenceDocument {
  const resolved = toFrame(frame);
  return {
    ...(metadata ? { metadata } : {}),
    frame_of_discernment: [...resolved.elements],
    bba_sources: sources.map(({ id, mass }) => ({ id, bba: mass.withFrame(resolved).toRecord() })),
  };
}

/**
 * @throws ValidationError if the file is not valid JSON
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, 'utf8');
  try {
    const data: unknown = JSON.parse(raw);
    return data;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid JSON in ${filePath}: ${message}`);
  }
}

export async function readEvidenceDocument(filePath: string, options: ConfigOptions = {}): Promise<LoadedEvidence> {
  return loadEvidenceDocument(await readJsonFile(filePath), options);
}

/** Pretty-printed JSON with a trailing newline, the layout of every file written here. */
export function toJsonText(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

/**
 * Writes `data` as JSON, creating parent directories.
 *
 * @returns the absolute path written
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<string> {
  const resolved = path.resolve(filePath);
  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, toJsonText(data), 'utf8');
  return resolved;
}

export async function writeEvidenceDocument(filePath: string, document: EvidenceDocument): Promise<string> {
  return writeJsonFile(filePath, document);
}
