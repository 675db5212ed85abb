import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ValidationError } from '../../core/errors.js';
import { createMassFunction } from '../../core/mass_function.js';
import {
  loadEvidenceDocument,
  readEvidenceDocument,
  readJsonFile,
  serializeEvidenceDocument,
  validateEvidenceDocument,
  writeEvidenceDocument,
} from '../document.js';
import type { EvidenceDocument } from '../document.js';

const validDocument: EvidenceDocument = {
  metadata: { description: 'two sensors' },
  frame_of_discernment: ['A', 'B'],
  bba_sources: [
    { id: 'radar', bba: { '{A}': 0.6, '{A,B}': 0.4 } },
    { id: 'camera', bba: { '{B}': 0.3, '{A,B}': 0.7 } },
  ],
};

describe('validateEvidenceDocument', () => {
  it('accepts a well-formed document', () => {
    expect(validateEvidenceDocument(validDocument)).toEqual({ valid: true, errors: [] });
  });

  it('reports shape errors with their path', () => {
    const result = validateEvidenceDocument({ frame_of_discernment: 'A' });
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.startsWith('frame_of_discernment: ')).toBe(true);
    expect(result.errors.some((error) => error.startsWith('bba_sources: '))).toBe(true);
  });

  it('reports an empty frame and no sources', () => {
    expect(validateEvidenceDocument({ frame_of_discernment: [], bba_sources: [] }).errors).toEqual([
      'frame_of_discernment must not be empty',
      'bba_sources must not be empty',
    ]);
  });

  it('reports duplicate frame elements', () => {
    const result = validateEvidenceDocument({
      frame_of_discernment: ['A', 'A'],
      bba_sources: [{ id: 's', bba: { '{A}': 1 } }],
    });
    expect(result.errors).toEqual(['frame_of_discernment contains duplicates']);
  });

  it('reports labels that cannot name frame elements', () => {
    const result = validateEvidenceDocument({
      frame_of_discernment: [' A', 'B{'],
      bba_sources: [{ id: 's', bba: { '{ A}': 1 } }],
    });
    expect(result.errors).toEqual([
      'frame_of_discernment: Frame labels must be non-blank with no surrounding whitespace, got " A"',
      'frame_of_discernment: Frame label "B{" contains one of the reserved characters { } ,',
    ]);
  });

  it('reports malformed focal sets and unknown elements', () => {
    const result = validateEvidenceDocument({
      frame_of_discernment: ['A', 'B'],
      bba_sources: [{ id: 's1', bba: { A: 0.5, '{C}': 0.5 } }],
    });
    expect(result.errors).toEqual([
      "Source s1: invalid focal set 'A'",
      "Source s1: element 'C' of '{C}' is not in the frame",
    ]);
  });

  it('reports masses out of range and bad totals by index when there is no id', () => {
    const result = validateEvidenceDocument({
      frame_of_discernment: ['A', 'B'],
      bba_sources: [{ bba: { '{A}': 1.5 } }],
    });
    expect(result.errors).toEqual([
      "Source #0: mass for '{A}' must be between 0 and 1",
      'Source #0: masses sum to 1.5000, expected 1.0 ±0.001',
    ]);
  });

  it('accepts conflict mass and small rounding errors', () => {
    const result = validateEvidenceDocument({
      frame_of_discernment: ['A', 'B'],
      bba_sources: [{ id: 's', bba: { '{}': 0.1, '{A}': 0.5, '{B}': 0.3995 } }],
    });
    expect(result.valid).toBe(true);
  });
});

describe('loadEvidenceDocument', () => {
  it('builds mass functions over the declared frame', () => {
    const loaded = loadEvidenceDocument(validDocument);
    expect(loaded.frame.elements).toEqual(['A', 'B']);
    expect(loaded.metadata).toEqual({ description: 'two sensors' });
    expect(loaded.sources.map((source) => source.id)).toEqual(['radar', 'camera']);
    expect(loaded.sources[0]?.mass.hasDeclaredFrame).toBe(true);
    expect(loaded.sources[1]?.mass.belief(['B'])).toBeCloseTo(0.3, 12);
  });

  it('rescales near-normalized sources while keeping the conflict', () => {
    const loaded = loadEvidenceDocument({
      frame_of_discernment: ['A', 'B'],
      bba_sources: [{ bba: { '{}': 0.4995, '{B}': 0.5 } }],
    });
    const source = loaded.sources[0];
    expect(source?.id).toBe('source_1');
    expect(source?.mass.conflict).toBeCloseTo(0.4995 / 0.9995, 12);
    expect(source?.mass.mass('{B}')).toBeCloseTo(0.5 / 0.9995, 12);
  });

  it('keeps belief of a conflicted source within its plausibility', () => {
    const loaded = loadEvidenceDocument({
      frame_of_discernment: ['A', 'B'],
      bba_sources: [{ id: 'c', bba: { '{}': 0.3, '{A}': 0.7 } }],
    });
    const mass = loaded.sources[0]?.mass;
    expect(mass?.conflict).toBeCloseTo(0.3, 12);
    expect(mass?.belief([])).toBe(0);
    expect(mass?.belief(['A', 'B'])).toBeCloseTo(0.7, 12);
    expect(mass?.plausibility(['A', 'B'])).toBeCloseTo(0.7, 12);
  });

  it('rejects invalid documents', () => {
    expect(() => loadEvidenceDocument({ frame_of_discernment: [], bba_sources: [] })).toThrow(
      'Invalid evidence document: frame_of_discernment must not be empty; bba_sources must not be empty'
    );
  });
});

describe('serializeEvidenceDocument', () => {
  it('writes masses in the interchange form', () => {
    const document = serializeEvidenceDocument(
      ['A', 'B'],
      [{ id: 's', mass: createMassFunction({ '{A}': 1 }) }],
      { note: 'x' }
    );
    expect(document).toEqual({
      metadata: { note: 'x' },
      frame_of_discernment: ['A', 'B'],
      bba_sources: [{ id: 's', bba: { '{A}': 1 } }],
    });
  });

  it('omits absent metadata', () => {
    const document = serializeEvidenceDocument(['A'], [{ id: 's', mass: createMassFunction({ '{A}': 1 }) }]);
    expect('metadata' in document).toBe(false);
  });

  it('rejects sources with labels outside the frame', () => {
    expect(() =>
      serializeEvidenceDocument(['A'], [{ id: 's', mass: createMassFunction({ '{B}': 1 }) }])
    ).toThrow(ValidationError);
  });
});

describe('document files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'evidence-document-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes and reads a document', async () => {
    const file = path.join(dir, 'nested', 'evidence.json');
    await writeEvidenceDocument(file, validDocument);

    const raw = await fs.readFile(file, 'utf8');
    expect(raw.endsWith('}\n')).toBe(true);

    const loaded = await readEvidenceDocument(file);
    expect(loaded.sources).toHaveLength(2);
  });

  it('reports invalid JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ not json', 'utf8');
    await expect(readJsonFile(file)).rejects.toThrow(`Invalid JSON in ${file}`);
  });

  it('surfaces missing files', async () => {
    await expect(readJsonFile(path.join(dir, 'missing.json'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
