/**
 * @fileoverview Canonical subset representation.
 *
 * A subset of the frame is a bitmask over the frame's element order:
 * bit i is set when the i-th element (in sorted order) belongs to the
 * subset. Every rule works on these masks; labels only appear at the
 * boundary (construction, queries, serialization).
 *
 * The interchange text form is `"{A,B,C}"`: sorted labels joined by
 * commas without spaces, `"{}"` for the empty set. External fixtures and
 * evidence documents rely on it byte for byte.
 *
 * @packageDocumentation
 */

import { ValidationError } from './errors.js';

/**
 * A subset of a frame, as a bitmask over that frame's element order.
 * Only meaningful together with the {@link Frame} it was built from.
 */
export type Subset = number;

export const EMPTY_SUBSET: Subset = 0;

export function intersect(a: Subset, b: Subset): Subset {
  return a & b;
}

export function union(a: Subset, b: Subset): Subset {
  return a | b;
}

/** True when every element of `a` is in `b`. */
export function isSubsetOf(a: Subset, b: Subset): boolean {
  return (a & ~b) === 0;
}

export function intersects(a: Subset, b: Subset): boolean {
  return (a & b) !== 0;
}

export function cardinality(subset: Subset): number {
  let count = 0;
  let rest = subset;
  while (rest !== 0) {
    rest &= rest - 1;
    count++;
  }
  return count;
}

/**
 * Enumerates every subset of `subset`, itself and ∅ included.
 */
export function* subsetsOf(subset: Subset): Generator<Subset> {
  let current = subset;
  while (true) {
    yield current;
    if (current === 0) return;
    current = (current - 1) & subset;
  }
}

/**
 * Enumerates every superset of `subset` within `full`, itself included.
 */
export function* supersetsOf(subset: Subset, full: Subset): Generator<Subset> {
  for (const extra of subsetsOf(full & ~subset)) {
    yield subset | extra;
  }
}

// ============================================================================
// INTERCHANGE TEXT FORM
// ============================================================================

const FOCAL_SET_PATTERN = /^\{([^{}]*)\}$/;

/**
 * Formats labels as `"{A,B}"`. Labels are sorted; duplicates collapse.
 */
export function formatFocalSet(labels: Iterable<string>): string {
  const sorted = [...new Set(labels)].sort();
  return `{${sorted.join(',')}}`;
}

/**
 * Parses the `"{A,B}"` form back into its labels.
 *
 * @throws ValidationError if the text is not in the interchange form
 */
export function parseFocalSet(text: string): string[] {
  const match = FOCAL_SET_PATTERN.exec(text.trim());
  if (!match) {
    throw new ValidationError(`Invalid focal set "${text}": expected the form {A,B,C}`);
  }
  const body = match[1] ?? '';
  if (body.trim().length === 0) return [];

  const labels = body.split(',').map((label) => label.trim());
  if (labels.some((label) => label.length === 0)) {
    throw new ValidationError(`Invalid focal set "${text}": empty label`);
  }
  return labels;
}

export function isFocalSetText(text: string): boolean {
  return FOCAL_SET_PATTERN.test(text.trim());
}
