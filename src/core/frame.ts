/**
 * @fileoverview Frame of discernment.
 *
 * The frame Ω is the finite set of mutually exclusive, exhaustive
 * hypotheses. Elements are kept in sorted order, which fixes the bit
 * assigned to each label in a {@link Subset}; two frames built from the
 * same labels in any order are equal and produce the same masks.
 *
 * @packageDocumentation
 */

import { configOf, type ConfigOptions } from '../config/engine_config.js';
import { ValidationError } from './errors.js';
import { formatFocalSet, parseFocalSet, type Subset } from './subset.js';

const RESERVED_LABEL_CHARS = /[{},]/;

/**
 * Why `label` cannot name a frame element, or undefined when it can.
 * Labels must survive the `{A,B}` text form unchanged.
 */
export function labelProblem(label: string): string | undefined {
  if (label.trim().length === 0 || label !== label.trim()) {
    return `Frame labels must be non-blank with no surrounding whitespace, got "${label}"`;
  }
  if (RESERVED_LABEL_CHARS.test(label)) {
    return `Frame label "${label}" contains one of the reserved characters { } ,`;
  }
  return undefined;
}

/**
 * An immutable frame of discernment.
 *
 * @example
 * ```typescript
 * const frame = new Frame(['broken', 'working', 'broken']);
 * frame.size;                          // 2
 * frame.format(frame.toSubset(['working'])); // '{working}'
 * ```
 */
export class Frame implements Iterable<string> {
  /** Elements in sorted order; element i owns bit i of a subset mask. */
  readonly elements: readonly string[];

  private readonly indexByLabel: ReadonlyMap<string, number>;

  constructor(labels: Iterable<string>, options?: ConfigOptions) {
    const { maxFrameSize } = configOf(options);
    const elements = [...new Set(labels)].sort();

    for (const label of elements) {
      const problem = labelProblem(label);
      if (problem !== undefined) throw new ValidationError(problem);
    }
    if (elements.length > maxFrameSize) {
      throw new ValidationError(
        `Frame has ${elements.length} elements; at most ${maxFrameSize} are supported`
      );
    }

    this.elements = Object.freeze(elements);
    this.indexByLabel = new Map(elements.map((label, index) => [label, index]));
  }

  get size(): number {
    return this.elements.length;
  }

  /** The subset holding every element (Ω). */
  get full(): Subset {
    return this.elements.length === 0 ? 0 : (1 << this.elements.length) - 1;
  }

  has(label: string): boolean {
    return this.indexByLabel.has(label);
  }

  [Symbol.iterator](): Iterator<string> {
    return this.elements[Symbol.iterator]();
  }

  /**
   * Converts labels to the canonical subset.
   *
   * @throws ValidationError if a label is not an element of the frame
   */
  toSubset(labels: Iterable<string>): Subset {
    let subset = 0;
    for (const label of labels) {
      const index = this.indexByLabel.get(label);
      if (index === undefined) {
        throw new ValidationError(`Element "${label}" is not in frame ${this.toString()}`);
      }
      subset |= 1 << index;
    }
    return subset;
  }

  /** Labels of a subset, in sorted order. */
  labelsOf(subset: Subset): string[] {
    const labels: string[] = [];
    this.elements.forEach((label, index) => {
      if (subset & (1 << index)) labels.push(label);
    });
    return labels;
  }

  /** True when `subset` only uses bits of this frame. */
  contains(subset: Subset): boolean {
    return subset >= 0 && (subset & ~this.full) === 0;
  }

  format(subset: Subset): string {
    return formatFocalSet(this.labelsOf(subset));
  }

  parse(text: string): Subset {
    return this.toSubset(parseFocalSet(text));
  }

  /**
   * All 2^|Ω| subsets, ∅ first and Ω last. Each iteration starts over, so
   * the same value can be walked by several algorithms.
   */
  powerset(): Iterable<Subset> {
    const full = this.full;
    return {
      *[Symbol.iterator]() {
        for (let subset = 0; subset <= full; subset++) {
          yield subset;
        }
      },
    };
  }

  /** Re-expresses a subset of this frame in `target`, which must hold its labels. */
  translate(subset: Subset, target: Frame): Subset {
    if (target === this || target.equals(this)) return subset;
    return target.toSubset(this.labelsOf(subset));
  }

  equals(other: Frame): boolean {
    if (this === other) return true;
    if (this.size !== other.size) return false;
    return this.elements.every((label, index) => other.elements[index] === label);
  }

  union(other: Frame, options?: ConfigOptions): Frame {
    if (this.equals(other)) return this;
    return new Frame([...this.elements, ...other.elements], options);
  }

  toString(): string {
    return formatFocalSet(this.elements);
  }
}

export type FrameInput = Frame | Iterable<string>;

export function toFrame(input: FrameInput, options?: ConfigOptions): Frame {
  return input instanceof Frame ? input : new Frame(input, options);
}
