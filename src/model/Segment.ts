import {
  FieldValue,
  cloneFieldValue,
  componentsField,
  fieldValuesEqual,
  getLeaf,
  isEmptyFieldValue,
  normalizeFieldValue,
  textField,
} from './FieldValue.js';

const SEGMENT_CODE_PATTERN = /^[A-Z][A-Z0-9]{2}$/;

export const HEADER_SEGMENT_CODE = 'MSH';

export function isValidSegmentCode(code: string): boolean {
  return SEGMENT_CODE_PATTERN.test(code);
}

/** Z-segments are site-defined and never part of a standard definition set */
export function isZSegment(code: string): boolean {
  return code.startsWith('Z');
}

function assertPosition(position: number): void {
  if (!Number.isInteger(position) || position < 1) {
    throw new RangeError(`Field position must be an integer >= 1, got ${position}`);
  }
}

/**
 * One segment of a message. Fields are addressed from 1; position 0 is the
 * segment code and cannot be set. Setting a field to empty content unsets it,
 * so "empty" and "absent" are the same thing in the model.
 */
export class Segment {
  private readonly code: string;
  private readonly fields = new Map<number, FieldValue>();

  constructor(code: string) {
    if (!isValidSegmentCode(code)) {
      throw new RangeError(`Invalid segment code '${code}': expected three characters [A-Z][A-Z0-9]{2}`);
    }
    this.code = code;
  }

  getCode(): string {
    return this.code;
  }

  isHeader(): boolean {
    return this.code === HEADER_SEGMENT_CODE;
  }

  setField(position: number, value: FieldValue): this {
    assertPosition(position);
    if (isEmptyFieldValue(value)) {
      this.fields.delete(position);
    } else {
      this.fields.set(position, normalizeFieldValue(value));
    }
    return this;
  }

  setText(position: number, text: string): this {
    return this.setField(position, textField(text));
  }

  setComponents(position: number, components: readonly string[]): this {
    return this.setField(position, componentsField(components));
  }

  /**
   * Set one component (or subcomponent) of one repetition, growing the
   * field as needed.
   */
  setComponent(position: number, component: number, text: string, subcomponent = 1, repetition = 1): this {
    assertPosition(position);
    if (component < 1 || subcomponent < 1 || repetition < 1) {
      throw new RangeError('Component, subcomponent and repetition indexes start at 1');
    }
    const value = this.getField(position) ?? [];
    while (value.length < repetition) value.push([['']]);
    const rep = value[repetition - 1] ?? [];
    while (rep.length < component) rep.push(['']);
    const comp = rep[component - 1] ?? [];
    while (comp.length < subcomponent) comp.push('');
    comp[subcomponent - 1] = text;
    rep[component - 1] = comp;
    value[repetition - 1] = rep;
    return this.setField(position, value);
  }

  clearField(position: number): this {
    assertPosition(position);
    this.fields.delete(position);
    return this;
  }

  /**
   * A copy of the field's content, or undefined when the field is empty.
   */
  getField(position: number): FieldValue | undefined {
    const value = this.fields.get(position);
    return value ? cloneFieldValue(value) : undefined;
  }

  getText(position: number, component = 1, subcomponent = 1, repetition = 1): string {
    return getLeaf(this.fields.get(position), component, subcomponent, repetition);
  }

  hasField(position: number): boolean {
    return this.fields.has(position);
  }

  getRepetitionCount(position: number): number {
    return this.fields.get(position)?.length ?? 0;
  }

  /** Highest populated position, 0 for a segment with no content */
  getFieldCount(): number {
    let max = 0;
    for (const position of this.fields.keys()) {
      if (position > max) max = position;
    }
    return max;
  }

  /** Populated positions in ascending order */
  getPopulatedPositions(): number[] {
    return [...this.fields.keys()].sort((a, b) => a - b);
  }

  /**
   * True when no field beyond the code carries content. The header's
   * delimiter fields (MSH-1, MSH-2) do not count as content.
   */
  isEmpty(): boolean {
    const positions = this.getPopulatedPositions();
    return this.isHeader() ? positions.every((p) => p <= 2) : positions.length === 0;
  }

  clone(): Segment {
    const copy = new Segment(this.code);
    for (const [position, value] of this.fields) {
      copy.fields.set(position, cloneFieldValue(value));
    }
    return copy;
  }

  equals(other: Segment): boolean {
    if (this.code !== other.code) return false;
    const count = Math.max(this.getFieldCount(), other.getFieldCount());
    for (let position = 1; position <= count; position++) {
      if (!fieldValuesEqual(this.fields.get(position), other.fields.get(position))) {
        return false;
      }
    }
    return true;
  }
}
