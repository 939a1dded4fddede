import type { Optionality, Repeatability, SegmentSchema, TableDefinition } from './types.js';

const SINGLE: Repeatability = Object.freeze({ kind: 'single' });
const UNBOUNDED: Repeatability = Object.freeze({ kind: 'unbounded' });

/**
 * Repeatability tags as found in definition records:
 * '', '1', '-', 'N' -> single; '*', '∞', 'Y' -> unbounded; other digits -> bounded.
 */
export function parseRepeatability(tag: string | number | null | undefined): Repeatability {
  if (tag === null || tag === undefined) return SINGLE;
  const text = String(tag).trim();
  if (text === '' || text === '-' || text === '1' || text.toUpperCase() === 'N') return SINGLE;
  if (text === '*' || text === '∞' || text.toUpperCase() === 'Y') return UNBOUNDED;
  const max = Number.parseInt(text, 10);
  if (Number.isFinite(max) && max > 1) return { kind: 'bounded', max };
  return SINGLE;
}

export function maxOccurrences(repeatability: Repeatability): number {
  switch (repeatability.kind) {
    case 'single':
      return 1;
    case 'bounded':
      return repeatability.max;
    case 'unbounded':
      return Number.POSITIVE_INFINITY;
  }
}

export function isRepeatable(repeatability: Repeatability): boolean {
  return maxOccurrences(repeatability) > 1;
}

/** Unknown tags read as optional; 'X' and 'W' (not used / withdrawn) read as excluded */
export function parseOptionality(tag: string | null | undefined): Optionality {
  switch ((tag ?? '').trim().toUpperCase()) {
    case 'R':
      return 'R';
    case 'C':
      return 'C';
    case 'B':
    case 'X':
    case 'W':
      return 'B';
    default:
      return 'O';
  }
}

/**
 * "1", "0001", "HL70001" -> "0001". Undefined for blank references.
 */
export function normalizeTableId(reference: string | number | null | undefined): string | undefined {
  if (reference === null || reference === undefined) return undefined;
  const digits = String(reference).trim().replace(/^HL7/i, '');
  if (digits === '') return undefined;
  return /^\d+$/.test(digits) ? digits.padStart(4, '0') : digits;
}

/**
 * "ADT^A01", "adt_a01" and "ADT_A01" all become "ADT_A01".
 */
export function normalizeTriggerEventCode(code: string): string {
  return code.trim().replace(/\^/g, '_').toUpperCase();
}

/** Parse a length that may arrive as text ("250") or number; 0 and blanks mean no limit */
export function parseLength(length: string | number | null | undefined): number | undefined {
  if (length === null || length === undefined) return undefined;
  const value = typeof length === 'number' ? length : Number.parseInt(length, 10);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

export function maxFieldPosition(schema: SegmentSchema): number {
  return schema.fields.reduce((max, field) => Math.max(max, field.position), 0);
}

export function isClosedTable(table: TableDefinition): boolean {
  return table.type === 'HL7';
}

export function tableHasCode(table: TableDefinition, code: string): boolean {
  return table.values.some((value) => value.code === code);
}
