import { encodeField } from '../datatypes/hl7v2/HL7v2Encoder.js';
import type { EncodingCharacters } from '../model/EncodingCharacters.js';
import type { FieldValue } from '../model/FieldValue.js';

type Repetition = string[][];

function encodedLength(rep: Repetition, encoding: EncodingCharacters): number {
  return encodeField([rep], encoding).length;
}

/**
 * Shorten each repetition until its encoded form fits `maxLength`:
 * trailing components go first, then trailing subcomponents of the first
 * component, then characters of the first leaf.
 */
export function fitToLength(
  value: FieldValue,
  maxLength: number | undefined,
  encoding: EncodingCharacters
): FieldValue {
  if (!maxLength) return value;
  return value.map((rep) => fitRepetition(rep, maxLength, encoding));
}

function fitRepetition(rep: Repetition, maxLength: number, encoding: EncodingCharacters): Repetition {
  let current = rep.map((comp) => [...comp]);
  while (current.length > 1 && encodedLength(current, encoding) > maxLength) {
    current = current.slice(0, -1);
  }

  const first = current[0];
  if (!first) return current;
  while (first.length > 1 && encodedLength(current, encoding) > maxLength) {
    first.pop();
  }

  let text = first[0] ?? '';
  while (text.length > 0 && encodedLength(current, encoding) > maxLength) {
    text = text.slice(0, -1);
    first[0] = text;
  }
  return current;
}

export function truncate(text: string, maxLength: number | undefined): string {
  return maxLength && text.length > maxLength ? text.substring(0, maxLength) : text;
}
