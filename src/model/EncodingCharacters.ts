/**
 * The four structural delimiters and the escape introducer of one message.
 * Treated as data: every encode/decode call receives the set it works with.
 */
export interface EncodingCharacters {
  readonly fieldSeparator: string;
  readonly componentSeparator: string;
  readonly repetitionSeparator: string;
  readonly escapeCharacter: string;
  readonly subcomponentSeparator: string;
}

export const DEFAULT_ENCODING_CHARACTERS: EncodingCharacters = Object.freeze({
  fieldSeparator: '|',
  componentSeparator: '^',
  repetitionSeparator: '~',
  escapeCharacter: '\\',
  subcomponentSeparator: '&',
});

export function createEncodingCharacters(overrides: Partial<EncodingCharacters> = {}): EncodingCharacters {
  const encoding = Object.freeze({ ...DEFAULT_ENCODING_CHARACTERS, ...overrides });
  const problem = describeEncodingProblem(encoding);
  if (problem) {
    throw new RangeError(`Invalid encoding characters: ${problem}`);
  }
  return encoding;
}

/**
 * Returns a description of what is wrong with the set, or undefined when it is usable.
 */
export function describeEncodingProblem(encoding: EncodingCharacters): string | undefined {
  const chars = encodingCharacterList(encoding);
  for (const ch of chars) {
    if (ch.length !== 1) return `'${ch}' is not a single character`;
    if (/[A-Za-z0-9\s]/.test(ch)) return `'${ch}' cannot be alphanumeric or whitespace`;
  }
  if (new Set(chars).size !== chars.length) return 'characters must be distinct';
  return undefined;
}

export function encodingCharacterList(encoding: EncodingCharacters): string[] {
  return [
    encoding.fieldSeparator,
    encoding.componentSeparator,
    encoding.repetitionSeparator,
    encoding.escapeCharacter,
    encoding.subcomponentSeparator,
  ];
}

/**
 * MSH-2 text: component, repetition, escape, subcomponent.
 */
export function toMsh2(encoding: EncodingCharacters): string {
  return (
    encoding.componentSeparator +
    encoding.repetitionSeparator +
    encoding.escapeCharacter +
    encoding.subcomponentSeparator
  );
}
