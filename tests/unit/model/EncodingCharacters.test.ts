import { describe, it, expect } from '@jest/globals';
import {
  DEFAULT_ENCODING_CHARACTERS,
  createEncodingCharacters,
  describeEncodingProblem,
  toMsh2,
} from '../../../src/model/EncodingCharacters.js';

describe('EncodingCharacters', () => {
  it('should default to the standard delimiters', () => {
    expect(toMsh2(DEFAULT_ENCODING_CHARACTERS)).toBe('^~\\&');
    expect(DEFAULT_ENCODING_CHARACTERS.fieldSeparator).toBe('|');
  });

  it('should accept a custom set', () => {
    const custom = createEncodingCharacters({ fieldSeparator: '#', componentSeparator: '@' });
    expect(toMsh2(custom)).toBe('@~\\&');
    expect(Object.isFrozen(custom)).toBe(true);
  });

  it('should reject duplicate characters', () => {
    expect(() => createEncodingCharacters({ componentSeparator: '|' })).toThrow(
      'Invalid encoding characters: characters must be distinct'
    );
  });

  it('should reject alphanumeric and multi-character delimiters', () => {
    expect(describeEncodingProblem({ ...DEFAULT_ENCODING_CHARACTERS, fieldSeparator: 'A' })).toBe(
      "'A' cannot be alphanumeric or whitespace"
    );
    expect(describeEncodingProblem({ ...DEFAULT_ENCODING_CHARACTERS, fieldSeparator: '||' })).toBe(
      "'||' is not a single character"
    );
  });
});
