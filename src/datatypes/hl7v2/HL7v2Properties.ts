/**
 * Codec options and header encoding-character extraction.
 */

import { EncodingCharacters, describeEncodingProblem } from '../../model/EncodingCharacters.js';

export const HL7V2_DEFAULTS = {
  SEGMENT_DELIMITER: '\r',
  /** "MSH" + field separator + four encoding characters */
  MIN_HEADER_LENGTH: 8,
  MIN_SEGMENT_LENGTH: 3,
};

export interface HL7v2EncodeOptions {
  /** Written between segments (default "\r") */
  segmentDelimiter: string;
  /** Also write the delimiter after the last segment */
  trailingDelimiter: boolean;
  /** Keep segments with no content instead of eliding them */
  includeEmptySegments: boolean;
}

export interface HL7v2DecodeOptions {
  /** Ignore lines that are empty or whitespace only */
  skipBlankLines: boolean;
}

export function getDefaultEncodeOptions(): HL7v2EncodeOptions {
  return {
    segmentDelimiter: HL7V2_DEFAULTS.SEGMENT_DELIMITER,
    trailingDelimiter: false,
    includeEmptySegments: false,
  };
}

export function getDefaultDecodeOptions(): HL7v2DecodeOptions {
  return {
    skipBlankLines: true,
  };
}

/**
 * Read the encoding characters from a header line ("MSH|^~\&|...").
 * Returns undefined when the line is not a usable header.
 */
export function extractEncodingCharacters(headerLine: string): EncodingCharacters | undefined {
  if (headerLine.length < HL7V2_DEFAULTS.MIN_HEADER_LENGTH) {
    return undefined;
  }

  const fieldSeparator = headerLine.charAt(3);
  let end = headerLine.indexOf(fieldSeparator, 4);
  if (end === -1) {
    end = headerLine.length;
  }
  const msh2 = headerLine.substring(4, end);
  if (msh2.length < 4) {
    return undefined;
  }

  const encoding: EncodingCharacters = {
    fieldSeparator,
    componentSeparator: msh2.charAt(0),
    repetitionSeparator: msh2.charAt(1),
    escapeCharacter: msh2.charAt(2),
    subcomponentSeparator: msh2.charAt(3),
  };
  return describeEncodingProblem(encoding) ? undefined : Object.freeze(encoding);
}

/**
 * Split on \r\n, \r or \n alike.
 */
export function splitSegments(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}
