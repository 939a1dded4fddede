/**
 * HL7v2 escape sequence handler.
 *
 * Handles the standard escape sequences:
 *   \F\ = field separator       \S\ = component separator
 *   \R\ = repetition separator  \T\ = subcomponent separator
 *   \E\ = escape character      \X{hex}\ = hex-encoded bytes
 *
 * Carriage returns and line feeds inside a value are written as \X0D\ and
 * \X0A\ so they cannot be mistaken for segment terminators.
 */

import { DEFAULT_ENCODING_CHARACTERS, EncodingCharacters } from '../../model/EncodingCharacters.js';

export class HL7EscapeHandler {
  private readonly escapeChar: string;
  private readonly fieldSep: string;
  private readonly compSep: string;
  private readonly repSep: string;
  private readonly subSep: string;
  private readonly pattern: RegExp;

  constructor(encoding: EncodingCharacters = DEFAULT_ENCODING_CHARACTERS) {
    this.escapeChar = encoding.escapeCharacter;
    this.fieldSep = encoding.fieldSeparator;
    this.compSep = encoding.componentSeparator;
    this.repSep = encoding.repetitionSeparator;
    this.subSep = encoding.subcomponentSeparator;

    const e = escapeRegex(this.escapeChar);
    this.pattern = new RegExp(`${e}(F|S|R|T|E|X[0-9A-Fa-f]+)${e}`, 'g');
  }

  /**
   * "A|B" -> "A\F\B" with default delimiters.
   * The escape character goes first so its own sequences are not re-escaped.
   */
  escape(text: string): string {
    const e = this.escapeChar;

    let result = text.replaceAll(this.escapeChar, `${e}E${e}`);
    result = result.replaceAll(this.fieldSep, `${e}F${e}`);
    result = result.replaceAll(this.compSep, `${e}S${e}`);
    result = result.replaceAll(this.repSep, `${e}R${e}`);
    result = result.replaceAll(this.subSep, `${e}T${e}`);
    result = result.replaceAll('\r', `${e}X0D${e}`);
    result = result.replaceAll('\n', `${e}X0A${e}`);

    return result;
  }

  /**
   * "A\F\B" -> "A|B" with default delimiters. One left-to-right pass, so a
   * restored escape character never starts a new sequence. Unknown or
   * malformed sequences are kept verbatim.
   */
  unescape(text: string): string {
    if (!text.includes(this.escapeChar)) {
      return text;
    }

    return text.replace(this.pattern, (match: string, code: string) => {
      switch (code) {
        case 'F':
          return this.fieldSep;
        case 'S':
          return this.compSep;
        case 'R':
          return this.repSep;
        case 'T':
          return this.subSep;
        case 'E':
          return this.escapeChar;
        default: {
          const hex = code.substring(1);
          return hex.length % 2 === 0 ? Buffer.from(hex, 'hex').toString('utf-8') : match;
        }
      }
    });
  }

  /** True when the text contains a character that must be escaped */
  needsEscaping(text: string): boolean {
    return [this.escapeChar, this.fieldSep, this.compSep, this.repSep, this.subSep, '\r', '\n'].some((ch) =>
      text.includes(ch)
    );
  }
}

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
