/**
 * ER7 text -> message model.
 *
 * Each segment is split structurally first (field, repetition, component,
 * subcomponent) and only then are the leaves unescaped, so an escaped
 * delimiter never splits a value.
 */

import { MalformedInputError, malformedInput } from '../../errors/EngineErrors.js';
import type { EncodingCharacters } from '../../model/EncodingCharacters.js';
import type { FieldValue } from '../../model/FieldValue.js';
import { Message } from '../../model/Message.js';
import { HEADER_SEGMENT_CODE, Segment, isValidSegmentCode } from '../../model/Segment.js';
import { Result, fail, ok } from '../../util/Result.js';
import { getLogger, registerComponent } from '../../logging/index.js';
import { HL7EscapeHandler } from './HL7EscapeHandler.js';
import {
  HL7V2_DEFAULTS,
  HL7v2DecodeOptions,
  extractEncodingCharacters,
  getDefaultDecodeOptions,
  splitSegments,
} from './HL7v2Properties.js';

registerComponent('codec', 'HL7 v2 text encode/decode');
const logger = getLogger('codec');

export function decodeField(raw: string, encoding: EncodingCharacters): FieldValue {
  return parseField(raw, encoding, new HL7EscapeHandler(encoding));
}

function parseField(raw: string, encoding: EncodingCharacters, escaper: HL7EscapeHandler): FieldValue {
  return raw
    .split(encoding.repetitionSeparator)
    .map((rep) =>
      rep
        .split(encoding.componentSeparator)
        .map((comp) => comp.split(encoding.subcomponentSeparator).map((sub) => escaper.unescape(sub)))
    );
}

export class HL7v2Decoder {
  private readonly properties: HL7v2DecodeOptions;

  constructor(properties?: Partial<HL7v2DecodeOptions>) {
    this.properties = { ...getDefaultDecodeOptions(), ...properties };
  }

  decode(text: string): Result<Message, MalformedInputError> {
    if (text.trim() === '') {
      return fail(malformedInput('Message is empty', -1, text));
    }

    let lines = splitSegments(text.trimStart());
    if (this.properties.skipBlankLines) {
      lines = lines.filter((line) => line.trim() !== '');
    } else if (lines[lines.length - 1] === '') {
      // a trailing terminator is not an empty segment
      lines = lines.slice(0, -1);
    }

    const headerLine = lines[0] ?? '';
    if (!headerLine.startsWith(HEADER_SEGMENT_CODE)) {
      return fail(malformedInput(`First segment must be the ${HEADER_SEGMENT_CODE} header`, 0, headerLine));
    }
    if (headerLine.length < HL7V2_DEFAULTS.MIN_HEADER_LENGTH) {
      return fail(
        malformedInput(
          `Header segment is shorter than ${HL7V2_DEFAULTS.MIN_HEADER_LENGTH} characters`,
          0,
          headerLine
        )
      );
    }

    const encoding = extractEncodingCharacters(headerLine);
    if (!encoding) {
      return fail(malformedInput('Header does not declare a usable set of encoding characters', 0, headerLine));
    }

    const escaper = new HL7EscapeHandler(encoding);
    const message = new Message(encoding);
    message.addSegment(this.parseHeader(headerLine, encoding, escaper));

    for (let index = 1; index < lines.length; index++) {
      const line = lines[index] ?? '';
      const parsed = this.parseSegment(line, index, encoding, escaper);
      if (!parsed.success) {
        return parsed;
      }
      message.addSegment(parsed.value);
    }

    logger.trace(`Decoded ${message.getSegmentCount()} segments`);
    return ok(message);
  }

  private parseHeader(line: string, encoding: EncodingCharacters, escaper: HL7EscapeHandler): Segment {
    const parts = line.split(encoding.fieldSeparator);
    const header = new Segment(HEADER_SEGMENT_CODE);
    header.setText(1, encoding.fieldSeparator);
    header.setText(2, parts[1] ?? '');
    // parts[i] is MSH-(i+1): the field separator itself is MSH-1
    for (let i = 2; i < parts.length; i++) {
      header.setField(i + 1, parseField(parts[i] ?? '', encoding, escaper));
    }
    return header;
  }

  private parseSegment(
    line: string,
    index: number,
    encoding: EncodingCharacters,
    escaper: HL7EscapeHandler
  ): Result<Segment, MalformedInputError> {
    if (line.length < HL7V2_DEFAULTS.MIN_SEGMENT_LENGTH) {
      return fail(
        malformedInput(`Segment is shorter than ${HL7V2_DEFAULTS.MIN_SEGMENT_LENGTH} characters`, index, line)
      );
    }
    const code = line.substring(0, 3);
    if (!isValidSegmentCode(code)) {
      return fail(malformedInput(`Invalid segment id '${code}'`, index, line));
    }
    if (line.length > 3 && line.charAt(3) !== encoding.fieldSeparator) {
      return fail(malformedInput(`Segment id '${code}' is not followed by the field separator`, index, line));
    }
    if (code === HEADER_SEGMENT_CODE) {
      return ok(this.parseHeader(line, encoding, escaper));
    }

    const segment = new Segment(code);
    const parts = line.split(encoding.fieldSeparator);
    for (let position = 1; position < parts.length; position++) {
      segment.setField(position, parseField(parts[position] ?? '', encoding, escaper));
    }
    return ok(segment);
  }
}

export function decode(text: string, options?: Partial<HL7v2DecodeOptions>): Result<Message, MalformedInputError> {
  return new HL7v2Decoder(options).decode(text);
}
