/**
 * Message model -> ER7 text.
 */

import { EncodingCharacters, toMsh2 } from '../../model/EncodingCharacters.js';
import type { FieldValue } from '../../model/FieldValue.js';
import type { Message } from '../../model/Message.js';
import type { Segment } from '../../model/Segment.js';
import { HL7EscapeHandler } from './HL7EscapeHandler.js';
import { HL7v2EncodeOptions, getDefaultEncodeOptions } from './HL7v2Properties.js';

export function encodeField(value: FieldValue | undefined, encoding: EncodingCharacters): string {
  if (!value) return '';
  return new FieldWriter(encoding).write(value);
}

class FieldWriter {
  private readonly escaper: HL7EscapeHandler;

  constructor(private readonly encoding: EncodingCharacters) {
    this.escaper = new HL7EscapeHandler(encoding);
  }

  write(value: FieldValue): string {
    const { repetitionSeparator, componentSeparator, subcomponentSeparator } = this.encoding;
    return value
      .map((rep) =>
        rep
          .map((comp) => comp.map((sub) => this.escaper.escape(sub)).join(subcomponentSeparator))
          .join(componentSeparator)
      )
      .join(repetitionSeparator);
  }
}

export class HL7v2Encoder {
  private readonly properties: HL7v2EncodeOptions;

  constructor(properties?: Partial<HL7v2EncodeOptions>) {
    this.properties = { ...getDefaultEncodeOptions(), ...properties };
  }

  encode(message: Message): string {
    const encoding = message.getEncodingCharacters();
    const writer = new FieldWriter(encoding);

    const lines: string[] = [];
    for (const segment of message.getSegments()) {
      if (!segment.isHeader() && segment.isEmpty() && !this.properties.includeEmptySegments) {
        continue;
      }
      lines.push(this.writeSegment(segment, encoding, writer));
    }

    const delimiter = this.properties.segmentDelimiter;
    const body = lines.join(delimiter);
    return this.properties.trailingDelimiter && lines.length > 0 ? body + delimiter : body;
  }

  encodeSegment(segment: Segment, encoding: EncodingCharacters): string {
    return this.writeSegment(segment, encoding, new FieldWriter(encoding));
  }

  private writeSegment(segment: Segment, encoding: EncodingCharacters, writer: FieldWriter): string {
    const sep = encoding.fieldSeparator;
    const count = segment.getFieldCount();

    if (segment.isHeader()) {
      // MSH-1 is the separator itself and MSH-2 the raw encoding characters,
      // kept as decoded when it carries characters past the standard four
      const standard = toMsh2(encoding);
      const declared = segment.getText(2);
      const msh2 = declared.startsWith(standard) && !declared.includes(sep) ? declared : standard;
      const parts = [segment.getCode() + sep + msh2];
      for (let position = 3; position <= count; position++) {
        parts.push(writer.write(segment.getField(position) ?? [[['']]]));
      }
      return parts.join(sep);
    }

    const parts = [segment.getCode()];
    for (let position = 1; position <= count; position++) {
      parts.push(writer.write(segment.getField(position) ?? [[['']]]));
    }
    return parts.join(sep);
  }
}

export function encode(message: Message, options?: Partial<HL7v2EncodeOptions>): string {
  return new HL7v2Encoder(options).encode(message);
}
