import { describe, it, expect } from '@jest/globals';
import { decode } from '../../../../src/datatypes/hl7v2/HL7v2Decoder.js';
import { HL7v2Encoder, encode, encodeField } from '../../../../src/datatypes/hl7v2/HL7v2Encoder.js';
import { DEFAULT_ENCODING_CHARACTERS, createEncodingCharacters } from '../../../../src/model/EncodingCharacters.js';
import { Message } from '../../../../src/model/Message.js';
import { Segment } from '../../../../src/model/Segment.js';

function adtMessage(): Message {
  const message = new Message();
  message
    .add('MSH')
    .setText(1, '|')
    .setText(2, '^~\\&')
    .setText(3, 'APP')
    .setComponents(9, ['ADT', 'A01'])
    .setText(10, 'MSG001');
  message.add('PID').setText(1, '1').setComponents(5, ['Smith', 'John']);
  return message;
}

describe('HL7v2Encoder', () => {
  describe('encodeField', () => {
    it('should join repetitions, components and subcomponents', () => {
      expect(encodeField([[['A'], ['B', 'b']], [['C']]], DEFAULT_ENCODING_CHARACTERS)).toBe('A^B&b~C');
    });

    it('should escape delimiters inside leaves', () => {
      expect(encodeField([[['Smith^Jones'], ['O|Brien']]], DEFAULT_ENCODING_CHARACTERS)).toBe(
        'Smith\\S\\Jones^O\\F\\Brien'
      );
    });

    it('should write nothing for an absent field', () => {
      expect(encodeField(undefined, DEFAULT_ENCODING_CHARACTERS)).toBe('');
    });
  });

  describe('encode', () => {
    it('should write the header with MSH-2 unescaped and fields from MSH-3', () => {
      expect(encode(adtMessage())).toBe('MSH|^~\\&|APP||||||ADT^A01|MSG001\rPID|1||||Smith^John');
    });

    it('should use the configured segment delimiter and trailing delimiter', () => {
      const encoder = new HL7v2Encoder({ segmentDelimiter: '\n', trailingDelimiter: true });
      expect(encoder.encode(adtMessage())).toBe('MSH|^~\\&|APP||||||ADT^A01|MSG001\nPID|1||||Smith^John\n');
    });

    it('should elide empty segments unless asked to keep them', () => {
      const message = adtMessage();
      message.add('PV1');
      expect(encode(message).endsWith('Smith^John')).toBe(true);
      expect(encode(message, { includeEmptySegments: true }).endsWith('\rPV1')).toBe(true);
    });

    it('should write with the message encoding characters', () => {
      const encoding = createEncodingCharacters({ fieldSeparator: '#', componentSeparator: '@' });
      const message = new Message(encoding);
      message.add('MSH').setText(3, 'A#B');
      message.add('PID').setComponents(5, ['Smith', 'John']);
      expect(encode(message)).toBe('MSH#@~\\&#A\\F\\B\rPID#####Smith@John');
    });

    it('should keep MSH-2 characters past the standard four', () => {
      const decoded = decode('MSH|^~\\&#|A\rPID|1');
      expect(decoded.success).toBe(true);
      if (!decoded.success) return;

      expect(decoded.value.getSegment('MSH')?.getText(2)).toBe('^~\\&#');
      const text = encode(decoded.value);
      expect(text).toBe('MSH|^~\\&#|A\rPID|1');

      const again = decode(text);
      expect(again.success && again.value.equals(decoded.value)).toBe(true);
    });

    it('should fall back to the encoding characters when MSH-2 does not match them', () => {
      const message = adtMessage();
      message.getSegment('MSH')?.setText(2, '*~\\&');
      expect(encode(message).startsWith('MSH|^~\\&|APP|')).toBe(true);
    });

    it('should encode a single segment', () => {
      const pid = new Segment('PID').setText(3, '123');
      expect(new HL7v2Encoder().encodeSegment(pid, DEFAULT_ENCODING_CHARACTERS)).toBe('PID|||123');
    });
  });
});
