/**
 * HL7v2 ER7 codec: escape handling, encoding and decoding.
 */

export {
  HL7V2_DEFAULTS,
  getDefaultEncodeOptions,
  getDefaultDecodeOptions,
  extractEncodingCharacters,
  splitSegments,
} from './HL7v2Properties.js';
export type { HL7v2EncodeOptions, HL7v2DecodeOptions } from './HL7v2Properties.js';

export { HL7EscapeHandler } from './HL7EscapeHandler.js';
export { HL7v2Encoder, encode, encodeField } from './HL7v2Encoder.js';
export { HL7v2Decoder, decode, decodeField } from './HL7v2Decoder.js';
