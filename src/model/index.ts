/**
 * Message model: encoding characters, field values, segments and messages.
 */

export {
  DEFAULT_ENCODING_CHARACTERS,
  createEncodingCharacters,
  describeEncodingProblem,
  encodingCharacterList,
  toMsh2,
} from './EncodingCharacters.js';
export type { EncodingCharacters } from './EncodingCharacters.js';
export {
  emptyField,
  textField,
  componentsField,
  isEmptyFieldValue,
  normalizeFieldValue,
  cloneFieldValue,
  fieldValuesEqual,
  getLeaf,
} from './FieldValue.js';
export type { FieldValue } from './FieldValue.js';
export { Segment, HEADER_SEGMENT_CODE, isValidSegmentCode, isZSegment } from './Segment.js';
export { Message } from './Message.js';
export type { MessageType } from './Message.js';
