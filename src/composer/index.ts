export { MessageComposer, includesMessageStructure } from './MessageComposer.js';
export type { MessageComposerOptions } from './MessageComposer.js';
export type { ComposeOptions, ComposeTextOptions } from './ComposeOptions.js';
export { ClinicalFieldMapper, toHL7Timestamp } from './ClinicalFieldMapper.js';
export type { HeaderValues, MappingContext } from './ClinicalFieldMapper.js';
export { PinnedValues, parsePinKey } from './PinnedValues.js';
export { fitToLength } from './FieldFitting.js';
