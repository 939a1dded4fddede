export type {
  Optionality,
  Repeatability,
  SegmentField,
  SegmentSchema,
  TableType,
  TableValue,
  TableDefinition,
  DataTypeComponent,
  DataTypeDefinition,
  TriggerEvent,
  TriggerEventSegment,
  TriggerEventSummary,
} from './types.js';
export type { DefinitionStore } from './DefinitionStore.js';
export { InMemoryDefinitionStore } from './InMemoryDefinitionStore.js';
export type { DefinitionSet } from './InMemoryDefinitionStore.js';
export { JsonDefinitionStore, createDefinitionStore } from './JsonDefinitionStore.js';
export {
  SegmentRecordSchema,
  TableRecordSchema,
  DataTypeRecordSchema,
  TriggerEventRecordSchema,
} from './DefinitionRecordSchemas.js';
export {
  parseRepeatability,
  parseOptionality,
  maxOccurrences,
  isRepeatable,
  normalizeTableId,
  normalizeTriggerEventCode,
  parseLength,
  maxFieldPosition,
  isClosedTable,
  tableHasCode,
} from './DefinitionUtils.js';
export { buildStructureTree, collectSegmentCodes } from './StructureTree.js';
export type { StructureNode, SegmentNode, GroupNode } from './StructureTree.js';
