import type {
  DataTypeDefinition,
  SegmentSchema,
  TableDefinition,
  TriggerEvent,
  TriggerEventSummary,
} from './types.js';

/**
 * Read-only lookup of structural definitions. `undefined` means the
 * definition does not exist; callers turn that into a NotFound value.
 *
 * Implementations that cache must make concurrent first access safe:
 * two lookups of the same key never observe a half-loaded definition.
 */
export interface DefinitionStore {
  getSegment(code: string): Promise<SegmentSchema | undefined>;
  getTable(id: string): Promise<TableDefinition | undefined>;
  getTriggerEvent(code: string): Promise<TriggerEvent | undefined>;
  getDataType(code: string): Promise<DataTypeDefinition | undefined>;
  listTriggerEvents(): Promise<TriggerEventSummary[]>;
}
