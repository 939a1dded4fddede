import type { DefinitionStore } from './DefinitionStore.js';
import { normalizeTableId, normalizeTriggerEventCode } from './DefinitionUtils.js';
import type {
  DataTypeDefinition,
  SegmentSchema,
  TableDefinition,
  TriggerEvent,
  TriggerEventSummary,
} from './types.js';

export interface DefinitionSet {
  segments?: SegmentSchema[];
  tables?: TableDefinition[];
  triggerEvents?: TriggerEvent[];
  dataTypes?: DataTypeDefinition[];
}

/**
 * Definitions held in memory, for callers that load or build them
 * themselves.
 */
export class InMemoryDefinitionStore implements DefinitionStore {
  private readonly segments = new Map<string, SegmentSchema>();
  private readonly tables = new Map<string, TableDefinition>();
  private readonly triggerEvents = new Map<string, TriggerEvent>();
  private readonly dataTypes = new Map<string, DataTypeDefinition>();

  constructor(definitions: DefinitionSet = {}) {
    definitions.segments?.forEach((s) => this.addSegment(s));
    definitions.tables?.forEach((t) => this.addTable(t));
    definitions.triggerEvents?.forEach((e) => this.addTriggerEvent(e));
    definitions.dataTypes?.forEach((d) => this.addDataType(d));
  }

  addSegment(schema: SegmentSchema): this {
    this.segments.set(schema.code.toUpperCase(), schema);
    return this;
  }

  addTable(table: TableDefinition): this {
    this.tables.set(normalizeTableId(table.id) ?? table.id, table);
    return this;
  }

  addTriggerEvent(event: TriggerEvent): this {
    this.triggerEvents.set(normalizeTriggerEventCode(event.code), event);
    return this;
  }

  addDataType(dataType: DataTypeDefinition): this {
    this.dataTypes.set(dataType.code.toUpperCase(), dataType);
    return this;
  }

  async getSegment(code: string): Promise<SegmentSchema | undefined> {
    return this.segments.get(code.toUpperCase());
  }

  async getTable(id: string): Promise<TableDefinition | undefined> {
    return this.tables.get(normalizeTableId(id) ?? id);
  }

  async getTriggerEvent(code: string): Promise<TriggerEvent | undefined> {
    return this.triggerEvents.get(normalizeTriggerEventCode(code));
  }

  async getDataType(code: string): Promise<DataTypeDefinition | undefined> {
    return this.dataTypes.get(code.toUpperCase());
  }

  async listTriggerEvents(): Promise<TriggerEventSummary[]> {
    return [...this.triggerEvents.values()]
      .map((e) => ({ code: normalizeTriggerEventCode(e.code), name: e.name }))
      .sort((a, b) => a.code.localeCompare(b.code));
  }
}
