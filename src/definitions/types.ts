/**
 * Structural definitions consumed by the composer and validator.
 * All of these are read-only once loaded.
 */

/** R = required, O = optional, C = conditional, B = excluded (backward compatibility only) */
export type Optionality = 'R' | 'O' | 'C' | 'B';

export type Repeatability =
  | { kind: 'single' }
  | { kind: 'bounded'; max: number }
  | { kind: 'unbounded' };

export interface SegmentField {
  position: number;
  name: string;
  dataType: string;
  optionality: Optionality;
  repeatability: Repeatability;
  /** Maximum length per repetition; undefined means no declared limit */
  length?: number;
  /** Four-digit code table id, e.g. "0001" */
  table?: string;
  description?: string;
}

export interface SegmentSchema {
  code: string;
  name: string;
  description: string;
  fields: SegmentField[];
}

export type TableType = 'HL7' | 'User';

export interface TableValue {
  code: string;
  description: string;
}

export interface TableDefinition {
  id: string;
  name: string;
  /** HL7-defined tables are closed; user-defined tables are open to local codes */
  type: TableType;
  values: TableValue[];
}

export interface DataTypeComponent {
  position: number;
  name: string;
  dataType: string;
  optionality: Optionality;
  table?: string;
  length?: number;
}

export interface DataTypeDefinition {
  code: string;
  name: string;
  description: string;
  category?: string;
  /** Empty for primitive types */
  components: DataTypeComponent[];
}

export interface TriggerEventSegment {
  /** null for a group entry */
  segmentCode: string | null;
  /** Segment code, or the group's name */
  name: string;
  description?: string;
  optionality: Optionality;
  repeatability: Repeatability;
  level: number;
  /** Names of the enclosing groups, outermost first */
  groupPath: string[];
}

export interface TriggerEvent {
  /** Normalised, e.g. "ADT_A01" */
  code: string;
  name: string;
  version: string;
  chapter: string;
  description: string;
  segments: TriggerEventSegment[];
}

export interface TriggerEventSummary {
  code: string;
  name: string;
}
