import type { TableDefinition } from '../definitions/types.js';
import type { SeededRandom } from './SeededRandom.js';

/**
 * What a value source knows about the slot it is filling.
 */
export interface ValueContext {
  segmentCode: string;
  fieldPosition: number;
  /** e.g. "PID-5" or "OBX[2]-5" */
  fieldPath: string;
  fieldName: string;
  componentPosition?: number;
  componentName?: string;
  /** The referenced code table, when the store has it */
  table?: TableDefinition;
  maxLength?: number;
  /** The only randomness a source may use, so seeded compositions reproduce */
  random: SeededRandom;
  /** "Now" for the composition */
  referenceTime: Date;
}

/**
 * Generator of field content. The composer treats the returned text as
 * opaque; it is only trimmed to the field's declared length.
 */
export interface ValueSource {
  getValueFor(dataTypeCode: string, tableReference: string | undefined, context: ValueContext): string | Promise<string>;
}
