/**
 * Fixed structural mapping from clinical input and message context onto
 * segment fields. A mapping returns undefined when the input it needs was
 * not supplied, leaving the field to the next resolution step.
 */

import { format, isValid, parseISO } from 'date-fns';
import type { ClinicalInput, ClinicalInputKind, CodedValue, Provider } from '../clinical/types.js';
import { EncodingCharacters, toMsh2 } from '../model/EncodingCharacters.js';
import { FieldValue, componentsField, isEmptyFieldValue, textField } from '../model/FieldValue.js';

export interface HeaderValues {
  sendingApplication: string;
  sendingFacility: string;
  receivingApplication: string;
  receivingFacility: string;
  /** yyyyMMddHHmmss */
  timestamp: string;
  messageType: string[];
  controlId: string;
  processingId: string;
  version: string;
}

export interface MappingContext {
  input: ClinicalInput;
  header: HeaderValues;
  encoding: EncodingCharacters;
  /** Trigger event part of the message type, e.g. "A01" */
  eventCode: string;
  /** 1-based occurrence of this segment code in the message */
  occurrence: number;
  /** 1-based Set ID, counted within the enclosing group instance */
  setId: number;
}

type Mapped = string | readonly string[] | undefined;
type FieldMapping = (ctx: MappingContext) => Mapped;

/**
 * ISO date or date-time to HL7 DT/TS text. Values that do not parse are
 * passed through unchanged.
 */
export function toHL7Timestamp(iso: string | undefined): string | undefined {
  if (!iso) return undefined;
  const date = parseISO(iso);
  if (!isValid(date)) return iso;
  return iso.includes('T') ? format(date, 'yyyyMMddHHmmss') : format(date, 'yyyyMMdd');
}

function coded(value: CodedValue | undefined): Mapped {
  return value ? [value.code, value.text ?? '', value.codingSystem ?? ''] : undefined;
}

function provider(value: Provider | undefined): Mapped {
  return value ? [value.id ?? '', value.family, value.given ?? ''] : undefined;
}

const MAPPINGS: Record<string, Record<number, FieldMapping>> = {
  MSH: {
    1: (c) => c.encoding.fieldSeparator,
    2: (c) => toMsh2(c.encoding),
    3: (c) => c.header.sendingApplication,
    4: (c) => c.header.sendingFacility,
    5: (c) => c.header.receivingApplication,
    6: (c) => c.header.receivingFacility,
    7: (c) => c.header.timestamp,
    9: (c) => c.header.messageType,
    10: (c) => c.header.controlId,
    11: (c) => c.header.processingId,
    12: (c) => c.header.version,
  },
  EVN: {
    1: (c) => c.eventCode,
    2: (c) => c.header.timestamp,
  },
  PID: {
    1: (c) => String(c.setId),
    3: ({ input: { patient } }) =>
      patient.id ? [patient.id, '', '', patient.idAuthority ?? ''] : undefined,
    5: ({ input: { patient } }) => [
      patient.name.family,
      patient.name.given ?? '',
      patient.name.middle ?? '',
      patient.name.suffix ?? '',
      patient.name.prefix ?? '',
    ],
    7: ({ input: { patient } }) => toHL7Timestamp(patient.birthDate),
    8: ({ input: { patient } }) => patient.sex,
    11: ({ input: { patient } }) => {
      const a = patient.address;
      return a
        ? [a.street ?? '', a.otherDesignation ?? '', a.city ?? '', a.state ?? '', a.postalCode ?? '', a.country ?? '']
        : undefined;
    },
    13: ({ input: { patient } }) => patient.phone,
  },
  PV1: {
    1: (c) => (c.input.encounter ? String(c.setId) : undefined),
    2: ({ input: { encounter } }) => encounter?.patientClass,
    3: ({ input: { encounter } }) => {
      const l = encounter?.location;
      return l ? [l.pointOfCare ?? '', l.room ?? '', l.bed ?? '', l.facility ?? ''] : undefined;
    },
    7: ({ input: { encounter } }) => provider(encounter?.attendingDoctor),
    19: ({ input: { encounter } }) => encounter?.id,
    44: ({ input: { encounter } }) => toHL7Timestamp(encounter?.admitDate),
    45: ({ input: { encounter } }) => toHL7Timestamp(encounter?.dischargeDate),
  },
  ORC: {
    1: ({ input: { order, prescription } }) =>
      order ? (order.orderControl ?? 'NW') : prescription ? 'NW' : undefined,
    2: ({ input: { order } }) => order?.placerOrderNumber,
    3: ({ input: { order } }) => order?.fillerOrderNumber,
    9: ({ input: { order } }) => toHL7Timestamp(order?.orderedAt),
    12: ({ input: { order, prescription } }) => provider(order?.orderingProvider ?? prescription?.prescriber),
  },
  OBR: {
    1: (c) => (c.input.order || c.input.observation ? String(c.setId) : undefined),
    2: ({ input: { order } }) => order?.placerOrderNumber,
    3: ({ input: { order } }) => order?.fillerOrderNumber,
    4: ({ input: { order } }) => coded(order?.service),
    7: ({ input: { order, observation } }) => toHL7Timestamp(observation?.observedAt ?? order?.orderedAt),
  },
  OBX: {
    1: (c) => (c.input.observation ? String(c.setId) : undefined),
    2: ({ input: { observation } }) => (observation ? (observation.valueType ?? 'ST') : undefined),
    3: ({ input: { observation } }) => coded(observation?.identifier),
    5: ({ input: { observation } }) => observation?.value,
    6: ({ input: { observation } }) => observation?.units,
    7: ({ input: { observation } }) => observation?.referenceRange,
    8: ({ input: { observation } }) => observation?.abnormalFlag,
    11: ({ input: { observation } }) => (observation ? (observation.resultStatus ?? 'F') : undefined),
    14: ({ input: { observation } }) => toHL7Timestamp(observation?.observedAt),
  },
  RXO: {
    1: ({ input: { prescription } }) => coded(prescription?.drug),
    2: ({ input: { prescription } }) => prescription?.amount,
    4: ({ input: { prescription } }) => prescription?.units,
  },
  RXE: {
    2: ({ input: { prescription } }) => coded(prescription?.drug),
    3: ({ input: { prescription } }) => prescription?.amount,
    5: ({ input: { prescription } }) => prescription?.units,
    6: ({ input: { prescription } }) => prescription?.dosageForm,
    10: ({ input: { prescription } }) => prescription?.dispenseAmount,
    12: ({ input: { prescription } }) =>
      prescription?.refills !== undefined ? String(prescription.refills) : undefined,
  },
};

/** Which clinical input a segment's content comes from */
const SEGMENT_INPUTS: Record<string, readonly ClinicalInputKind[]> = {
  PID: ['patient'],
  PV1: ['encounter'],
  ORC: ['order', 'prescription'],
  OBR: ['order', 'observation'],
  OBX: ['observation'],
  RXO: ['prescription'],
  RXE: ['prescription'],
};

export class ClinicalFieldMapper {
  /**
   * Value for a field from the fixed mappings, or undefined when there is
   * no mapping or the input it needs is absent.
   */
  map(segmentCode: string, position: number, ctx: MappingContext): FieldValue | undefined {
    const mapping = MAPPINGS[segmentCode]?.[position];
    if (!mapping) return undefined;

    const mapped = mapping(ctx);
    if (mapped === undefined) return undefined;
    const value = typeof mapped === 'string' ? textField(mapped) : componentsField(mapped);
    return isEmptyFieldValue(value) ? undefined : value;
  }

  /** True when the supplied input carries data for this segment */
  hasInputFor(segmentCode: string, input: ClinicalInput): boolean {
    const kinds = SEGMENT_INPUTS[segmentCode];
    return kinds !== undefined && kinds.some((kind) => input[kind] !== undefined);
  }
}
