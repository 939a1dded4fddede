/**
 * Default Value Source
 *
 * Produces plausible primitive values from the data type and the name of
 * the field or component being filled. All randomness comes from
 * `context.random` and all dates from `context.referenceTime`.
 */

import { readFileSync } from 'fs';
import * as path from 'path';
import { format, subDays, subYears } from 'date-fns';
import { z } from 'zod';
import type { ValueContext, ValueSource } from './ValueSource.js';

const DemographicsSchema = z.object({
  familyNames: z.array(z.string()).nonempty(),
  givenNames: z.array(z.string()).nonempty(),
  streets: z.array(z.string()).nonempty(),
  places: z
    .array(z.object({ city: z.string(), state: z.string(), zipPrefix: z.string().regex(/^\d{3}$/) }))
    .nonempty(),
  words: z.array(z.string()).nonempty(),
});

export type DemographicsData = z.infer<typeof DemographicsSchema>;

export const DEFAULT_DEMOGRAPHICS_FILE = path.resolve(__dirname, '../../data/demographics.json');

export function loadDemographics(filePath: string = DEFAULT_DEMOGRAPHICS_FILE): DemographicsData {
  return DemographicsSchema.parse(JSON.parse(readFileSync(filePath, 'utf-8')));
}

type NameHint = 'family' | 'given' | 'middle' | 'street' | 'city' | 'state' | 'zip' | 'country' | 'phone' | 'birth' | 'identifier' | 'sex';

const HINT_PATTERNS: ReadonlyArray<[RegExp, NameHint]> = [
  [/family|last name|surname/, 'family'],
  [/given|first name/, 'given'],
  [/middle|second and further/, 'middle'],
  [/street|address line/, 'street'],
  [/city/, 'city'],
  [/state|province/, 'state'],
  [/zip|postal/, 'zip'],
  [/country/, 'country'],
  [/phone|telecom/, 'phone'],
  [/birth/, 'birth'],
  [/\bsex\b|gender/, 'sex'],
  [/\bid\b|identifier|number|\bmrn\b/, 'identifier'],
];

/** Component names win over the field name: "Family Name" inside "Patient Name" */
function nameHint(context: ValueContext): NameHint | undefined {
  const candidates = [context.componentName, context.fieldName];
  for (const candidate of candidates) {
    if (!candidate) continue;
    const lower = candidate.toLowerCase();
    for (const [pattern, hint] of HINT_PATTERNS) {
      if (pattern.test(lower)) return hint;
    }
  }
  return undefined;
}

export class DefaultValueSource implements ValueSource {
  private data: DemographicsData | undefined;

  constructor(data?: DemographicsData) {
    this.data = data;
  }

  private demographics(): DemographicsData {
    this.data ??= loadDemographics();
    return this.data;
  }

  getValueFor(dataTypeCode: string, _tableReference: string | undefined, context: ValueContext): string {
    const { random } = context;
    const table = context.table;
    if (table && table.values.length > 0) {
      return random.pick(table.values).code;
    }

    const type = dataTypeCode.toUpperCase();
    const temporal = this.temporalValue(type, context);
    if (temporal !== undefined) return temporal;

    switch (type) {
      case 'NM':
        return String(random.nextInt(1, 999));
      case 'SI':
        return '1';
    }

    const byName = this.valueForHint(nameHint(context), context);
    if (byName !== undefined) return byName;

    switch (type) {
      case 'ID':
      case 'IS':
        return random.pick(['A', 'B', 'C', 'N', 'Y']);
      case 'CX':
      case 'CK':
      case 'CM':
      case 'EI':
        return random.digits(8);
      case 'XTN':
      case 'TN':
        return this.phone(context);
      default:
        return random.pick(this.demographics().words);
    }
  }

  private temporalValue(type: string, context: ValueContext): string | undefined {
    const { random, referenceTime } = context;
    const isBirth = nameHint(context) === 'birth';
    switch (type) {
      case 'DT': {
        const date = isBirth
          ? subYears(referenceTime, random.nextInt(1, 90))
          : subDays(referenceTime, random.nextInt(0, 365));
        return format(date, 'yyyyMMdd');
      }
      case 'TS':
      case 'DTM': {
        if (isBirth) {
          return format(subYears(referenceTime, random.nextInt(1, 90)), 'yyyyMMdd');
        }
        return format(subDays(referenceTime, random.nextInt(0, 30)), 'yyyyMMddHHmmss');
      }
      case 'TM':
        return format(referenceTime, 'HHmmss');
      default:
        return undefined;
    }
  }

  private valueForHint(hint: NameHint | undefined, context: ValueContext): string | undefined {
    const { random } = context;
    const data = this.demographics();
    switch (hint) {
      case 'family':
        return random.pick(data.familyNames);
      case 'given':
        return random.pick(data.givenNames);
      case 'middle':
        return random.pick(data.givenNames).charAt(0);
      case 'street':
        return `${random.nextInt(1, 9999)} ${random.pick(data.streets)}`;
      case 'city':
        return random.pick(data.places).city;
      case 'state':
        return random.pick(data.places).state;
      case 'zip': {
        const place = random.pick(data.places);
        return place.zipPrefix + random.digits(2);
      }
      case 'country':
        return 'USA';
      case 'phone':
        return this.phone(context);
      case 'sex':
        return random.pick(['F', 'M']);
      case 'identifier':
        return random.digits(8);
      case 'birth':
      case undefined:
        return undefined;
    }
  }

  private phone(context: ValueContext): string {
    return `(555)555-${context.random.digits(4)}`;
  }
}
