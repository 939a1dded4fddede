/**
 * Severity of each check per validation mode. `undefined` means the check
 * is not reported in that mode. Every row is non-increasing from Strict to
 * Lenient, so a looser mode never reports something a stricter one does not.
 */

import { Severity, ValidationMode } from './ValidationTypes.js';

export type CheckKind =
  | 'HEADER_NOT_FIRST'
  | 'UNKNOWN_SEGMENT'
  | 'UNKNOWN_Z_SEGMENT'
  | 'UNKNOWN_TRIGGER_EVENT'
  | 'EXTRA_FIELDS'
  | 'REQUIRED_FIELD_MISSING'
  | 'FIELD_TOO_LONG'
  | 'TOO_MANY_REPETITIONS'
  | 'CLOSED_TABLE_VALUE_UNKNOWN'
  | 'OPEN_TABLE_VALUE_UNKNOWN'
  | 'INVALID_DATA_FORMAT'
  | 'REQUIRED_SEGMENT_MISSING'
  | 'UNEXPECTED_SEGMENT';

type Row = readonly [strict: Severity, compatibility: Severity | undefined, lenient: Severity | undefined];

const E = Severity.Error;
const W = Severity.Warning;
const I = Severity.Info;

export const SEVERITY_POLICY: Readonly<Record<CheckKind, Row>> = {
  HEADER_NOT_FIRST: [E, E, E],
  UNKNOWN_SEGMENT: [E, W, I],
  UNKNOWN_Z_SEGMENT: [I, I, I],
  UNKNOWN_TRIGGER_EVENT: [I, I, I],
  EXTRA_FIELDS: [E, W, undefined],
  REQUIRED_FIELD_MISSING: [E, E, E],
  FIELD_TOO_LONG: [E, W, undefined],
  TOO_MANY_REPETITIONS: [E, W, undefined],
  CLOSED_TABLE_VALUE_UNKNOWN: [E, W, undefined],
  OPEN_TABLE_VALUE_UNKNOWN: [W, I, undefined],
  INVALID_DATA_FORMAT: [E, W, undefined],
  REQUIRED_SEGMENT_MISSING: [E, W, I],
  UNEXPECTED_SEGMENT: [E, W, undefined],
};

export function severityFor(check: CheckKind, mode: ValidationMode): Severity | undefined {
  const [strict, compatibility, lenient] = SEVERITY_POLICY[check];
  switch (mode) {
    case ValidationMode.Strict:
      return strict;
    case ValidationMode.Compatibility:
      return compatibility;
    case ValidationMode.Lenient:
      return lenient;
  }
}
