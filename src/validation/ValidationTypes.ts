export enum ValidationMode {
  Strict = 'strict',
  Compatibility = 'compatibility',
  Lenient = 'lenient',
}

/** Ordered Error > Warning > Info */
export enum Severity {
  Info = 'info',
  Warning = 'warning',
  Error = 'error',
}

const SEVERITY_RANK: Record<Severity, number> = {
  [Severity.Info]: 0,
  [Severity.Warning]: 1,
  [Severity.Error]: 2,
};

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function parseValidationMode(value: string | undefined): ValidationMode | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'strict':
      return ValidationMode.Strict;
    case 'compatibility':
    case 'compat':
      return ValidationMode.Compatibility;
    case 'lenient':
      return ValidationMode.Lenient;
    default:
      return undefined;
  }
}

export type IssueCode =
  | 'HEADER_NOT_FIRST'
  | 'UNKNOWN_SEGMENT'
  | 'UNKNOWN_TRIGGER_EVENT'
  | 'EXTRA_FIELDS'
  | 'REQUIRED_FIELD_MISSING'
  | 'FIELD_TOO_LONG'
  | 'TOO_MANY_REPETITIONS'
  | 'TABLE_VALUE_UNKNOWN'
  | 'INVALID_DATA_FORMAT'
  | 'REQUIRED_SEGMENT_MISSING'
  | 'UNEXPECTED_SEGMENT';

export interface ValidationIssue {
  code: IssueCode;
  message: string;
  /** "PID-5", "OBX[2]-3", or a bare segment code / group name for structural issues */
  fieldPath: string;
  severity: Severity;
  /** Zero-based segment index, -1 when the issue is about something absent */
  segmentIndex: number;
}

export interface ValidationResult {
  mode: ValidationMode;
  /** True when no issue has Error severity */
  isValid: boolean;
  issues: ValidationIssue[];
  errorCount: number;
  warningCount: number;
  infoCount: number;
}
