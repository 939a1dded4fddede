export { MessageValidator } from './MessageValidator.js';
export type { MessageValidatorOptions } from './MessageValidator.js';
export { ValidationMode, Severity, compareSeverity, parseValidationMode } from './ValidationTypes.js';
export type { IssueCode, ValidationIssue, ValidationResult } from './ValidationTypes.js';
export { SEVERITY_POLICY, severityFor } from './SeverityPolicy.js';
export type { CheckKind } from './SeverityPolicy.js';
export { checkDataFormat, FORMAT_CHECKED_TYPES } from './DataFormatChecks.js';
