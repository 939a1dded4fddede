export { VendorFingerprintEngine, createFingerprintEngine, SCORE_WEIGHTS } from './VendorFingerprintEngine.js';
export type { FingerprintOptions, LearnOptions } from './VendorFingerprintEngine.js';
export {
  DEFAULT_VENDOR_NAME_RULES,
  inferVendorName,
  loadVendorNameRules,
  parseVendorNameRules,
  ruleMatches,
} from './VendorNameRules.js';
export type { RuleMatchType, VendorNameRule } from './VendorNameRules.js';
export {
  BASELINE_VENDOR_FILE,
  VendorConfigurationSchema,
  loadBaselineVendorConfigurations,
  loadVendorConfigurations,
  parseVendorConfigurations,
  saveVendorConfigurations,
} from './VendorConfigurationStore.js';
export { HL7V2_STANDARD, UNKNOWN } from './types.js';
export type {
  ConfigurationAddress,
  FieldOccupancy,
  MessageProfile,
  VendorCandidate,
  VendorConfiguration,
  VendorSignature,
} from './types.js';
