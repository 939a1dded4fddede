/**
 * hl7v2-engine
 *
 * Compose, encode, decode and validate HL7 v2.x messages from structural
 * definitions, and fingerprint messages to infer the sending vendor.
 */

export * from './model/index.js';
export * from './datatypes/hl7v2/index.js';
export * from './definitions/index.js';
export * from './values/index.js';
export * from './composer/index.js';
export * from './validation/index.js';
export * from './fingerprint/index.js';
export * from './util/index.js';
export type {
  Address,
  ClinicalInput,
  ClinicalInputKind,
  CodedValue,
  Encounter,
  Observation,
  Order,
  Patient,
  PersonName,
  Prescription,
  Provider,
} from './clinical/types.js';
export {
  excerptOf,
  notFound,
  malformedInput,
  composeFatal,
  emptySegmentFatal,
  definitionError,
  formatEngineError,
  DefinitionLoadError,
  VendorDataError,
} from './errors/EngineErrors.js';
export type {
  ComposeError,
  ComposeFatalError,
  DefinitionEntity,
  DefinitionError,
  EngineError,
  MalformedInputError,
  NoValidMessagesError,
  NotFoundError,
  UnidentifiableError,
  UnknownTriggerEventError,
} from './errors/EngineErrors.js';
export { getEngineConfig, resetEngineConfig } from './config/EngineConfig.js';
export type { EngineConfiguration } from './config/EngineConfig.js';
export { getLogger, initializeLogging, shutdownLogging, setGlobalLevel, LogLevel } from './logging/index.js';
