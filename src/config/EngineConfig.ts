/**
 * Engine Configuration
 *
 * Defaults for header values, validation and fingerprinting, read from
 * environment variables once and cached. Explicit options passed to the
 * composer, validator or fingerprint engine always take precedence.
 */

import { ValidationMode, parseValidationMode } from '../validation/ValidationTypes.js';

export interface EngineConfiguration {
  /** MSH-3 (HL7_ENGINE_SENDING_APPLICATION) */
  sendingApplication: string;
  /** MSH-4 (HL7_ENGINE_SENDING_FACILITY) */
  sendingFacility: string;
  /** MSH-5 (HL7_ENGINE_RECEIVING_APPLICATION) */
  receivingApplication: string;
  /** MSH-6 (HL7_ENGINE_RECEIVING_FACILITY) */
  receivingFacility: string;
  /** MSH-12 when neither options nor the trigger event name one (HL7_ENGINE_VERSION) */
  version: string;
  /** MSH-11 (HL7_ENGINE_PROCESSING_ID) */
  processingId: string;
  validationMode: ValidationMode;
  /** Root directory for createDefinitionStore (HL7_ENGINE_DEFINITIONS_DIR) */
  definitionsDir?: string;
  /** JSON list of vendor-name rules (HL7_ENGINE_VENDOR_RULES_FILE) */
  vendorRulesFile?: string;
  /** Candidates must score above this to be ranked (HL7_ENGINE_MIN_VENDOR_SCORE) */
  minimumVendorScore: number;
}

let cachedConfig: EngineConfiguration | null = null;

function envString(name: string, fallback: string): string {
  const value = process.env[name];
  return value && value.trim() !== '' ? value.trim() : fallback;
}

function envOptional(name: string): string | undefined {
  const value = process.env[name];
  return value && value.trim() !== '' ? value.trim() : undefined;
}

function envScore(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed >= 0 && parsed <= 1 ? parsed : fallback;
}

export function getEngineConfig(): EngineConfiguration {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    sendingApplication: envString('HL7_ENGINE_SENDING_APPLICATION', 'HL7ENGINE'),
    sendingFacility: envString('HL7_ENGINE_SENDING_FACILITY', 'HL7ENGINE_FAC'),
    receivingApplication: envString('HL7_ENGINE_RECEIVING_APPLICATION', 'RECEIVER'),
    receivingFacility: envString('HL7_ENGINE_RECEIVING_FACILITY', 'RECEIVER_FAC'),
    version: envString('HL7_ENGINE_VERSION', '2.3'),
    processingId: envString('HL7_ENGINE_PROCESSING_ID', 'P'),
    validationMode: parseValidationMode(process.env['HL7_ENGINE_VALIDATION_MODE']) ?? ValidationMode.Strict,
    definitionsDir: envOptional('HL7_ENGINE_DEFINITIONS_DIR'),
    vendorRulesFile: envOptional('HL7_ENGINE_VENDOR_RULES_FILE'),
    minimumVendorScore: envScore('HL7_ENGINE_MIN_VENDOR_SCORE', 0.1),
  };

  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetEngineConfig(): void {
  cachedConfig = null;
}
