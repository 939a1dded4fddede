/**
 * Vendor fingerprinting value types. Configurations are plain JSON-shaped
 * objects so they can be persisted and shipped as data.
 */

export const HL7V2_STANDARD = 'HL7v2';

/** Placeholder for header values a message does not carry */
export const UNKNOWN = 'Unknown';

export interface VendorSignature {
  /** Display name inferred from the application and facility */
  name: string;
  sendingApplication: string;
  sendingFacility: string;
  version: string;
  /** 0.5 base, +0.3 for a known application, +0.2 for a known facility */
  confidence: number;
}

export interface ConfigurationAddress {
  vendor: string;
  standard: string;
  /** Representative message type, e.g. "ADT^A01" */
  messageType: string;
}

/** Segment code to field position to the fraction of occurrences with that field populated */
export type FieldOccupancy = Record<string, Record<string, number>>;

export interface VendorConfiguration {
  address: ConfigurationAddress;
  signature: VendorSignature;
  fieldOccupancy: FieldOccupancy;
  /** Message type ("ADT^A01") to the number of samples that used it */
  messageTypes: Record<string, number>;
  confidence: number;
  sampleCount: number;
}

export interface VendorCandidate {
  configuration: VendorConfiguration;
  score: number;
  reasons: string[];
}

/**
 * What one sample contributes to learning.
 */
export interface MessageProfile {
  signature: VendorSignature;
  messageType: string | undefined;
  /** Occurrences of each segment code */
  segmentCounts: Record<string, number>;
  /** Occurrences of each segment code with a given field populated */
  fieldCounts: Record<string, Record<string, number>>;
}
