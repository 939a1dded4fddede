import type { EncodingCharacters } from '../model/EncodingCharacters.js';
import type { HL7v2EncodeOptions } from '../datatypes/hl7v2/HL7v2Properties.js';

export interface ComposeOptions {
  /** Seeds every random draw; same seed and inputs give byte-identical output */
  seed?: number | string;
  /** Stamp the message with the wall clock even when seeded */
  useCurrentTime?: boolean;
  /** Explicit "now" for timestamps; wins over seed and useCurrentTime */
  referenceTime?: Date;
  /** Field values keyed "PID-5", "OBX[2]-5" or "PID-5.1" */
  pinned?: Record<string, string>;
  /** Generate optional and conditional fields too (default false) */
  includeOptionalFields?: boolean;
  /** Optional segments or groups (by code or group name) to include */
  includeSegments?: string[];
  /** Inclusion probability in [0,1] for optional segments or groups, drawn from the seed */
  segmentProbabilities?: Record<string, number>;
  /** Repetitions per segment code or group name (default 1, clamped to repeatability) */
  repetitions?: Record<string, number>;
  sendingApplication?: string;
  sendingFacility?: string;
  receivingApplication?: string;
  receivingFacility?: string;
  version?: string;
  processingId?: string;
  controlId?: string;
  encoding?: EncodingCharacters;
}

export interface ComposeTextOptions extends ComposeOptions {
  encodeOptions?: Partial<HL7v2EncodeOptions>;
}
