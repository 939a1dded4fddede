/**
 * Vendor Fingerprint Engine
 *
 * Infers which vendor system produced a message from its header alone:
 * sending application, sending facility, version and message type. Works
 * on raw text so messages from any source can be scored without a full
 * decode.
 *
 *   const engine = new VendorFingerprintEngine();
 *   const ranked = engine.rankCandidates(text, await loadBaselineVendorConfigurations());
 */

import { getEngineConfig } from '../config/EngineConfig.js';
import { decodeField } from '../datatypes/hl7v2/HL7v2Decoder.js';
import { extractEncodingCharacters, splitSegments } from '../datatypes/hl7v2/HL7v2Properties.js';
import { MalformedInputError, NoValidMessagesError, malformedInput } from '../errors/EngineErrors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import { DEFAULT_ENCODING_CHARACTERS, EncodingCharacters } from '../model/EncodingCharacters.js';
import { getLeaf } from '../model/FieldValue.js';
import { HEADER_SEGMENT_CODE, isValidSegmentCode } from '../model/Segment.js';
import { Result, fail, ok } from '../util/Result.js';
import { DEFAULT_VENDOR_NAME_RULES, VendorNameRule, inferVendorName, loadVendorNameRules } from './VendorNameRules.js';
import {
  FieldOccupancy,
  HL7V2_STANDARD,
  MessageProfile,
  UNKNOWN,
  VendorCandidate,
  VendorConfiguration,
  VendorSignature,
} from './types.js';

registerComponent('fingerprint', 'Vendor fingerprinting');
const logger = getLogger('fingerprint');

/** Score weights in points out of 100 */
export const SCORE_WEIGHTS = Object.freeze({
  name: 40,
  application: 30,
  facility: 20,
  messageType: 10,
});

const MAX_LEARNED_CONFIDENCE = 0.95;

export interface FingerprintOptions {
  /** Vendor-name rules, highest priority first */
  rules?: readonly VendorNameRule[];
  /** Candidates must score strictly above this to be ranked */
  minimumScore?: number;
  /** Header shape accepted by canFingerprint */
  encoding?: EncodingCharacters;
  /** Samples needed before learned confidence can reach its ceiling (default 10) */
  fullConfidenceSampleCount?: number;
}

export interface LearnOptions {
  /** Overrides the inferred vendor name on the learned configuration */
  vendorName?: string;
  fullConfidenceSampleCount?: number;
}

interface HeaderFields {
  encoding: EncodingCharacters;
  parts: string[];
}

function firstLine(text: string): string | undefined {
  return splitSegments(text)
    .map((line) => line.trim())
    .find((line) => line !== '');
}

function equalsIgnoreCase(a: string, b: string): boolean {
  return a.toUpperCase() === b.toUpperCase();
}

function confidenceBand(score: number): string {
  if (score > 0.8) return 'High confidence match';
  if (score > 0.6) return 'Medium confidence match';
  return 'Low confidence match';
}

export class VendorFingerprintEngine {
  private readonly rules: readonly VendorNameRule[];
  private readonly minimumScore: number;
  private readonly encoding: EncodingCharacters;
  private readonly fullConfidenceSampleCount: number;

  constructor(options: FingerprintOptions = {}) {
    this.rules = options.rules ?? DEFAULT_VENDOR_NAME_RULES;
    this.minimumScore = options.minimumScore ?? getEngineConfig().minimumVendorScore;
    this.encoding = options.encoding ?? DEFAULT_ENCODING_CHARACTERS;
    this.fullConfidenceSampleCount = options.fullConfidenceSampleCount ?? 10;
    if (this.fullConfidenceSampleCount < 1) {
      throw new RangeError(`fullConfidenceSampleCount must be at least 1, got ${this.fullConfidenceSampleCount}`);
    }
  }

  /**
   * Quick shape check of the header line; no decoding.
   */
  canFingerprint(text: string): boolean {
    const line = firstLine(text);
    if (!line || !line.startsWith(HEADER_SEGMENT_CODE) || line.length < 8) {
      return false;
    }
    if (line.charAt(3) !== this.encoding.fieldSeparator) {
      return false;
    }
    return line
      .substring(4, 8)
      .startsWith(this.encoding.componentSeparator + this.encoding.repetitionSeparator);
  }

  extractSignature(text: string): Result<VendorSignature, MalformedInputError> {
    const header = this.readHeader(text);
    if (!header) {
      return fail(malformedInput(`Text does not begin with an ${HL7V2_STANDARD} header`, 0, text));
    }

    const application = this.headerValue(header, 3) ?? UNKNOWN;
    const facility = this.headerValue(header, 4) ?? UNKNOWN;
    const version = this.headerValue(header, 12) ?? UNKNOWN;

    let points = 50;
    if (application !== UNKNOWN) points += 30;
    if (facility !== UNKNOWN) points += 20;

    return ok({
      name: inferVendorName(this.rules, application, facility),
      sendingApplication: application,
      sendingFacility: facility,
      version,
      confidence: points / 100,
    });
  }

  /**
   * Additive weighted match of a message against one configuration, in [0, 1].
   * Text that cannot be fingerprinted scores 0.
   */
  scoreAgainst(text: string, configuration: VendorConfiguration): number {
    const signature = this.extractSignature(text);
    if (!signature.success || configuration.address.standard !== HL7V2_STANDARD) {
      return 0;
    }
    return this.match(signature.value, this.messageTypeOf(text), configuration).score;
  }

  /**
   * Candidates above the minimum score, best first. Never fails; an
   * unrecognizable message yields an empty list.
   */
  rankCandidates(text: string, configurations: readonly VendorConfiguration[]): VendorCandidate[] {
    const signature = this.extractSignature(text);
    if (!signature.success) {
      logger.debug(`Not ranking: ${signature.error.message}`);
      return [];
    }
    const messageType = this.messageTypeOf(text);

    const candidates = configurations
      .filter((configuration) => configuration.address.standard === HL7V2_STANDARD)
      .map((configuration) => {
        const { score, reasons } = this.match(signature.value, messageType, configuration);
        return { configuration, score, reasons };
      })
      .filter((candidate) => candidate.score > this.minimumScore)
      .sort((a, b) => b.score - a.score || b.configuration.sampleCount - a.configuration.sampleCount);

    logger.debug(
      `Ranked ${candidates.length} of ${configurations.length} configurations for ${signature.value.sendingApplication}`
    );
    return candidates;
  }

  /**
   * Signature, message type and field usage of one message, or undefined
   * when it cannot be fingerprinted.
   */
  profileMessage(text: string): MessageProfile | undefined {
    const signature = this.extractSignature(text);
    const header = this.readHeader(text);
    if (!signature.success || !header) return undefined;

    const segmentCounts: Record<string, number> = {};
    const fieldCounts: Record<string, Record<string, number>> = {};
    const separator = header.encoding.fieldSeparator;

    for (const line of splitSegments(text)) {
      const code = line.substring(0, 3);
      if (!isValidSegmentCode(code)) continue;
      segmentCounts[code] = (segmentCounts[code] ?? 0) + 1;

      const counts = (fieldCounts[code] ??= {});
      // the header's first part after the code is MSH-2, not field 1
      const offset = code === HEADER_SEGMENT_CODE ? 1 : 0;
      const parts = line.split(separator);
      for (let i = 1; i < parts.length; i++) {
        if ((parts[i] ?? '').trim() === '') continue;
        const key = String(i + offset);
        counts[key] = (counts[key] ?? 0) + 1;
      }
    }

    return { signature: signature.value, messageType: this.messageTypeOf(text), segmentCounts, fieldCounts };
  }

  /**
   * Build a configuration from sample messages. Samples that cannot be
   * fingerprinted are skipped; the largest vendor group is representative.
   */
  learnFromSamples(
    messages: Iterable<string>,
    options: LearnOptions = {}
  ): Result<VendorConfiguration, NoValidMessagesError> {
    const inputs = [...messages];
    const profiles: MessageProfile[] = [];
    for (const text of inputs) {
      const profile = this.profileMessage(text);
      if (profile) profiles.push(profile);
    }

    const [first] = profiles;
    if (!first) {
      return fail({
        kind: 'NoValidMessages',
        message: `None of ${inputs.length} messages has a usable ${HL7V2_STANDARD} header`,
        inputCount: inputs.length,
      });
    }

    const configuration = this.aggregate(first, profiles, options);
    logger.info(
      `Learned ${configuration.address.vendor} from ${profiles.length} of ${inputs.length} messages ` +
        `(confidence ${configuration.confidence.toFixed(2)})`
    );
    return ok(configuration);
  }

  /**
   * Problems that would make a configuration unusable for ranking.
   */
  validateConfiguration(configuration: VendorConfiguration): string[] {
    const issues: string[] = [];
    if (configuration.address.standard !== HL7V2_STANDARD) {
      issues.push(
        `Configuration standard '${configuration.address.standard}' does not match '${HL7V2_STANDARD}'`
      );
    }
    if (configuration.signature.name.trim() === '') {
      issues.push('Vendor signature must have a name');
    }
    if (Object.keys(configuration.messageTypes).length === 0) {
      issues.push('At least one message type is required');
    }
    if (!(configuration.confidence >= 0 && configuration.confidence <= 1)) {
      issues.push(`Confidence ${configuration.confidence} is outside [0, 1]`);
    }
    return issues;
  }

  private aggregate(
    first: MessageProfile,
    profiles: readonly MessageProfile[],
    options: LearnOptions
  ): VendorConfiguration {
    const groups = new Map<string, MessageProfile[]>();
    for (const profile of profiles) {
      const group = groups.get(profile.signature.name);
      if (group) {
        group.push(profile);
      } else {
        groups.set(profile.signature.name, [profile]);
      }
    }

    let largest: MessageProfile[] = [];
    for (const group of groups.values()) {
      if (group.length > largest.length) largest = group;
    }
    const signature = (largest[0] ?? first).signature;

    const consistency = largest.length / profiles.length;
    const fullAt = options.fullConfidenceSampleCount ?? this.fullConfidenceSampleCount;
    const sampleFactor = Math.min(1, profiles.length / fullAt);
    const confidence = Math.min(MAX_LEARNED_CONFIDENCE, 0.5 + 0.45 * consistency * sampleFactor);

    const messageTypes: Record<string, number> = {};
    for (const profile of profiles) {
      if (profile.messageType) {
        messageTypes[profile.messageType] = (messageTypes[profile.messageType] ?? 0) + 1;
      }
    }
    let commonType = UNKNOWN;
    let commonCount = 0;
    for (const [type, count] of Object.entries(messageTypes)) {
      if (count > commonCount) {
        commonType = type;
        commonCount = count;
      }
    }

    return {
      address: {
        vendor: options.vendorName ?? signature.name,
        standard: HL7V2_STANDARD,
        messageType: commonType,
      },
      signature,
      fieldOccupancy: this.occupancy(profiles),
      messageTypes,
      confidence,
      sampleCount: profiles.length,
    };
  }

  private occupancy(profiles: readonly MessageProfile[]): FieldOccupancy {
    const segmentTotals: Record<string, number> = {};
    const fieldTotals: Record<string, Record<string, number>> = {};
    for (const profile of profiles) {
      for (const [code, count] of Object.entries(profile.segmentCounts)) {
        segmentTotals[code] = (segmentTotals[code] ?? 0) + count;
      }
      for (const [code, fields] of Object.entries(profile.fieldCounts)) {
        const totals = (fieldTotals[code] ??= {});
        for (const [position, count] of Object.entries(fields)) {
          totals[position] = (totals[position] ?? 0) + count;
        }
      }
    }

    const occupancy: FieldOccupancy = {};
    for (const [code, fields] of Object.entries(fieldTotals)) {
      const occurrences = segmentTotals[code] ?? 0;
      if (occurrences === 0) continue;
      const frequencies: Record<string, number> = {};
      for (const [position, count] of Object.entries(fields)) {
        frequencies[position] = count / occurrences;
      }
      occupancy[code] = frequencies;
    }
    return occupancy;
  }

  private match(
    signature: VendorSignature,
    messageType: string | undefined,
    configuration: VendorConfiguration
  ): { score: number; reasons: string[] } {
    const expected = configuration.signature;
    const reasons: string[] = [];
    let points = 0;

    if (equalsIgnoreCase(signature.name, expected.name)) {
      points += SCORE_WEIGHTS.name;
      reasons.push(`Vendor name match: ${signature.name}`);
    }
    if (equalsIgnoreCase(signature.sendingApplication, expected.sendingApplication)) {
      points += SCORE_WEIGHTS.application;
      reasons.push(`Application match: ${signature.sendingApplication}`);
    }
    const facility = signature.sendingFacility.toUpperCase();
    const expectedFacility = expected.sendingFacility.toUpperCase();
    if (facility !== '' && expectedFacility !== '' && (facility.includes(expectedFacility) || expectedFacility.includes(facility))) {
      points += SCORE_WEIGHTS.facility;
      reasons.push(`Facility match: ${signature.sendingFacility}`);
    }
    if (messageType && Object.prototype.hasOwnProperty.call(configuration.messageTypes, messageType)) {
      points += SCORE_WEIGHTS.messageType;
      reasons.push(`Message type seen: ${messageType}`);
    }

    const score = Math.min(1, points / 100);
    reasons.push(confidenceBand(score));
    return { score, reasons };
  }

  private readHeader(text: string): HeaderFields | undefined {
    if (!this.canFingerprint(text)) return undefined;
    const line = firstLine(text);
    if (!line) return undefined;
    const encoding = extractEncodingCharacters(line) ?? this.encoding;
    return { encoding, parts: line.split(encoding.fieldSeparator) };
  }

  /** First component of MSH-n, trimmed; undefined when empty */
  private headerValue(header: HeaderFields, position: number): string | undefined {
    const raw = header.parts[position - 1];
    if (raw === undefined) return undefined;
    const value = getLeaf(decodeField(raw, header.encoding)).trim();
    return value === '' ? undefined : value;
  }

  private messageTypeOf(text: string): string | undefined {
    const header = this.readHeader(text);
    const raw = header?.parts[8];
    if (!header || raw === undefined) return undefined;
    const value = decodeField(raw, header.encoding);
    const code = getLeaf(value, 1).trim();
    const event = getLeaf(value, 2).trim();
    if (code === '') return undefined;
    return event === '' ? code : `${code}^${event}`;
  }
}

/**
 * Engine whose rules come from HL7_ENGINE_VENDOR_RULES_FILE when set and
 * no rules are passed.
 */
export async function createFingerprintEngine(options: FingerprintOptions = {}): Promise<VendorFingerprintEngine> {
  if (options.rules) return new VendorFingerprintEngine(options);
  const rulesFile = getEngineConfig().vendorRulesFile;
  if (!rulesFile) return new VendorFingerprintEngine(options);
  const rules = await loadVendorNameRules(rulesFile);
  logger.debug(`Loaded ${rules.length} vendor name rules from ${rulesFile}`);
  return new VendorFingerprintEngine({ ...options, rules });
}
