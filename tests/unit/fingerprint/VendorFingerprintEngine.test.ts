import { describe, it, expect, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { resetEngineConfig } from '../../../src/config/EngineConfig.js';
import { loadBaselineVendorConfigurations } from '../../../src/fingerprint/VendorConfigurationStore.js';
import {
  SCORE_WEIGHTS,
  VendorFingerprintEngine,
  createFingerprintEngine,
} from '../../../src/fingerprint/VendorFingerprintEngine.js';
import type { VendorConfiguration } from '../../../src/fingerprint/types.js';
import { headerMessage, repeatMessage } from '../../helpers/HeaderMessages.js';

const EPIC_ADMIT = headerMessage('EPIC', 'EPIC_PROD');
const OTHER_RESULT = headerMessage('OTHERAPP', 'OTHERFAC', 'ORU^R01');

function configuration(
  name: string,
  application: string,
  facility: string,
  overrides: Partial<VendorConfiguration> = {}
): VendorConfiguration {
  return {
    address: { vendor: name, standard: 'HL7v2', messageType: 'ADT^A01' },
    signature: { name, sendingApplication: application, sendingFacility: facility, version: '2.3', confidence: 1 },
    fieldOccupancy: {},
    messageTypes: { 'ADT^A01': 1 },
    confidence: 0.9,
    sampleCount: 10,
    ...overrides,
  };
}

const EPIC = configuration('Epic', 'EPIC', 'EPIC_PROD');
const CERNER = configuration('Cerner', 'CERNER', 'MILLENNIUM');

describe('VendorFingerprintEngine', () => {
  const engine = new VendorFingerprintEngine({ minimumScore: 0.1 });

  describe('canFingerprint', () => {
    it('should accept a header with the expected delimiters', () => {
      expect(engine.canFingerprint(EPIC_ADMIT)).toBe(true);
      expect(engine.canFingerprint('\r\n  MSH|^~\\&|APP')).toBe(true);
    });

    it('should reject other text', () => {
      expect(engine.canFingerprint('PID|1||MRN001')).toBe(false);
      expect(engine.canFingerprint('MSH|^~')).toBe(false);
      expect(engine.canFingerprint('MSH#^~\\&#APP')).toBe(false);
      expect(engine.canFingerprint('MSH|~^\\&|APP')).toBe(false);
      expect(engine.canFingerprint('')).toBe(false);
    });
  });

  describe('extractSignature', () => {
    it('should read application, facility and version from the header', () => {
      expect(engine.extractSignature(EPIC_ADMIT)).toEqual({
        success: true,
        value: {
          name: 'Epic',
          sendingApplication: 'EPIC',
          sendingFacility: 'EPIC_PROD',
          version: '2.3',
          confidence: 1,
        },
      });
    });

    it('should use the first component of hierarchic designators', () => {
      const signature = engine.extractSignature(headerMessage('LAB^1.2.3^ISO', 'NORTH^x^y'));
      expect(signature.success && [signature.value.sendingApplication, signature.value.sendingFacility]).toEqual([
        'LAB',
        'NORTH',
      ]);
    });

    it('should mark absent values unknown and lower confidence', () => {
      const signature = engine.extractSignature(headerMessage('', ''));
      expect(signature.success && signature.value).toEqual({
        name: 'Unknown',
        sendingApplication: 'Unknown',
        sendingFacility: 'Unknown',
        version: '2.3',
        confidence: 0.5,
      });
      const withApp = engine.extractSignature(headerMessage('LABSYS', ''));
      expect(withApp.success && [withApp.value.name, withApp.value.confidence]).toEqual(['LABSYS', 0.8]);
    });

    it('should fail for text without a header', () => {
      expect(engine.extractSignature('PID|1')).toEqual({
        success: false,
        error: {
          kind: 'MalformedInput',
          message: 'Text does not begin with an HL7v2 header',
          segmentIndex: 0,
          excerpt: 'PID|1',
        },
      });
    });
  });

  describe('scoreAgainst', () => {
    it('should give a perfect match a score of one', () => {
      expect(engine.scoreAgainst(EPIC_ADMIT, EPIC)).toBe(1);
    });

    it('should add up the weights of matching parts', () => {
      expect(SCORE_WEIGHTS).toEqual({ name: 40, application: 30, facility: 20, messageType: 10 });
      expect(engine.scoreAgainst(EPIC_ADMIT, CERNER)).toBe(0.1);
      expect(engine.scoreAgainst(headerMessage('EPIC', 'ELSEWHERE'), EPIC)).toBe(0.8);
      expect(engine.scoreAgainst(headerMessage('EPIC', 'PROD'), EPIC)).toBe(1);
    });

    it('should stay within [0, 1]', () => {
      for (const text of [EPIC_ADMIT, OTHER_RESULT, headerMessage('', ''), 'not a message']) {
        for (const candidate of [EPIC, CERNER]) {
          const score = engine.scoreAgainst(text, candidate);
          expect(score).toBeGreaterThanOrEqual(0);
          expect(score).toBeLessThanOrEqual(1);
        }
      }
    });

    it('should score zero for unusable text or another standard', () => {
      expect(engine.scoreAgainst('not a message', EPIC)).toBe(0);
      expect(engine.scoreAgainst(EPIC_ADMIT, { ...EPIC, address: { ...EPIC.address, standard: 'FHIR' } })).toBe(0);
    });
  });

  describe('rankCandidates', () => {
    it('should explain a match', () => {
      const [best] = engine.rankCandidates(EPIC_ADMIT, [CERNER, EPIC]);
      expect(best?.configuration).toBe(EPIC);
      expect(best?.reasons).toEqual([
        'Vendor name match: Epic',
        'Application match: EPIC',
        'Facility match: EPIC_PROD',
        'Message type seen: ADT^A01',
        'High confidence match',
      ]);
    });

    it('should drop candidates at or below the minimum score', () => {
      expect(engine.rankCandidates(EPIC_ADMIT, [CERNER, EPIC]).map((c) => c.score)).toEqual([1]);
      const permissive = new VendorFingerprintEngine({ minimumScore: 0 });
      expect(permissive.rankCandidates(EPIC_ADMIT, [CERNER, EPIC]).map((c) => c.score)).toEqual([1, 0.1]);
    });

    it('should break ties on sample count', () => {
      const small = configuration('Epic', 'EPIC', 'EPIC_PROD', { sampleCount: 5 });
      const large = configuration('Epic', 'EPIC', 'EPIC_PROD', { sampleCount: 50 });
      const ranked = engine.rankCandidates(EPIC_ADMIT, [small, large]);
      expect(ranked.map((c) => c.configuration.sampleCount)).toEqual([50, 5]);
    });

    it('should band medium matches', () => {
      const [best] = engine.rankCandidates(headerMessage('EPIC', 'ELSEWHERE'), [EPIC]);
      expect(best?.reasons.at(-1)).toBe('Medium confidence match');
    });

    it('should return nothing for text it cannot read', () => {
      expect(engine.rankCandidates('garbage', [EPIC])).toEqual([]);
    });

    it('should rank against the shipped baseline', async () => {
      const baseline = await loadBaselineVendorConfigurations();
      const ranked = engine.rankCandidates(headerMessage('CERNER', 'MILLENNIUM', 'ADT^A04', '2.5'), baseline);

      expect(ranked.map((c) => [c.configuration.address.vendor, c.score])).toEqual([['Cerner', 1]]);
      expect(baseline.every((c) => engine.validateConfiguration(c).length === 0)).toBe(true);
    });
  });

  describe('profileMessage', () => {
    it('should count segments and populated fields', () => {
      expect(engine.profileMessage(EPIC_ADMIT)).toEqual({
        signature: {
          name: 'Epic',
          sendingApplication: 'EPIC',
          sendingFacility: 'EPIC_PROD',
          version: '2.3',
          confidence: 1,
        },
        messageType: 'ADT^A01',
        segmentCounts: { MSH: 1, PID: 1 },
        fieldCounts: {
          MSH: { '2': 1, '3': 1, '4': 1, '5': 1, '6': 1, '7': 1, '9': 1, '10': 1, '11': 1, '12': 1 },
          PID: { '1': 1, '3': 1, '5': 1 },
        },
      });
    });

    it('should return undefined for text it cannot read', () => {
      expect(engine.profileMessage('PID|1')).toBeUndefined();
    });
  });

  describe('learnFromSamples', () => {
    it('should learn the dominant vendor with confidence from consistency', () => {
      const samples = [...repeatMessage(EPIC_ADMIT, 80), ...repeatMessage(OTHER_RESULT, 20)];
      const result = engine.learnFromSamples(samples);
      if (!result.success) throw new Error(result.error.message);

      const learned = result.value;
      expect(learned.address).toEqual({ vendor: 'Epic', standard: 'HL7v2', messageType: 'ADT^A01' });
      expect(learned.signature.sendingApplication).toBe('EPIC');
      expect(learned.sampleCount).toBe(100);
      expect(learned.messageTypes).toEqual({ 'ADT^A01': 80, 'ORU^R01': 20 });
      expect(learned.confidence).toBeCloseTo(0.86, 10);
    });

    it('should give an even split less confidence', () => {
      const samples = [...repeatMessage(EPIC_ADMIT, 50), ...repeatMessage(OTHER_RESULT, 50)];
      const result = engine.learnFromSamples(samples);

      expect(result.success && result.value.address.vendor).toBe('Epic');
      expect(result.success && result.value.confidence).toBeCloseTo(0.725, 10);
    });

    it('should scale confidence by the number of samples', () => {
      const result = engine.learnFromSamples(repeatMessage(EPIC_ADMIT, 2));
      expect(result.success && result.value.confidence).toBeCloseTo(0.59, 10);

      const early = engine.learnFromSamples(repeatMessage(EPIC_ADMIT, 3), { fullConfidenceSampleCount: 1 });
      expect(early.success && early.value.confidence).toBeCloseTo(0.95, 10);
    });

    it('should compute field occupancy per segment occurrence', () => {
      const result = engine.learnFromSamples([
        EPIC_ADMIT,
        headerMessage('EPIC', 'EPIC_PROD', 'ADT^A01', '2.3', 'PID|1||||Smith'),
      ]);
      expect(result.success && result.value.fieldOccupancy['PID']).toEqual({ '1': 1, '3': 0.5, '5': 1 });
    });

    it('should skip unreadable samples and honour a vendor name', () => {
      const result = engine.learnFromSamples(['garbage', EPIC_ADMIT], { vendorName: 'Epic North' });
      expect(result.success && [result.value.sampleCount, result.value.address.vendor, result.value.signature.name]).toEqual(
        [1, 'Epic North', 'Epic']
      );
    });

    it('should fail when no sample is readable', () => {
      expect(engine.learnFromSamples(['PID|1', ''])).toEqual({
        success: false,
        error: { kind: 'NoValidMessages', message: 'None of 2 messages has a usable HL7v2 header', inputCount: 2 },
      });
    });

    it('should produce configurations that validate and rank', () => {
      const result = engine.learnFromSamples(repeatMessage(EPIC_ADMIT, 10));
      if (!result.success) throw new Error(result.error.message);

      expect(engine.validateConfiguration(result.value)).toEqual([]);
      expect(engine.scoreAgainst(EPIC_ADMIT, result.value)).toBe(1);
    });
  });

  describe('validateConfiguration', () => {
    it('should list every problem', () => {
      const broken: VendorConfiguration = {
        ...EPIC,
        address: { ...EPIC.address, standard: 'FHIR' },
        signature: { ...EPIC.signature, name: ' ' },
        messageTypes: {},
        confidence: 1.5,
      };
      expect(engine.validateConfiguration(broken)).toEqual([
        "Configuration standard 'FHIR' does not match 'HL7v2'",
        'Vendor signature must have a name',
        'At least one message type is required',
        'Confidence 1.5 is outside [0, 1]',
      ]);
    });
  });

  describe('construction', () => {
    let tmpDir: string | undefined;

    afterEach(() => {
      delete process.env['HL7_ENGINE_VENDOR_RULES_FILE'];
      resetEngineConfig();
      if (tmpDir) rmSync(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    });

    it('should reject a non-positive full-confidence sample count', () => {
      expect(() => new VendorFingerprintEngine({ fullConfidenceSampleCount: 0 })).toThrow(
        'fullConfidenceSampleCount must be at least 1, got 0'
      );
    });

    it('should load rules from the configured file', async () => {
      tmpDir = mkdtempSync(join(tmpdir(), 'hl7-rules-'));
      const rulesFile = join(tmpDir, 'rules.json');
      writeFileSync(rulesFile, JSON.stringify([{ pattern: 'LAB', name: 'Lab Vendor' }]));
      process.env['HL7_ENGINE_VENDOR_RULES_FILE'] = rulesFile;
      resetEngineConfig();

      const configured = await createFingerprintEngine({ minimumScore: 0.1 });
      const signature = configured.extractSignature(headerMessage('LABSYS', 'MAIN'));
      expect(signature.success && signature.value.name).toBe('Lab Vendor');
    });

    it('should use the built-in rules without a rules file', async () => {
      const configured = await createFingerprintEngine({ minimumScore: 0.1 });
      const signature = configured.extractSignature(headerMessage('SUNRISE_ACUTE', 'MAIN'));
      expect(signature.success && signature.value.name).toBe('AllScripts');
    });
  });
});
