import { describe, it, expect } from '@jest/globals';
import { MessageComposer } from '../../../src/composer/MessageComposer.js';
import type { ComposeOptions } from '../../../src/composer/ComposeOptions.js';
import type { ClinicalInput } from '../../../src/clinical/types.js';
import { decode } from '../../../src/datatypes/hl7v2/HL7v2Decoder.js';
import { encode } from '../../../src/datatypes/hl7v2/HL7v2Encoder.js';
import type { DefinitionStore } from '../../../src/definitions/DefinitionStore.js';
import { MessageValidator } from '../../../src/validation/MessageValidator.js';
import { Severity, ValidationMode } from '../../../src/validation/ValidationTypes.js';
import { DefaultValueSource } from '../../../src/values/DefaultValueSource.js';
import { admitStore, orderResultStore } from '../../helpers/DefinitionBuilders.js';

const SEEDS = [1, 7, 42, 2024];

const SMITH: ClinicalInput = { patient: { name: { family: 'Smith', given: 'John' } } };

const LAB_RESULT: ClinicalInput = {
  patient: { id: 'MRN001', idAuthority: 'HOSP', name: { family: "O'Brien", given: 'Ann' }, sex: 'F' },
  order: { placerOrderNumber: 'ORD-1', service: { code: 'CBC', text: 'Blood count', codingSystem: 'L' } },
  observation: {
    identifier: { code: 'GLU', text: 'Glucose' },
    value: '95 mg/dL | fasting',
    resultStatus: 'P',
    observedAt: '2024-01-15T08:00:00',
  },
};

/**
 * Compose, encode and decode; the decoded message must equal the composed
 * one and validate without errors in strict mode.
 */
async function expectRoundTrip(
  store: DefinitionStore,
  triggerEvent: string,
  input: ClinicalInput,
  options: ComposeOptions
): Promise<void> {
  const composer = new MessageComposer(store, { valueSource: new DefaultValueSource() });
  const composed = await composer.compose(triggerEvent, input, options);
  if (!composed.success) throw new Error(composed.error.message);

  const decoded = decode(encode(composed.value));
  if (!decoded.success) throw new Error(decoded.error.message);
  expect(decoded.value.equals(composed.value)).toBe(true);

  const validated = await new MessageValidator(store).validate(decoded.value, ValidationMode.Strict);
  if (!validated.success) throw new Error(validated.error.message);
  expect(validated.value.issues.filter((issue) => issue.severity === Severity.Error)).toEqual([]);
  expect(validated.value.errorCount).toBe(0);
}

describe('compose, encode and decode', () => {
  describe('nested order and observation groups', () => {
    const nested: ComposeOptions = {
      repetitions: { ORDER: 2, OBSERVATION: 3, NTE: 2 },
      includeSegments: ['OBSERVATION', 'NTE'],
    };

    it.each(SEEDS)('should reproduce required content for seed %i', async (seed) => {
      await expectRoundTrip(orderResultStore(), 'ORU^R01', SMITH, { ...nested, seed });
    });

    it.each(SEEDS)('should reproduce optional content and notes for seed %i', async (seed) => {
      await expectRoundTrip(orderResultStore(), 'ORU^R01', SMITH, { ...nested, seed, includeOptionalFields: true });
    });

    it.each(SEEDS)('should reproduce clinical values that need escaping for seed %i', async (seed) => {
      await expectRoundTrip(orderResultStore(), 'ORU^R01', LAB_RESULT, { ...nested, seed });
    });
  });

  describe('admit structure', () => {
    it.each(SEEDS)('should reproduce an admit with observations for seed %i', async (seed) => {
      await expectRoundTrip(admitStore(), 'ADT^A01', SMITH, {
        seed,
        includeOptionalFields: true,
        includeSegments: ['OBSERVATION'],
        repetitions: { OBSERVATION: 2 },
      });
    });
  });

  describe('required segments', () => {
    it('should fill the required patient detail segment from the value source', async () => {
      const composer = new MessageComposer(orderResultStore(), { valueSource: new DefaultValueSource() });
      const composed = await composer.compose('ORU^R01', SMITH, { seed: 7 });
      if (!composed.success) throw new Error(composed.error.message);

      expect(composed.value.getSegment('PD1')?.isEmpty()).toBe(false);
      expect(encode(composed.value).split('\r')[2]).toMatch(/^PD1\|[ABCNY]$/);
    });

    it('should fail on the required patient detail segment without a value source', async () => {
      const patient: ClinicalInput = { patient: { id: 'MRN001', name: { family: 'Smith' } } };
      const composed = await new MessageComposer(orderResultStore()).compose('ORU^R01', patient, { seed: 7 });

      expect(composed).toEqual({
        success: false,
        error: {
          kind: 'ComposeFatal',
          message: 'Required segment PD1 has no content: none of its fields could be generated',
          fieldPath: 'PD1',
          groupPath: [],
        },
      });
    });
  });
});
