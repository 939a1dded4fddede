import { describe, it, expect } from '@jest/globals';
import {
  isClosedTable,
  isRepeatable,
  maxFieldPosition,
  maxOccurrences,
  normalizeTableId,
  normalizeTriggerEventCode,
  parseLength,
  parseOptionality,
  parseRepeatability,
  tableHasCode,
} from '../../../src/definitions/DefinitionUtils.js';
import type { TableDefinition } from '../../../src/definitions/types.js';
import { field, segment } from '../../helpers/DefinitionBuilders.js';

const SEX_TABLE: TableDefinition = {
  id: '0001',
  name: 'Sex',
  type: 'HL7',
  values: [
    { code: 'F', description: 'Female' },
    { code: 'M', description: 'Male' },
  ],
};

describe('DefinitionUtils', () => {
  describe('parseRepeatability', () => {
    it.each([null, undefined, '', '-', '1', 'n', '0', 'abc'])('reads %p as single', (tag) => {
      expect(parseRepeatability(tag)).toEqual({ kind: 'single' });
    });

    it.each(['*', '∞', 'Y', 'y'])('reads %p as unbounded', (tag) => {
      expect(parseRepeatability(tag)).toEqual({ kind: 'unbounded' });
    });

    it('reads counts above one as bounded', () => {
      expect(parseRepeatability('3')).toEqual({ kind: 'bounded', max: 3 });
      expect(parseRepeatability(5)).toEqual({ kind: 'bounded', max: 5 });
    });
  });

  it('derives occurrence limits', () => {
    expect(maxOccurrences({ kind: 'single' })).toBe(1);
    expect(maxOccurrences({ kind: 'bounded', max: 4 })).toBe(4);
    expect(maxOccurrences({ kind: 'unbounded' })).toBe(Number.POSITIVE_INFINITY);
    expect(isRepeatable({ kind: 'single' })).toBe(false);
    expect(isRepeatable({ kind: 'bounded', max: 2 })).toBe(true);
  });

  it('parses optionality tags', () => {
    expect(parseOptionality('r')).toBe('R');
    expect(parseOptionality('C')).toBe('C');
    expect(parseOptionality('X')).toBe('B');
    expect(parseOptionality('W')).toBe('B');
    expect(parseOptionality(undefined)).toBe('O');
    expect(parseOptionality('?')).toBe('O');
  });

  it('normalizes table references', () => {
    expect(normalizeTableId(1)).toBe('0001');
    expect(normalizeTableId('HL70001')).toBe('0001');
    expect(normalizeTableId('hl70396')).toBe('0396');
    expect(normalizeTableId('  ')).toBeUndefined();
    expect(normalizeTableId(null)).toBeUndefined();
    expect(normalizeTableId('LOCAL')).toBe('LOCAL');
  });

  it('normalizes trigger event codes', () => {
    expect(normalizeTriggerEventCode(' adt^a01 ')).toBe('ADT_A01');
    expect(normalizeTriggerEventCode('ORU_R01')).toBe('ORU_R01');
  });

  it('parses lengths, treating zero and blanks as no limit', () => {
    expect(parseLength('250')).toBe(250);
    expect(parseLength(48)).toBe(48);
    expect(parseLength(0)).toBeUndefined();
    expect(parseLength('')).toBeUndefined();
    expect(parseLength(null)).toBeUndefined();
  });

  it('finds the highest declared field position', () => {
    const pid = segment('PID', [field(1, 'Set ID', 'SI'), field(5, 'Name', 'XPN'), field(3, 'Identifier', 'CX')]);
    expect(maxFieldPosition(pid)).toBe(5);
    expect(maxFieldPosition(segment('ZZZ', []))).toBe(0);
  });

  it('answers table questions', () => {
    expect(isClosedTable(SEX_TABLE)).toBe(true);
    expect(isClosedTable({ ...SEX_TABLE, type: 'User' })).toBe(false);
    expect(tableHasCode(SEX_TABLE, 'F')).toBe(true);
    expect(tableHasCode(SEX_TABLE, 'f')).toBe(false);
  });
});
