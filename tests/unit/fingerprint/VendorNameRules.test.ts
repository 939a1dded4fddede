import { describe, it, expect, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { VendorDataError } from '../../../src/errors/EngineErrors.js';
import {
  DEFAULT_VENDOR_NAME_RULES,
  inferVendorName,
  loadVendorNameRules,
  parseVendorNameRules,
  ruleMatches,
} from '../../../src/fingerprint/VendorNameRules.js';

describe('VendorNameRules', () => {
  describe('ruleMatches', () => {
    it('should match each kind case-insensitively', () => {
      expect(ruleMatches({ pattern: 'epic', name: 'Epic', matchType: 'contains' }, 'MY_EPIC_APP')).toBe(true);
      expect(ruleMatches({ pattern: 'lab', name: 'Lab', matchType: 'exact' }, 'LAB')).toBe(true);
      expect(ruleMatches({ pattern: 'lab', name: 'Lab', matchType: 'exact' }, 'LABS')).toBe(false);
      expect(ruleMatches({ pattern: 'rad', name: 'Rad', matchType: 'startsWith' }, 'RADIOLOGY')).toBe(true);
      expect(ruleMatches({ pattern: 'rad', name: 'Rad', matchType: 'startsWith' }, 'TELERAD')).toBe(false);
      expect(ruleMatches({ pattern: '^lis\\d+$', name: 'LIS', matchType: 'regex' }, 'LIS42')).toBe(true);
    });
  });

  describe('inferVendorName', () => {
    it('should match the application or the facility', () => {
      expect(inferVendorName(DEFAULT_VENDOR_NAME_RULES, 'SUNRISE_ACUTE', 'MAIN')).toBe('AllScripts');
      expect(inferVendorName(DEFAULT_VENDOR_NAME_RULES, 'ADT_FEED', 'EPIC_NORTH')).toBe('Epic');
      expect(inferVendorName(DEFAULT_VENDOR_NAME_RULES, 'ORDERS', 'MILLENNIUM')).toBe('Cerner');
    });

    it('should apply rules in priority order', () => {
      expect(inferVendorName(DEFAULT_VENDOR_NAME_RULES, 'CERNER_EPIC_BRIDGE', 'MAIN')).toBe('Epic');
    });

    it('should fall back on the application, then on Unknown', () => {
      expect(inferVendorName(DEFAULT_VENDOR_NAME_RULES, 'LABSYS', 'MAIN')).toBe('LABSYS');
      expect(inferVendorName(DEFAULT_VENDOR_NAME_RULES, 'Unknown', 'Unknown')).toBe('Unknown');
      expect(inferVendorName(DEFAULT_VENDOR_NAME_RULES, '', '')).toBe('Unknown');
    });

    it('should not match placeholders for absent values', () => {
      const rules = [{ pattern: 'UNKNOWN', name: 'Placeholder', matchType: 'contains' as const }];
      expect(inferVendorName(rules, 'Unknown', 'Unknown')).toBe('Unknown');
    });
  });

  describe('parseVendorNameRules', () => {
    it('should default the match type to contains', () => {
      expect(parseVendorNameRules([{ pattern: 'LAB', name: 'Lab Vendor' }])).toEqual([
        { pattern: 'LAB', name: 'Lab Vendor', matchType: 'contains' },
      ]);
    });

    it('should reject invalid regular expressions and blank fields', () => {
      expect(() => parseVendorNameRules([{ pattern: '(', name: 'Broken', matchType: 'regex' }])).toThrow(
        'pattern is not a valid regular expression'
      );
      expect(() => parseVendorNameRules([{ pattern: '', name: 'Blank' }])).toThrow();
      expect(() => parseVendorNameRules([{ pattern: 'X', name: 'X', matchType: 'fuzzy' }])).toThrow();
    });
  });

  describe('loadVendorNameRules', () => {
    let tmpDir: string | undefined;

    afterEach(() => {
      if (tmpDir) rmSync(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    });

    it('should read rules from a JSON file', async () => {
      tmpDir = mkdtempSync(join(tmpdir(), 'hl7-rules-'));
      const file = join(tmpDir, 'rules.json');
      writeFileSync(file, JSON.stringify([{ pattern: 'RAD', name: 'Radiology', matchType: 'startsWith' }]));

      expect(await loadVendorNameRules(file)).toEqual([{ pattern: 'RAD', name: 'Radiology', matchType: 'startsWith' }]);
    });

    it('should wrap read and parse failures', async () => {
      tmpDir = mkdtempSync(join(tmpdir(), 'hl7-rules-'));
      const missing = join(tmpDir, 'missing.json');
      await expect(loadVendorNameRules(missing)).rejects.toThrow(`Cannot read vendor name rules from ${missing}`);

      const broken = join(tmpDir, 'broken.json');
      writeFileSync(broken, '{ not json');
      await expect(loadVendorNameRules(broken)).rejects.toBeInstanceOf(VendorDataError);
    });
  });
});
