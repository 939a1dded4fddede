/**
 * Vendor name rules
 *
 * A prioritized list of patterns that turn sending application and facility
 * strings into a vendor display name. The first rule that matches either
 * string wins. Rules are data so new vendors need no code change.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { VendorDataError } from '../errors/EngineErrors.js';
import { UNKNOWN } from './types.js';

export type RuleMatchType = 'contains' | 'exact' | 'startsWith' | 'regex';

export interface VendorNameRule {
  pattern: string;
  name: string;
  matchType: RuleMatchType;
}

export const DEFAULT_VENDOR_NAME_RULES: readonly VendorNameRule[] = Object.freeze([
  { pattern: 'EPIC', name: 'Epic', matchType: 'contains' },
  { pattern: 'CERNER', name: 'Cerner', matchType: 'contains' },
  { pattern: 'MILLENNIUM', name: 'Cerner', matchType: 'contains' },
  { pattern: 'ALLSCRIPTS', name: 'AllScripts', matchType: 'contains' },
  { pattern: 'SUNRISE', name: 'AllScripts', matchType: 'contains' },
  { pattern: 'MEDITECH', name: 'Meditech', matchType: 'contains' },
  { pattern: 'ATHENA', name: 'Athena', matchType: 'contains' },
]);

function isValidRegex(pattern: string): boolean {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
}

export const VendorNameRuleSchema = z
  .object({
    pattern: z.string().min(1),
    name: z.string().min(1),
    matchType: z.enum(['contains', 'exact', 'startsWith', 'regex']).default('contains'),
  })
  .refine((rule) => rule.matchType !== 'regex' || isValidRegex(rule.pattern), {
    message: 'pattern is not a valid regular expression',
    path: ['pattern'],
  });

const VendorNameRuleListSchema = z.array(VendorNameRuleSchema);

export function ruleMatches(rule: VendorNameRule, value: string): boolean {
  const subject = value.toUpperCase();
  const pattern = rule.pattern.toUpperCase();
  switch (rule.matchType) {
    case 'contains':
      return subject.includes(pattern);
    case 'exact':
      return subject === pattern;
    case 'startsWith':
      return subject.startsWith(pattern);
    case 'regex':
      return new RegExp(rule.pattern, 'i').test(value);
  }
}

/**
 * Falls back to the application string, then to "Unknown".
 */
export function inferVendorName(
  rules: readonly VendorNameRule[],
  application: string,
  facility: string
): string {
  const values = [application, facility].filter((v) => v !== '' && v !== UNKNOWN);
  for (const rule of rules) {
    if (values.some((value) => ruleMatches(rule, value))) {
      return rule.name;
    }
  }
  return application.trim() !== '' ? application : UNKNOWN;
}

export function parseVendorNameRules(json: unknown): VendorNameRule[] {
  return VendorNameRuleListSchema.parse(json);
}

export async function loadVendorNameRules(filePath: string): Promise<VendorNameRule[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new VendorDataError(`Cannot read vendor name rules from ${filePath}`, filePath, { cause: error });
  }
  try {
    return parseVendorNameRules(JSON.parse(raw));
  } catch (error) {
    throw new VendorDataError(`Invalid vendor name rules in ${filePath}`, filePath, { cause: error });
  }
}
