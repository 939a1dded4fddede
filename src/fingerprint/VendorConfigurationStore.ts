/**
 * Vendor configuration persistence
 *
 * Configurations are stored as a JSON array. Reading validates every entry;
 * writing produces the same shape, so learned configurations can be saved
 * and later ranked against.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { VendorDataError } from '../errors/EngineErrors.js';
import type { VendorConfiguration } from './types.js';

export const BASELINE_VENDOR_FILE = path.resolve(__dirname, '../../data/vendors/hl7v2-baseline.json');

const UnitInterval = z.number().min(0).max(1);

const VendorSignatureSchema = z.object({
  name: z.string(),
  sendingApplication: z.string(),
  sendingFacility: z.string(),
  version: z.string(),
  confidence: UnitInterval,
});

export const VendorConfigurationSchema = z.object({
  address: z.object({
    vendor: z.string(),
    standard: z.string(),
    messageType: z.string(),
  }),
  signature: VendorSignatureSchema,
  fieldOccupancy: z.record(z.string(), z.record(z.string().regex(/^\d+$/), UnitInterval)).default({}),
  messageTypes: z.record(z.string(), z.number().int().nonnegative()).default({}),
  confidence: UnitInterval,
  sampleCount: z.number().int().nonnegative(),
});

const VendorConfigurationListSchema = z.array(VendorConfigurationSchema);

export function parseVendorConfigurations(json: unknown): VendorConfiguration[] {
  return VendorConfigurationListSchema.parse(json);
}

export async function loadVendorConfigurations(filePath: string): Promise<VendorConfiguration[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new VendorDataError(`Cannot read vendor configurations from ${filePath}`, filePath, { cause: error });
  }
  try {
    return parseVendorConfigurations(JSON.parse(raw));
  } catch (error) {
    throw new VendorDataError(`Invalid vendor configurations in ${filePath}`, filePath, { cause: error });
  }
}

export async function saveVendorConfigurations(
  filePath: string,
  configurations: readonly VendorConfiguration[]
): Promise<void> {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, `${JSON.stringify(configurations, null, 2)}\n`, 'utf-8');
  } catch (error) {
    throw new VendorDataError(`Cannot write vendor configurations to ${filePath}`, filePath, { cause: error });
  }
}

/**
 * Epic, Cerner and AllScripts reference configurations.
 */
export function loadBaselineVendorConfigurations(): Promise<VendorConfiguration[]> {
  return loadVendorConfigurations(BASELINE_VENDOR_FILE);
}
