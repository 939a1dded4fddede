/**
 * JSON Definition Store
 *
 * Reads definition records from a directory tree:
 *
 *   <root>/segments/pid.json
 *   <root>/tables/0001.json
 *   <root>/trigger_events/adt_a01.json
 *   <root>/data_types/xpn.json
 *
 * Each key is loaded at most once. The cache holds the pending promise, so
 * concurrent first lookups of the same key share one read. A failed read is
 * evicted so a later lookup can retry.
 */

import { readFile, readdir } from 'fs/promises';
import * as path from 'path';
import type { z } from 'zod';
import { getEngineConfig } from '../config/EngineConfig.js';
import { DefinitionLoadError } from '../errors/EngineErrors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { DefinitionStore } from './DefinitionStore.js';
import {
  DataTypeRecordSchema,
  SegmentRecordSchema,
  TableRecordSchema,
  TriggerEventRecordSchema,
} from './DefinitionRecordSchemas.js';
import { normalizeTableId, normalizeTriggerEventCode } from './DefinitionUtils.js';
import type {
  DataTypeDefinition,
  SegmentSchema,
  TableDefinition,
  TriggerEvent,
  TriggerEventSummary,
} from './types.js';

registerComponent('definitions', 'Definition store lookups');
const logger = getLogger('definitions');

const SAFE_KEY = /^[A-Za-z0-9_]+$/;

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

export class JsonDefinitionStore implements DefinitionStore {
  private readonly segments = new Map<string, Promise<SegmentSchema | undefined>>();
  private readonly tables = new Map<string, Promise<TableDefinition | undefined>>();
  private readonly triggerEvents = new Map<string, Promise<TriggerEvent | undefined>>();
  private readonly dataTypes = new Map<string, Promise<DataTypeDefinition | undefined>>();
  private readCount = 0;

  constructor(private readonly rootDir: string) {}

  /** Number of files read so far */
  getReadCount(): number {
    return this.readCount;
  }

  getSegment(code: string): Promise<SegmentSchema | undefined> {
    const key = code.trim().toUpperCase();
    return this.lookup(this.segments, key, 'segments', SegmentRecordSchema);
  }

  getTable(id: string): Promise<TableDefinition | undefined> {
    const key = normalizeTableId(id) ?? '';
    return this.lookup(this.tables, key, 'tables', TableRecordSchema, (table) =>
      table.id === '' ? { ...table, id: key } : table
    );
  }

  getTriggerEvent(code: string): Promise<TriggerEvent | undefined> {
    const key = normalizeTriggerEventCode(code);
    return this.lookup(this.triggerEvents, key, 'trigger_events', TriggerEventRecordSchema);
  }

  getDataType(code: string): Promise<DataTypeDefinition | undefined> {
    const key = code.trim().toUpperCase();
    return this.lookup(this.dataTypes, key, 'data_types', DataTypeRecordSchema);
  }

  async listTriggerEvents(): Promise<TriggerEventSummary[]> {
    let entries: string[];
    try {
      entries = await readdir(path.join(this.rootDir, 'trigger_events'));
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const summaries: TriggerEventSummary[] = [];
    for (const entry of entries.filter((e) => e.endsWith('.json')).sort()) {
      const event = await this.getTriggerEvent(entry.slice(0, -'.json'.length));
      if (event) {
        summaries.push({ code: event.code, name: event.name });
      }
    }
    return summaries;
  }

  private lookup<T>(
    cache: Map<string, Promise<T | undefined>>,
    key: string,
    directory: string,
    schema: Schema<T>,
    finish: (value: T) => T = (value) => value
  ): Promise<T | undefined> {
    if (!SAFE_KEY.test(key)) {
      return Promise.resolve(undefined);
    }

    const cached = cache.get(key);
    if (cached) return cached;

    const filePath = path.join(this.rootDir, directory, `${key.toLowerCase()}.json`);
    const pending = this.readRecord(filePath, schema)
      .then((value) => (value === undefined ? undefined : finish(value)))
      .catch((error: unknown) => {
        cache.delete(key);
        throw error;
      });
    cache.set(key, pending);
    return pending;
  }

  private async readRecord<T>(filePath: string, schema: Schema<T>): Promise<T | undefined> {
    let text: string;
    try {
      text = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.debug(`No definition file ${filePath}`);
        return undefined;
      }
      throw new DefinitionLoadError(`Unable to read definition file ${filePath}`, filePath, { cause: error });
    }
    this.readCount++;

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new DefinitionLoadError(`Definition file ${filePath} is not valid JSON`, filePath, { cause: error });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new DefinitionLoadError(`Definition file ${filePath} is invalid: ${detail}`, filePath);
    }
    logger.trace(`Loaded ${filePath}`);
    return parsed.data;
  }
}

/**
 * Store rooted at `rootDir`, or at HL7_ENGINE_DEFINITIONS_DIR when no
 * directory is passed.
 */
export function createDefinitionStore(rootDir?: string): JsonDefinitionStore {
  const dir = rootDir ?? getEngineConfig().definitionsDir;
  if (!dir) {
    throw new Error('No definitions directory: pass one or set HL7_ENGINE_DEFINITIONS_DIR');
  }
  logger.debug(`Reading definitions from ${dir}`);
  return new JsonDefinitionStore(dir);
}
