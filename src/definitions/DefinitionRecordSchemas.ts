/**
 * Zod schemas for definition records as stored on disk (snake_case),
 * each transforming into the engine's definition types.
 */

import { z } from 'zod';
import {
  normalizeTableId,
  normalizeTriggerEventCode,
  parseLength,
  parseOptionality,
  parseRepeatability,
} from './DefinitionUtils.js';
import type {
  DataTypeDefinition,
  SegmentSchema,
  TableDefinition,
  TableType,
  TriggerEvent,
} from './types.js';

const NumberLike = z.union([z.number(), z.string()]);
const OptionalText = z.string().nullish().transform((v) => v ?? '');

// ============================================================================
// Segments
// ============================================================================

const SegmentFieldRecord = z
  .object({
    position: z.coerce.number().int().positive(),
    field_name: z.string().nullish(),
    name: z.string().nullish(),
    field_description: z.string().nullish(),
    description: z.string().nullish(),
    data_type: z.string().nullish(),
    optionality: z.string().nullish(),
    repeatability: NumberLike.nullish(),
    length: NumberLike.nullish(),
    table: NumberLike.nullish(),
  })
  .transform((r) => ({
    position: r.position,
    name: r.field_name ?? r.name ?? `Field ${r.position}`,
    dataType: (r.data_type ?? 'ST').toUpperCase(),
    optionality: parseOptionality(r.optionality),
    repeatability: parseRepeatability(r.repeatability),
    length: parseLength(r.length),
    table: normalizeTableId(r.table),
    description: r.field_description ?? r.description ?? undefined,
  }));

export const SegmentRecordSchema: z.ZodType<SegmentSchema, z.ZodTypeDef, unknown> = z
  .object({
    code: z.string().regex(/^[A-Za-z][A-Za-z0-9]{2}$/),
    name: z.string(),
    description: OptionalText,
    fields: z.array(SegmentFieldRecord),
  })
  .transform((r) => ({
    code: r.code.toUpperCase(),
    name: r.name,
    description: r.description,
    fields: [...r.fields].sort((a, b) => a.position - b.position),
  }));

// ============================================================================
// Tables
// ============================================================================

function parseTableType(type: string | null | undefined): TableType {
  return (type ?? '').trim().toLowerCase().startsWith('user') ? 'User' : 'HL7';
}

export const TableRecordSchema: z.ZodType<TableDefinition, z.ZodTypeDef, unknown> = z
  .object({
    id: NumberLike.nullish(),
    table: NumberLike.nullish(),
    name: z.string(),
    type: z.string().nullish(),
    values: z.array(
      z
        .object({
          value: z.string().nullish(),
          code: z.string().nullish(),
          description: OptionalText,
        })
        .refine((v) => (v.value ?? v.code) != null, { message: 'table value needs a value or code' })
        .transform((v) => ({ code: v.value ?? v.code ?? '', description: v.description }))
    ),
  })
  .transform((r) => ({
    id: normalizeTableId(r.id ?? r.table) ?? '',
    name: r.name,
    type: parseTableType(r.type),
    values: r.values,
  }));

// ============================================================================
// Data types
// ============================================================================

export const DataTypeRecordSchema: z.ZodType<DataTypeDefinition, z.ZodTypeDef, unknown> = z
  .object({
    code: z.string(),
    name: z.string(),
    description: OptionalText,
    category: z.string().nullish(),
    fields: z
      .array(
        z.object({
          position: z.coerce.number().int().positive(),
          name: z.string().nullish(),
          data_type: z.string().nullish(),
          optionality: z.string().nullish(),
          table: NumberLike.nullish(),
          length: NumberLike.nullish(),
        })
      )
      .nullish(),
  })
  .transform((r) => ({
    code: r.code.toUpperCase(),
    name: r.name,
    description: r.description,
    category: r.category ?? undefined,
    components: (r.fields ?? [])
      .map((f) => ({
        position: f.position,
        name: f.name ?? `Component ${f.position}`,
        dataType: (f.data_type ?? 'ST').toUpperCase(),
        optionality: parseOptionality(f.optionality),
        table: normalizeTableId(f.table),
        length: parseLength(f.length),
      }))
      .sort((a, b) => a.position - b.position),
  }));

// ============================================================================
// Trigger events
// ============================================================================

const TriggerEventSegmentRecord = z.object({
  segment_code: z.string(),
  segment_desc: z.string().nullish(),
  optionality: z.string().nullish(),
  repeatability: NumberLike.nullish(),
  is_group: z.boolean().nullish(),
  level: z.coerce.number().int().nonnegative().nullish(),
  order_index: z.coerce.number().int().nullish(),
  group_path: z.array(z.string()).nullish(),
});

export const TriggerEventRecordSchema: z.ZodType<TriggerEvent, z.ZodTypeDef, unknown> = z
  .object({
    code: z.string(),
    name: z.string(),
    version: OptionalText,
    chapter: OptionalText,
    description: OptionalText,
    segments: z.array(TriggerEventSegmentRecord),
  })
  .transform((r) => ({
    code: normalizeTriggerEventCode(r.code),
    name: r.name,
    version: r.version,
    chapter: r.chapter,
    description: r.description,
    segments: r.segments
      .map((s, index) => ({ record: s, order: s.order_index ?? index }))
      .sort((a, b) => a.order - b.order)
      .map(({ record: s }) => ({
        segmentCode: s.is_group ? null : s.segment_code.toUpperCase(),
        name: s.is_group ? s.segment_code : s.segment_code.toUpperCase(),
        description: s.segment_desc ?? undefined,
        optionality: parseOptionality(s.optionality),
        repeatability: parseRepeatability(s.repeatability),
        level: s.level ?? 0,
        groupPath: s.group_path ?? [],
      })),
  }));
