/**
 * Message Validator
 *
 * Checks a message against segment and trigger event definitions and
 * reports typed issues whose severity depends on the validation mode.
 * Content problems never fail the call; only a message with no header at
 * all is unidentifiable. The message is only read, never changed.
 */

import { getEngineConfig } from '../config/EngineConfig.js';
import { decode } from '../datatypes/hl7v2/HL7v2Decoder.js';
import { encodeField } from '../datatypes/hl7v2/HL7v2Encoder.js';
import type { DefinitionStore } from '../definitions/DefinitionStore.js';
import { isClosedTable, maxFieldPosition, maxOccurrences, tableHasCode } from '../definitions/DefinitionUtils.js';
import { StructureNode, buildStructureTree, collectSegmentCodes } from '../definitions/StructureTree.js';
import type { SegmentField, SegmentSchema, TableDefinition, TriggerEvent } from '../definitions/types.js';
import { MalformedInputError, UnidentifiableError, formatEngineError } from '../errors/EngineErrors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { EncodingCharacters } from '../model/EncodingCharacters.js';
import type { Message } from '../model/Message.js';
import { HEADER_SEGMENT_CODE, Segment, isZSegment } from '../model/Segment.js';
import { Result, fail, ok } from '../util/Result.js';
import { checkDataFormat } from './DataFormatChecks.js';
import { CheckKind, severityFor } from './SeverityPolicy.js';
import {
  IssueCode,
  Severity,
  ValidationIssue,
  ValidationMode,
  ValidationResult,
} from './ValidationTypes.js';

registerComponent('validator', 'Structural message validation');
const logger = getLogger('validator');

export interface MessageValidatorOptions {
  /** Mode used when validate() is called without one; defaults to configuration */
  defaultMode?: ValidationMode;
}

const CHECK_CODES: Record<CheckKind, IssueCode> = {
  HEADER_NOT_FIRST: 'HEADER_NOT_FIRST',
  UNKNOWN_SEGMENT: 'UNKNOWN_SEGMENT',
  UNKNOWN_Z_SEGMENT: 'UNKNOWN_SEGMENT',
  UNKNOWN_TRIGGER_EVENT: 'UNKNOWN_TRIGGER_EVENT',
  EXTRA_FIELDS: 'EXTRA_FIELDS',
  REQUIRED_FIELD_MISSING: 'REQUIRED_FIELD_MISSING',
  FIELD_TOO_LONG: 'FIELD_TOO_LONG',
  TOO_MANY_REPETITIONS: 'TOO_MANY_REPETITIONS',
  CLOSED_TABLE_VALUE_UNKNOWN: 'TABLE_VALUE_UNKNOWN',
  OPEN_TABLE_VALUE_UNKNOWN: 'TABLE_VALUE_UNKNOWN',
  INVALID_DATA_FORMAT: 'INVALID_DATA_FORMAT',
  REQUIRED_SEGMENT_MISSING: 'REQUIRED_SEGMENT_MISSING',
  UNEXPECTED_SEGMENT: 'UNEXPECTED_SEGMENT',
};

class IssueCollector {
  readonly issues: ValidationIssue[] = [];

  constructor(private readonly mode: ValidationMode) {}

  report(check: CheckKind, message: string, fieldPath: string, segmentIndex: number): void {
    const severity = severityFor(check, this.mode);
    if (severity === undefined) return;
    this.issues.push({ code: CHECK_CODES[check], message, fieldPath, severity, segmentIndex });
  }

  result(): ValidationResult {
    const count = (severity: Severity) => this.issues.filter((i) => i.severity === severity).length;
    const errorCount = count(Severity.Error);
    return {
      mode: this.mode,
      isValid: errorCount === 0,
      issues: this.issues,
      errorCount,
      warningCount: count(Severity.Warning),
      infoCount: count(Severity.Info),
    };
  }
}

/**
 * Definitions looked up during one validate call.
 */
class DefinitionCache {
  private readonly segments = new Map<string, Promise<SegmentSchema | undefined>>();
  private readonly tables = new Map<string, Promise<TableDefinition | undefined>>();

  constructor(private readonly store: DefinitionStore) {}

  segment(code: string): Promise<SegmentSchema | undefined> {
    let pending = this.segments.get(code);
    if (!pending) {
      pending = this.store.getSegment(code);
      this.segments.set(code, pending);
    }
    return pending;
  }

  table(id: string): Promise<TableDefinition | undefined> {
    let pending = this.tables.get(id);
    if (!pending) {
      pending = this.store.getTable(id);
      this.tables.set(id, pending);
    }
    return pending;
  }
}

export class MessageValidator {
  constructor(
    private readonly store: DefinitionStore,
    private readonly options: MessageValidatorOptions = {}
  ) {}

  async validate(message: Message, mode?: ValidationMode): Promise<Result<ValidationResult, UnidentifiableError>> {
    const effectiveMode = mode ?? this.options.defaultMode ?? getEngineConfig().validationMode;
    const segments = message.getSegments();

    if (segments.length === 0) {
      return fail({ kind: 'Unidentifiable', message: 'Message has no segments' });
    }
    const headerIndex = segments.findIndex((s) => s.getCode() === HEADER_SEGMENT_CODE);
    if (headerIndex === -1) {
      return fail({ kind: 'Unidentifiable', message: `Message has no ${HEADER_SEGMENT_CODE} header segment` });
    }

    const collector = new IssueCollector(effectiveMode);
    const definitions = new DefinitionCache(this.store);

    if (headerIndex !== 0) {
      collector.report(
        'HEADER_NOT_FIRST',
        `${HEADER_SEGMENT_CODE} must be the first segment; found ${segments[0]?.getCode() ?? ''} first`,
        HEADER_SEGMENT_CODE,
        0
      );
    }

    const occurrences = new Map<string, number>();
    for (const [index, segment] of segments.entries()) {
      const code = segment.getCode();
      const occurrence = (occurrences.get(code) ?? 0) + 1;
      occurrences.set(code, occurrence);
      await this.validateSegment(segment, index, occurrence, message.getEncodingCharacters(), definitions, collector);
    }

    await this.validateStructure(message, collector);

    const result = collector.result();
    logger.debug(
      `Validated ${message.getControlId() || '(no control id)'} in ${effectiveMode} mode: ` +
        `${result.errorCount} errors, ${result.warningCount} warnings, ${result.infoCount} info`
    );
    return ok(result);
  }

  async validateText(
    text: string,
    mode?: ValidationMode
  ): Promise<Result<ValidationResult, MalformedInputError | UnidentifiableError>> {
    const decoded = decode(text);
    if (!decoded.success) {
      logger.debug(formatEngineError(decoded.error));
      return decoded;
    }
    return this.validate(decoded.value, mode);
  }

  private async validateSegment(
    segment: Segment,
    index: number,
    occurrence: number,
    encoding: EncodingCharacters,
    definitions: DefinitionCache,
    collector: IssueCollector
  ): Promise<void> {
    const code = segment.getCode();
    const schema = await definitions.segment(code);
    if (!schema) {
      collector.report(
        isZSegment(code) ? 'UNKNOWN_Z_SEGMENT' : 'UNKNOWN_SEGMENT',
        `Segment ${code} has no definition`,
        code,
        index
      );
      return;
    }

    const pathOf = (position: number) =>
      occurrence > 1 ? `${code}[${occurrence}]-${position}` : `${code}-${position}`;

    const declared = maxFieldPosition(schema);
    if (segment.getFieldCount() > declared) {
      collector.report(
        'EXTRA_FIELDS',
        `${code} has ${segment.getFieldCount()} fields; the definition declares ${declared}`,
        pathOf(declared + 1),
        index
      );
    }

    for (const field of schema.fields) {
      // MSH-1 and MSH-2 are the encoding characters, not content
      if (segment.isHeader() && field.position <= 2) continue;
      await this.validateField(segment, field, pathOf(field.position), index, encoding, definitions, collector);
    }
  }

  private async validateField(
    segment: Segment,
    field: SegmentField,
    fieldPath: string,
    index: number,
    encoding: EncodingCharacters,
    definitions: DefinitionCache,
    collector: IssueCollector
  ): Promise<void> {
    const value = segment.getField(field.position);
    if (!value) {
      if (field.optionality === 'R') {
        collector.report('REQUIRED_FIELD_MISSING', `Required field ${fieldPath} (${field.name}) is empty`, fieldPath, index);
      }
      return;
    }

    const max = maxOccurrences(field.repeatability);
    if (value.length > max) {
      collector.report(
        'TOO_MANY_REPETITIONS',
        `${fieldPath} has ${value.length} repetitions; the definition allows ${max}`,
        fieldPath,
        index
      );
    }

    const table = field.table ? await definitions.table(field.table) : undefined;

    for (const [repIndex, repetition] of value.entries()) {
      if (field.length !== undefined) {
        const encodedLength = encodeField([repetition], encoding).length;
        if (encodedLength > field.length) {
          collector.report(
            'FIELD_TOO_LONG',
            `${fieldPath} repetition ${repIndex + 1} is ${encodedLength} characters; maximum is ${field.length}`,
            fieldPath,
            index
          );
        }
      }

      const first = repetition[0]?.[0] ?? '';
      if (first === '') continue;

      const expected = checkDataFormat(field.dataType, first);
      if (expected) {
        collector.report(
          'INVALID_DATA_FORMAT',
          `${fieldPath} value '${first}' is not ${expected} (${field.dataType})`,
          fieldPath,
          index
        );
      }

      if (table && table.values.length > 0 && !tableHasCode(table, first)) {
        const closed = isClosedTable(table);
        collector.report(
          closed ? 'CLOSED_TABLE_VALUE_UNKNOWN' : 'OPEN_TABLE_VALUE_UNKNOWN',
          `${fieldPath} value '${first}' is not in ${closed ? 'HL7' : 'user'} table ${table.id}`,
          fieldPath,
          index
        );
      }
    }
  }

  /**
   * Match the segment sequence against the trigger event named in MSH-9.
   * Skipped when the trigger event is not known to the store.
   */
  private async validateStructure(message: Message, collector: IssueCollector): Promise<void> {
    const event = await this.findTriggerEvent(message);
    if (!event) {
      const type = message.getMessageType();
      if (type) {
        collector.report(
          'UNKNOWN_TRIGGER_EVENT',
          `No trigger event definition for ${type.code}^${type.triggerEvent}; segment order not checked`,
          `${HEADER_SEGMENT_CODE}-9`,
          message.getSegments().findIndex((s) => s.isHeader())
        );
      }
      return;
    }

    const tree = buildStructureTree(event);
    if (!tree.success) {
      logger.warn(`Skipping structure check: ${formatEngineError(tree.error)}`);
      return;
    }

    const segments = message.getSegments();
    const matcher = new StructureMatcher(segments, collector);
    const end = matcher.match(tree.value, 0);
    for (let index = end; index < segments.length; index++) {
      const segment = segments[index];
      if (segment && !isZSegment(segment.getCode())) {
        collector.report(
          'UNEXPECTED_SEGMENT',
          `Segment ${segment.getCode()} is not expected at position ${index + 1} of ${event.code}`,
          segment.getCode(),
          index
        );
      }
    }
  }

  private async findTriggerEvent(message: Message): Promise<TriggerEvent | undefined> {
    const type = message.getMessageType();
    if (!type) return undefined;
    const candidates = [type.structure, type.triggerEvent ? `${type.code}_${type.triggerEvent}` : undefined];
    for (const candidate of candidates) {
      if (!candidate) continue;
      const event = await this.store.getTriggerEvent(candidate);
      if (event) return event;
    }
    return undefined;
  }
}

/**
 * Greedy left-to-right match of segments against a structure tree.
 * Z-segments may appear anywhere and are stepped over.
 */
class StructureMatcher {
  constructor(
    private readonly segments: readonly Segment[],
    private readonly collector: IssueCollector
  ) {}

  /**
   * Inside a group a segment takes at most its maximum occurrences, so
   * the rest start the group's next repetition.
   */
  match(nodes: readonly StructureNode[], start: number, inGroup = false): number {
    let position = start;
    for (const node of nodes) {
      position =
        node.kind === 'segment' ? this.matchSegment(node, position, inGroup) : this.matchGroup(node, position);
    }
    return this.skipZ(position);
  }

  private skipZ(position: number): number {
    let index = position;
    while (index < this.segments.length && isZSegment(this.segments[index]?.getCode() ?? '')) {
      index++;
    }
    return index;
  }

  private codeAt(position: number): string | undefined {
    return this.segments[position]?.getCode();
  }

  private matchSegment(node: Extract<StructureNode, { kind: 'segment' }>, start: number, inGroup: boolean): number {
    const { code } = node;
    const max = maxOccurrences(node.repeatability);
    let position = this.skipZ(start);
    let count = 0;
    while (this.codeAt(position) === code && !(inGroup && count >= max)) {
      count++;
      position = this.skipZ(position + 1);
    }

    if (count === 0 && node.optionality === 'R') {
      this.collector.report('REQUIRED_SEGMENT_MISSING', `Required segment ${code} is missing`, code, -1);
    }
    if (count > max) {
      this.collector.report(
        'UNEXPECTED_SEGMENT',
        `Segment ${code} occurs ${count} times; the definition allows ${max}`,
        code,
        position - 1
      );
    }
    return position;
  }

  private matchGroup(node: Extract<StructureNode, { kind: 'group' }>, start: number): number {
    const codes = new Set(collectSegmentCodes(node.children));
    let position = this.skipZ(start);
    const startsGroup = () => codes.has(this.codeAt(position) ?? '');

    if (!startsGroup()) {
      if (node.optionality === 'R') {
        // report the required members that are absent
        return this.match(node.children, position, true);
      }
      return position;
    }

    const max = maxOccurrences(node.repeatability);
    let repetitions = 0;
    while (startsGroup()) {
      const before = position;
      position = this.match(node.children, position, true);
      repetitions++;
      if (position === before) break;
    }
    if (repetitions > max) {
      this.collector.report(
        'UNEXPECTED_SEGMENT',
        `Group ${node.name} occurs ${repetitions} times; the definition allows ${max}`,
        node.name,
        position - 1
      );
    }
    return position;
  }
}
