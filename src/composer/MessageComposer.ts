/**
 * Message Composer
 *
 * Builds any message type from its trigger event definition. The trigger
 * event's segment list becomes a structure tree which is interpreted
 * recursively; there is no per-message-type builder.
 *
 * Field values resolve in priority order:
 *   1. values pinned by the caller
 *   2. values derived from clinical input and message context
 *   3. generated values (value source, or a table pick without one)
 *   4. empty, unless the field is required, which aborts composition
 */

import { randomUUID } from 'crypto';
import { addSeconds, format } from 'date-fns';
import type { ClinicalInput } from '../clinical/types.js';
import { getEngineConfig } from '../config/EngineConfig.js';
import { encode } from '../datatypes/hl7v2/HL7v2Encoder.js';
import type { DefinitionStore } from '../definitions/DefinitionStore.js';
import { isRepeatable, maxOccurrences, normalizeTriggerEventCode } from '../definitions/DefinitionUtils.js';
import { StructureNode, buildStructureTree } from '../definitions/StructureTree.js';
import type { Repeatability, SegmentField, TriggerEvent } from '../definitions/types.js';
import { ComposeError, composeFatal, emptySegmentFatal, formatEngineError, notFound } from '../errors/EngineErrors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import { DEFAULT_ENCODING_CHARACTERS, EncodingCharacters } from '../model/EncodingCharacters.js';
import { FieldValue, componentsField, isEmptyFieldValue, textField } from '../model/FieldValue.js';
import { Message } from '../model/Message.js';
import { HEADER_SEGMENT_CODE, Segment } from '../model/Segment.js';
import { Result, fail, ok } from '../util/Result.js';
import { SeededRandom } from '../values/SeededRandom.js';
import type { ValueContext, ValueSource } from '../values/ValueSource.js';
import { ClinicalFieldMapper, HeaderValues, MappingContext } from './ClinicalFieldMapper.js';
import type { ComposeOptions, ComposeTextOptions } from './ComposeOptions.js';
import { fitToLength, truncate } from './FieldFitting.js';
import { PinnedValues } from './PinnedValues.js';

registerComponent('composer', 'Schema-driven message composition');
const logger = getLogger('composer');

/** Seeded compositions are stamped with an instant inside this year */
const SEEDED_EPOCH = new Date(2024, 0, 1, 0, 0, 0);
const SECONDS_PER_YEAR = 365 * 24 * 60 * 60;

export interface MessageComposerOptions {
  /** Generator for fields not pinned or derived; without one, only table codes are generated */
  valueSource?: ValueSource;
}

/**
 * Versions from 2.3.1 carry the message structure in MSH-9.3.
 */
export function includesMessageStructure(version: string): boolean {
  const [major = 0, minor = 0, patch = 0] = version.split('.').map((part) => Number.parseInt(part, 10) || 0);
  if (major !== 2) return major > 2;
  if (minor !== 3) return minor > 3;
  return patch >= 1;
}

export class MessageComposer {
  private readonly mapper = new ClinicalFieldMapper();

  constructor(
    private readonly store: DefinitionStore,
    private readonly composerOptions: MessageComposerOptions = {}
  ) {}

  async compose(
    triggerEventCode: string,
    input: ClinicalInput,
    options: ComposeOptions = {}
  ): Promise<Result<Message, ComposeError>> {
    if (!input?.patient?.name) {
      throw new TypeError('compose requires clinical input with a named patient');
    }

    const code = normalizeTriggerEventCode(triggerEventCode);
    const event = await this.store.getTriggerEvent(code);
    if (!event) {
      logger.warn(`Unknown trigger event ${triggerEventCode}`);
      return fail({
        kind: 'UnknownTriggerEvent',
        message: `No trigger event definition for '${triggerEventCode}'`,
        triggerEventCode: code,
      });
    }

    const tree = buildStructureTree(event);
    if (!tree.success) {
      logger.warn(formatEngineError(tree.error));
      return tree;
    }

    const session = new ComposeSession(this.store, this.mapper, this.composerOptions.valueSource, event, input, options);
    const result = await session.run(tree.value);
    if (result.success) {
      logger.debug(`Composed ${event.code} with ${result.value.getSegmentCount()} segments`);
    } else {
      logger.warn(formatEngineError(result.error));
    }
    return result;
  }

  /**
   * Compose and encode. Empty segments are kept when optional fields are
   * requested, unless the encode options say otherwise.
   */
  async composeToText(
    triggerEventCode: string,
    input: ClinicalInput,
    options: ComposeTextOptions = {}
  ): Promise<Result<string, ComposeError>> {
    const composed = await this.compose(triggerEventCode, input, options);
    if (!composed.success) return composed;
    return ok(
      encode(composed.value, {
        includeEmptySegments: options.includeOptionalFields ?? false,
        ...options.encodeOptions,
      })
    );
  }
}

/** Set ID counters by segment code */
type SetIdScope = Map<string, number>;

/**
 * State for one compose call. Nothing here outlives the call.
 */
class ComposeSession {
  private readonly encoding: EncodingCharacters;
  private readonly message: Message;
  private readonly random: SeededRandom;
  private readonly inclusionRandom: SeededRandom;
  private readonly referenceTime: Date;
  private readonly header: HeaderValues;
  private readonly eventCode: string;
  private readonly pins: PinnedValues;
  private readonly requested: Set<string>;
  /** Message-wide occurrence of each segment code, used for pins and field paths */
  private readonly occurrences = new Map<string, number>();

  constructor(
    private readonly store: DefinitionStore,
    private readonly mapper: ClinicalFieldMapper,
    private readonly valueSource: ValueSource | undefined,
    event: TriggerEvent,
    private readonly input: ClinicalInput,
    private readonly options: ComposeOptions
  ) {
    const config = getEngineConfig();
    this.encoding = options.encoding ?? DEFAULT_ENCODING_CHARACTERS;
    this.message = new Message(this.encoding);
    this.random = new SeededRandom(options.seed ?? randomUUID());
    this.inclusionRandom = this.random.fork('inclusion');
    this.referenceTime =
      options.referenceTime ??
      (options.useCurrentTime || options.seed === undefined
        ? new Date()
        : addSeconds(SEEDED_EPOCH, this.random.fork('clock').nextInt(0, SECONDS_PER_YEAR - 1)));
    this.pins = new PinnedValues(this.encoding, options.pinned);
    this.requested = new Set((options.includeSegments ?? []).map((name) => name.toUpperCase()));

    const [messageCode = '', eventCode = ''] = event.code.split('_');
    this.eventCode = eventCode;
    const version = options.version ?? (event.version || config.version);
    const timestamp = format(this.referenceTime, 'yyyyMMddHHmmss');
    this.header = {
      sendingApplication: options.sendingApplication ?? config.sendingApplication,
      sendingFacility: options.sendingFacility ?? config.sendingFacility,
      receivingApplication: options.receivingApplication ?? config.receivingApplication,
      receivingFacility: options.receivingFacility ?? config.receivingFacility,
      timestamp,
      messageType: includesMessageStructure(version)
        ? [messageCode, eventCode, event.code]
        : [messageCode, eventCode],
      controlId: options.controlId ?? timestamp + this.random.fork('control').digits(4),
      processingId: options.processingId ?? config.processingId,
      version,
    };
  }

  async run(nodes: readonly StructureNode[]): Promise<Result<Message, ComposeError>> {
    const root: SetIdScope = new Map();
    const walked = await this.walk(nodes, [], root, root);
    return walked.success ? ok(this.message) : walked;
  }

  /**
   * Set IDs count within the instance of the group enclosing a repeating
   * unit: OBX under a repeating OBSERVATION group restarts at 1 for every
   * ORDER, while OBR under a repeating ORDER counts across orders.
   * `outer` holds counters for this level's single segments, `local` is
   * fresh for this group instance.
   */
  private async walk(
    nodes: readonly StructureNode[],
    groupPath: string[],
    outer: SetIdScope,
    local: SetIdScope
  ): Promise<Result<void, ComposeError>> {
    for (const node of nodes) {
      const name = node.kind === 'segment' ? node.code : node.name;
      if (!this.shouldInclude(node)) {
        logger.trace(`Skipping optional ${node.kind} ${name}`);
        continue;
      }

      const count = this.repetitionsFor(name, node.repeatability);
      const repeats = isRepeatable(node.repeatability);
      for (let repetition = 0; repetition < count; repetition++) {
        const step =
          node.kind === 'group'
            ? repeats
              ? await this.walk(node.children, [...groupPath, node.name], local, new Map())
              : await this.walk(node.children, [...groupPath, node.name], outer, local)
            : await this.emitSegment(node.code, node.optionality === 'R', groupPath, repeats ? local : outer);
        if (!step.success) return step;
      }
    }
    return ok(undefined);
  }

  private shouldInclude(node: StructureNode): boolean {
    if (node.optionality === 'R') return true;
    if (node.optionality === 'B') return false;

    const name = node.kind === 'segment' ? node.code : node.name;
    if (this.requested.has(name.toUpperCase())) return true;
    if (this.hasInput(node)) return true;

    const probability = this.options.segmentProbabilities?.[name];
    return probability !== undefined && this.inclusionRandom.chance(probability);
  }

  private hasInput(node: StructureNode): boolean {
    if (node.kind === 'segment') {
      return this.mapper.hasInputFor(node.code, this.input);
    }
    return node.children.some((child) => this.hasInput(child) || this.requested.has(this.nameOf(child)));
  }

  private nameOf(node: StructureNode): string {
    return (node.kind === 'segment' ? node.code : node.name).toUpperCase();
  }

  private repetitionsFor(name: string, repeatability: Repeatability): number {
    const requested = this.options.repetitions?.[name] ?? this.options.repetitions?.[name.toUpperCase()] ?? 1;
    if (!Number.isInteger(requested) || requested < 1) {
      throw new RangeError(`Repetitions for ${name} must be a positive integer, got ${requested}`);
    }
    const max = maxOccurrences(repeatability);
    if (requested > max) {
      logger.warn(`Requested ${requested} repetitions of ${name}; the definition allows ${max}`);
      return max;
    }
    return requested;
  }

  private async emitSegment(
    code: string,
    required: boolean,
    groupPath: string[],
    setIds: SetIdScope
  ): Promise<Result<void, ComposeError>> {
    const schema = await this.store.getSegment(code);
    if (!schema) {
      return fail(notFound('segment', code));
    }

    const occurrence = (this.occurrences.get(code) ?? 0) + 1;
    const segmentPath = occurrence > 1 ? `${code}[${occurrence}]` : code;
    const segment = new Segment(code);
    const ctx: MappingContext = {
      input: this.input,
      header: this.header,
      encoding: this.encoding,
      eventCode: this.eventCode,
      occurrence,
      setId: (setIds.get(code) ?? 0) + 1,
    };

    for (const field of schema.fields) {
      const fieldPath = `${segmentPath}-${field.position}`;
      const value = await this.resolveField(code, field, fieldPath, ctx);
      if (value) {
        segment.setField(field.position, value);
      }
      this.pins.applyComponents(segment, occurrence, field.position);

      if (field.optionality === 'R' && !segment.hasField(field.position)) {
        return fail(composeFatal(fieldPath, groupPath, 'no pinned, derived or generated value is available'));
      }
    }

    if (segment.isEmpty()) {
      if (!required) {
        logger.trace(`Dropping empty optional segment ${code}`);
        return ok(undefined);
      }
      // A required segment the encoder would otherwise drop
      for (const field of schema.fields) {
        if (field.optionality === 'B' || segment.hasField(field.position)) continue;
        const value = await this.generate(code, field, `${segmentPath}-${field.position}`);
        if (value) {
          segment.setField(field.position, value);
        }
      }
      if (segment.isEmpty()) {
        return fail(emptySegmentFatal(segmentPath, groupPath));
      }
    }

    this.occurrences.set(code, occurrence);
    setIds.set(code, ctx.setId);
    this.message.addSegment(segment);
    logger.trace(`Emitted ${code}[${occurrence}] with ${segment.getFieldCount()} fields`);
    return ok(undefined);
  }

  private async resolveField(
    segmentCode: string,
    field: SegmentField,
    fieldPath: string,
    ctx: MappingContext
  ): Promise<FieldValue | undefined> {
    // MSH-1 and MSH-2 always mirror the encoding characters
    if (segmentCode === HEADER_SEGMENT_CODE && field.position <= 2) {
      return this.mapper.map(segmentCode, field.position, ctx);
    }

    const pinned = this.pins.fieldValue(segmentCode, ctx.occurrence, field.position);
    if (pinned) return pinned;

    const derived = this.mapper.map(segmentCode, field.position, ctx);
    if (derived) return derived;

    if (field.optionality === 'B') return undefined;
    if (field.optionality !== 'R' && !this.options.includeOptionalFields) return undefined;

    return this.generate(segmentCode, field, fieldPath);
  }

  private async generate(segmentCode: string, field: SegmentField, fieldPath: string): Promise<FieldValue | undefined> {
    const table = field.table ? await this.store.getTable(field.table) : undefined;

    if (!this.valueSource) {
      return table && table.values.length > 0 ? textField(this.random.pick(table.values).code) : undefined;
    }

    const base: ValueContext = {
      segmentCode,
      fieldPosition: field.position,
      fieldPath,
      fieldName: field.name,
      table,
      maxLength: field.length,
      random: this.random,
      referenceTime: this.referenceTime,
    };

    const dataType = await this.store.getDataType(field.dataType);
    let value: FieldValue;
    if (dataType && dataType.components.length > 0) {
      const components: string[] = [];
      for (const component of dataType.components) {
        const wanted =
          component.optionality !== 'B' &&
          (component.position === 1 || component.optionality === 'R' || this.options.includeOptionalFields === true);
        if (!wanted) continue;

        const componentTable = component.table
          ? await this.store.getTable(component.table)
          : component.position === 1
            ? table
            : undefined;
        const text = await this.valueSource.getValueFor(component.dataType, component.table ?? field.table, {
          ...base,
          componentPosition: component.position,
          componentName: component.name,
          table: componentTable,
          maxLength: component.length,
        });
        components[component.position - 1] = truncate(text, component.length);
      }
      value = componentsField(Array.from(components, (c) => c ?? ''));
    } else {
      value = textField(await this.valueSource.getValueFor(field.dataType, field.table, base));
    }

    const fitted = fitToLength(value, field.length, this.encoding);
    return isEmptyFieldValue(fitted) ? undefined : fitted;
  }
}
