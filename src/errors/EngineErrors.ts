/**
 * Engine error values.
 *
 * Expected failures travel as plain data inside a Result; only
 * programmer errors are thrown. DefinitionLoadError is the one thrown
 * class, for definition files that exist but cannot be read as definitions.
 */

export type DefinitionEntity = 'segment' | 'table' | 'triggerEvent' | 'dataType';

export interface NotFoundError {
  kind: 'NotFound';
  entity: DefinitionEntity;
  key: string;
  message: string;
}

export interface MalformedInputError {
  kind: 'MalformedInput';
  message: string;
  /** Zero-based index of the offending segment, -1 when the whole input is unusable */
  segmentIndex: number;
  excerpt: string;
}

export interface UnknownTriggerEventError {
  kind: 'UnknownTriggerEvent';
  message: string;
  triggerEventCode: string;
}

export interface ComposeFatalError {
  kind: 'ComposeFatal';
  message: string;
  /** e.g. "PID-3", "OBX[2]-5" */
  fieldPath: string;
  groupPath: string[];
}

export interface DefinitionError {
  kind: 'DefinitionError';
  message: string;
  /** Trigger event or segment code the definition belongs to */
  code: string;
}

export interface UnidentifiableError {
  kind: 'Unidentifiable';
  message: string;
}

export interface NoValidMessagesError {
  kind: 'NoValidMessages';
  message: string;
  inputCount: number;
}

export type EngineError =
  | NotFoundError
  | MalformedInputError
  | UnknownTriggerEventError
  | ComposeFatalError
  | DefinitionError
  | UnidentifiableError
  | NoValidMessagesError;

export type ComposeError = UnknownTriggerEventError | NotFoundError | DefinitionError | ComposeFatalError;

const EXCERPT_LENGTH = 40;

export function excerptOf(text: string): string {
  const visible = text.replace(/\r\n|\r|\n/g, '\\r');
  return visible.length > EXCERPT_LENGTH ? `${visible.substring(0, EXCERPT_LENGTH)}...` : visible;
}

export function notFound(entity: DefinitionEntity, key: string): NotFoundError {
  return { kind: 'NotFound', entity, key, message: `No ${entity} definition found for '${key}'` };
}

export function malformedInput(message: string, segmentIndex: number, source: string): MalformedInputError {
  return { kind: 'MalformedInput', message, segmentIndex, excerpt: excerptOf(source) };
}

export function composeFatal(fieldPath: string, groupPath: string[], reason: string): ComposeFatalError {
  return {
    kind: 'ComposeFatal',
    message: `Required field ${fieldPath} could not be resolved: ${reason}`,
    fieldPath,
    groupPath,
  };
}

/** fieldPath names the segment itself, e.g. "PD1" or "NTE[2]" */
export function emptySegmentFatal(segmentPath: string, groupPath: string[]): ComposeFatalError {
  return {
    kind: 'ComposeFatal',
    message: `Required segment ${segmentPath} has no content: none of its fields could be generated`,
    fieldPath: segmentPath,
    groupPath,
  };
}

export function definitionError(code: string, message: string): DefinitionError {
  return { kind: 'DefinitionError', code, message };
}

/**
 * One-line rendering for logs and callers.
 */
export function formatEngineError(error: EngineError): string {
  switch (error.kind) {
    case 'MalformedInput':
      return error.segmentIndex >= 0
        ? `MalformedInput at segment ${error.segmentIndex}: ${error.message} (near "${error.excerpt}")`
        : `MalformedInput: ${error.message}`;
    case 'ComposeFatal':
      return `ComposeFatal [${error.fieldPath}]: ${error.message}`;
    case 'NotFound':
      return `NotFound: ${error.message}`;
    case 'UnknownTriggerEvent':
      return `UnknownTriggerEvent [${error.triggerEventCode}]: ${error.message}`;
    case 'DefinitionError':
      return `DefinitionError [${error.code}]: ${error.message}`;
    case 'Unidentifiable':
      return `Unidentifiable: ${error.message}`;
    case 'NoValidMessages':
      return `NoValidMessages: ${error.message}`;
  }
}

/**
 * A definition file exists but is not valid JSON or does not match the
 * expected record shape.
 */
export class DefinitionLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DefinitionLoadError';
  }
}

/**
 * A vendor configuration or vendor-name rule file could not be read,
 * parsed or written.
 */
export class VendorDataError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'VendorDataError';
  }
}
