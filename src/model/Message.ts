/**
 * In-memory HL7 v2 message: an ordered list of segments plus the
 * encoding characters they were read with or will be written with.
 *
 * The first segment of a well-formed message is the MSH header. The model
 * does not enforce that while a message is being assembled; callers check
 * isStructurallyValid() and the validator reports violations.
 */

import { DEFAULT_ENCODING_CHARACTERS, EncodingCharacters } from './EncodingCharacters.js';
import { HEADER_SEGMENT_CODE, Segment } from './Segment.js';

export interface MessageType {
  /** MSH-9.1, e.g. "ADT" */
  code: string;
  /** MSH-9.2, e.g. "A01" */
  triggerEvent: string;
  /** MSH-9.3 when present, e.g. "ADT_A01" */
  structure?: string;
}

export class Message {
  private readonly segments: Segment[] = [];
  private readonly encoding: EncodingCharacters;

  constructor(encoding: EncodingCharacters = DEFAULT_ENCODING_CHARACTERS, segments: Segment[] = []) {
    this.encoding = encoding;
    this.segments.push(...segments);
  }

  getEncodingCharacters(): EncodingCharacters {
    return this.encoding;
  }

  getSegments(): readonly Segment[] {
    return this.segments;
  }

  getSegmentCount(): number {
    return this.segments.length;
  }

  getSegmentAt(index: number): Segment | undefined {
    return this.segments[index];
  }

  addSegment(segment: Segment): Segment {
    this.segments.push(segment);
    return segment;
  }

  /** Create and append a segment */
  add(code: string): Segment {
    return this.addSegment(new Segment(code));
  }

  insertSegment(index: number, segment: Segment): Segment {
    if (index < 0 || index > this.segments.length) {
      throw new RangeError(`Segment index ${index} out of range 0..${this.segments.length}`);
    }
    this.segments.splice(index, 0, segment);
    return segment;
  }

  removeSegment(index: number): Segment {
    const [removed] = this.segments.splice(index, 1);
    if (!removed) {
      throw new RangeError(`No segment at index ${index}`);
    }
    return removed;
  }

  /**
   * The n-th (1-based) segment with the given code.
   */
  getSegment(code: string, occurrence = 1): Segment | undefined {
    let seen = 0;
    for (const segment of this.segments) {
      if (segment.getCode() === code && ++seen === occurrence) {
        return segment;
      }
    }
    return undefined;
  }

  getAllSegments(code: string): Segment[] {
    return this.segments.filter((s) => s.getCode() === code);
  }

  /** The first MSH segment, wherever it sits */
  getHeader(): Segment | undefined {
    return this.getSegment(HEADER_SEGMENT_CODE);
  }

  getMessageType(): MessageType | undefined {
    const header = this.getHeader();
    if (!header) return undefined;
    const code = header.getText(9, 1);
    if (!code) return undefined;
    const structure = header.getText(9, 3);
    return {
      code,
      triggerEvent: header.getText(9, 2),
      ...(structure ? { structure } : {}),
    };
  }

  getControlId(): string {
    return this.getHeader()?.getText(10) ?? '';
  }

  getVersion(): string {
    return this.getHeader()?.getText(12) ?? '';
  }

  isStructurallyValid(): boolean {
    return this.segments[0]?.getCode() === HEADER_SEGMENT_CODE;
  }

  clone(): Message {
    return new Message(
      this.encoding,
      this.segments.map((s) => s.clone())
    );
  }

  /**
   * Field-for-field equality. Empty and absent fields compare equal.
   */
  equals(other: Message): boolean {
    if (this.segments.length !== other.segments.length) return false;
    return this.segments.every((segment, i) => {
      const counterpart = other.segments[i];
      return counterpart !== undefined && segment.equals(counterpart);
    });
  }
}
