import { decodeField } from '../datatypes/hl7v2/HL7v2Decoder.js';
import type { EncodingCharacters } from '../model/EncodingCharacters.js';
import type { FieldValue } from '../model/FieldValue.js';
import type { Segment } from '../model/Segment.js';

/**
 * "PID-5", "OBX[2]-5", "PID-5.1", "OBX[2]-3.2"
 */
const PIN_KEY = /^([A-Z][A-Z0-9]{2})(?:\[(\d+)\])?-(\d+)(?:\.(\d+))?$/;

interface PinTarget {
  segmentCode: string;
  /** undefined applies to every occurrence */
  occurrence?: number;
  position: number;
  component?: number;
}

interface Pin extends PinTarget {
  text: string;
}

export function parsePinKey(key: string): PinTarget {
  const match = PIN_KEY.exec(key.trim().toUpperCase());
  if (!match) {
    throw new RangeError(`Invalid pinned field path '${key}': expected SEG-n, SEG[k]-n or SEG-n.c`);
  }
  const [, segmentCode = '', occurrence, position = '0', component] = match;
  const target: PinTarget = { segmentCode, position: Number(position) };
  if (occurrence !== undefined) target.occurrence = Number(occurrence);
  if (component !== undefined) target.component = Number(component);
  if (target.position < 1 || (target.occurrence ?? 1) < 1 || (target.component ?? 1) < 1) {
    throw new RangeError(`Invalid pinned field path '${key}': indexes start at 1`);
  }
  return target;
}

/**
 * Caller-pinned values. Field pins are wire text parsed with the message's
 * encoding characters; component pins are literal text. An occurrence pin
 * ("OBX[2]-5") wins over a pin for every occurrence ("OBX-5").
 */
export class PinnedValues {
  private readonly pins: Pin[];

  constructor(
    private readonly encoding: EncodingCharacters,
    pinned: Record<string, string> = {}
  ) {
    this.pins = Object.entries(pinned).map(([key, text]) => ({ ...parsePinKey(key), text }));
  }

  fieldValue(segmentCode: string, occurrence: number, position: number): FieldValue | undefined {
    const pin = this.best(segmentCode, occurrence, position, undefined);
    return pin ? decodeField(pin.text, this.encoding) : undefined;
  }

  /**
   * Write component pins for one field onto the segment.
   */
  applyComponents(segment: Segment, occurrence: number, position: number): void {
    const components = new Set(
      this.pins
        .filter((p) => p.component !== undefined && this.matches(p, segment.getCode(), occurrence, position))
        .map((p) => p.component)
    );
    for (const component of components) {
      if (component === undefined) continue;
      const pin = this.best(segment.getCode(), occurrence, position, component);
      if (pin) {
        segment.setComponent(position, component, pin.text);
      }
    }
  }

  private matches(pin: Pin, segmentCode: string, occurrence: number, position: number): boolean {
    return (
      pin.segmentCode === segmentCode &&
      pin.position === position &&
      (pin.occurrence === undefined || pin.occurrence === occurrence)
    );
  }

  private best(
    segmentCode: string,
    occurrence: number,
    position: number,
    component: number | undefined
  ): Pin | undefined {
    const candidates = this.pins.filter(
      (p) => p.component === component && this.matches(p, segmentCode, occurrence, position)
    );
    return candidates.find((p) => p.occurrence !== undefined) ?? candidates[0];
  }
}
