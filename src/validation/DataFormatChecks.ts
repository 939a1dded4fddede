/**
 * Format checks for primitive data types whose lexical form is fixed.
 * Other types are free text as far as the validator is concerned.
 */

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const SEQUENCE_ID = /^\d+$/;
const DATE = /^(\d{4})(?:(\d{2})(?:(\d{2}))?)?$/;
const TIME = /^(\d{2})(?:(\d{2})(?:(\d{2})(?:\.\d{1,4})?)?)?(?:[+-]\d{4})?$/;
const TIMESTAMP = /^(\d{4})(?:(\d{2})(?:(\d{2})(?:(\d{2})(?:(\d{2})(?:(\d{2})(?:\.\d{1,4})?)?)?)?)?)?(?:[+-]\d{4})?$/;

function inRange(part: string | undefined, min: number, max: number): boolean {
  if (part === undefined) return true;
  const value = Number(part);
  return value >= min && value <= max;
}

function validDate(month: string | undefined, day: string | undefined): boolean {
  return inRange(month, 1, 12) && inRange(day, 1, 31);
}

function validTime(hour: string | undefined, minute: string | undefined, second: string | undefined): boolean {
  return inRange(hour, 0, 23) && inRange(minute, 0, 59) && inRange(second, 0, 59);
}

export const FORMAT_CHECKED_TYPES: ReadonlySet<string> = new Set(['NM', 'SI', 'DT', 'TM', 'TS', 'DTM']);

/**
 * Returns a description of the expected format when `value` does not
 * conform, undefined when it does or the type is not format-checked.
 */
export function checkDataFormat(dataType: string, value: string): string | undefined {
  switch (dataType.toUpperCase()) {
    case 'NM':
      return NUMERIC.test(value) ? undefined : 'a number';
    case 'SI':
      return SEQUENCE_ID.test(value) ? undefined : 'a non-negative integer';
    case 'DT': {
      const m = DATE.exec(value);
      return m && validDate(m[2], m[3]) ? undefined : 'a date YYYY[MM[DD]]';
    }
    case 'TM': {
      const m = TIME.exec(value);
      return m && validTime(m[1], m[2], m[3]) ? undefined : 'a time HH[MM[SS[.S]]][+/-ZZZZ]';
    }
    case 'TS':
    case 'DTM': {
      const m = TIMESTAMP.exec(value);
      return m && validDate(m[2], m[3]) && validTime(m[4], m[5], m[6])
        ? undefined
        : 'a timestamp YYYY[MM[DD[HH[MM[SS[.S]]]]]][+/-ZZZZ]';
    }
    default:
      return undefined;
  }
}
