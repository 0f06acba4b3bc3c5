/**
 * XML value parsing and rendering for series values
 *
 * Element text is read as a numeral prefix: leading whitespace is skipped
 * and anything after the longest decimal numeral is ignored. No numeral
 * prefix means the value is malformed.
 */

import type { NumericKind } from "../../../types/index.js";

const LEADING_SPACE = /^[ \t\n\v\f\r]*/;
const FLOAT_PREFIX = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;
const INTEGER_PREFIX = /^[+-]?\d+/;

/**
 * Outcome of reading one numeral: the value, or why there is none.
 */
export type NumericReading =
  | { value: number }
  | { problem: "not-a-number" | "out-of-range" };

const NOT_A_NUMBER = { problem: "not-a-number" } as const;
const OUT_OF_RANGE = { problem: "out-of-range" } as const;

/**
 * Read a decimal float prefix. A numeral whose value a double cannot hold
 * is out of range.
 */
export const readFloatValue = (text: string): NumericReading => {
  const body = text.replace(LEADING_SPACE, "");
  const match = FLOAT_PREFIX.exec(body);
  if (!match) {
    return NOT_A_NUMBER;
  }
  const value = Number(match[0]);
  return Number.isFinite(value) ? { value } : OUT_OF_RANGE;
};

/**
 * Read a base-10 integer prefix ("12.7" reads as 12). Values outside the
 * safe-integer range are out of range.
 */
export const readIntegerValue = (text: string): NumericReading => {
  const body = text.replace(LEADING_SPACE, "");
  const match = INTEGER_PREFIX.exec(body);
  if (!match) {
    return NOT_A_NUMBER;
  }
  const value = Number(match[0]);
  if (!Number.isSafeInteger(value)) {
    return OUT_OF_RANGE;
  }
  // Number("-0") is -0; an integer series has no negative zero
  return { value: value === 0 ? 0 : value };
};

export const readNumericValue = (text: string, kind: NumericKind): NumericReading =>
  kind === "integer" ? readIntegerValue(text) : readFloatValue(text);

const valueOf = (reading: NumericReading): number | undefined =>
  "value" in reading ? reading.value : undefined;

/** The float value, or undefined when there is none. */
export const parseFloatValue = (text: string): number | undefined => valueOf(readFloatValue(text));

/** The integer value, or undefined when there is none. */
export const parseIntegerValue = (text: string): number | undefined => valueOf(readIntegerValue(text));

export const parseNumericValue = (text: string, kind: NumericKind): number | undefined =>
  valueOf(readNumericValue(text, kind));

/**
 * Render a value in general decimal form. Floats use the shortest text that
 * reads back as the same double.
 */
export const formatNumericValue = (value: number, kind: NumericKind): string => {
  if (kind === "integer") {
    return value.toFixed(0);
  }
  if (Object.is(value, -0)) {
    return "-0";
  }
  return String(value);
};

export const truncateText = (text: string, maxLength: number): string => {
  if (text.length <= maxLength) {
    return text;
  }
  // Never cut between the two halves of a surrogate pair
  const last = text.charCodeAt(maxLength - 1);
  const end = last >= 0xd800 && last <= 0xdbff ? maxLength - 1 : maxLength;
  return text.slice(0, end);
};
