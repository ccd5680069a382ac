/**
 * numbers.ts — Numeric field parsers for tool output
 */

import { NumberFormatError } from "../errors.js";

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const SPECIAL = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Parse a plain floating-point number. Unlike `Number()`, empty strings,
 * hex literals and trailing garbage are rejected.
 */
export function parseFloatStrict(value: string | undefined, field?: string): number {
  if (value === undefined) throw new NumberFormatError(value, field);
  const s = value.trim();
  if (DECIMAL.test(s)) return Number(s);

  const special = SPECIAL.exec(s);
  if (special) {
    if (special[2].toLowerCase() === "nan") return Number.NaN;
    return special[1] === "-" ? -Infinity : Infinity;
  }
  throw new NumberFormatError(value, field);
}

/**
 * Parse either a plain number or a degrees:minutes:seconds value into
 * decimal degrees. `0:00:30` → 0.008333…; `45:30S` → -45.5.
 */
export function floatOrDms(value: string | undefined, field?: string): number {
  if (value === undefined) throw new NumberFormatError(value, field);
  let s = value.trim();
  if (!s.includes(":")) return parseFloatStrict(s, field);

  let sign = 1;
  const hemisphere = s.slice(-1).toUpperCase();
  if (hemisphere === "S" || hemisphere === "W") {
    sign = -1;
    s = s.slice(0, -1);
  } else if (hemisphere === "N" || hemisphere === "E") {
    s = s.slice(0, -1);
  }
  if (s.startsWith("-")) {
    sign = -sign;
    s = s.slice(1);
  }

  const parts = s.split(":");
  let total = 0;
  for (let i = 0; i < parts.length; i++) {
    const part = parts[i];
    if (part.startsWith("-") || part.startsWith("+")) {
      throw new NumberFormatError(value, field);
    }
    // Empty components are rejected by parseFloatStrict
    total += parseFloatStrict(part, field) / 60 ** i;
  }
  return sign * total;
}
