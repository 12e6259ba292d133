/**
 * Parsing surface for callers holding user-facing text
 * Strict by default: anything but `[+-]?[0-9]+` is an InvalidLiteralError,
 * never a silently truncated value.
 */

import { HugeInt, isIntegerLiteral } from './HugeInt.js';
import { InvalidLiteralError } from './errors.js';

export { isIntegerLiteral };

export interface ParseHugeIntOptions {
  /** Ignore surrounding whitespace */
  trim?: boolean;
  /** Accept digit group separators: "1_000", "1,234,567", "1 000" */
  allowSeparators?: boolean;
}

/**
 * Strip separators (underscores, commas, spaces) between digits
 */
function stripSeparators(s: string): string {
  // a separator may not lead, trail, double up or follow the sign
  if (/^[+-]?[_,\s]|[_,\s]$|[_,\s]{2}/.test(s)) return s;
  return s.replace(/[_,\s]/g, '');
}

export function parseHugeInt(input: string, options: ParseHugeIntOptions = {}): HugeInt {
  let s = options.trim ? input.trim() : input;
  if (options.allowSeparators) s = stripSeparators(s);

  if (!isIntegerLiteral(s)) throw new InvalidLiteralError(input);
  return HugeInt.fromString(s);
}

/**
 * Like parseHugeInt, but returns null instead of throwing
 */
export function tryParseHugeInt(input: string, options: ParseHugeIntOptions = {}): HugeInt | null {
  try {
    return parseHugeInt(input, options);
  } catch (err) {
    if (err instanceof InvalidLiteralError) return null;
    throw err;
  }
}
