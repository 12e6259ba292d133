/**
 * Random non-negative HugeInt generation
 */

import { HugeInt } from './HugeInt.js';
import { InvalidArgumentError } from './errors.js';
import { cryptoRNG, type RNG } from '../../util/rng.js';
import { getConfig, RANDOM_MAX_DIGITS_LIMIT } from '../../config/index.js';

/** Digit count sentinel meaning "pick one at random" */
export const RANDOM_DIGITS_UNSPECIFIED = -1;

export interface RandomOptions {
  /** Entropy source; defaults to node's crypto.randomInt */
  rng?: RNG;
  /** Inclusive bound for a randomly drawn digit count; defaults to config `random.maxDigits` */
  maxDigits?: number;
}

/**
 * A non-negative integer with exactly `digits` decimal digits (0 digits is
 * zero). With the default `digits` of -1 the count is drawn uniformly from
 * [0, maxDigits].
 */
export function random(digits: number = RANDOM_DIGITS_UNSPECIFIED, options: RandomOptions = {}): HugeInt {
  if (!Number.isSafeInteger(digits) || digits < RANDOM_DIGITS_UNSPECIFIED) {
    throw new InvalidArgumentError(`digits must be a non-negative integer or ${RANDOM_DIGITS_UNSPECIFIED}, got ${digits}`);
  }

  const rng = options.rng ?? cryptoRNG;
  const maxDigits = options.maxDigits ?? getConfig().random.maxDigits;
  if (!Number.isSafeInteger(maxDigits) || maxDigits < 0) {
    throw new InvalidArgumentError(`maxDigits must be a non-negative integer, got ${maxDigits}`);
  }
  if (maxDigits > RANDOM_MAX_DIGITS_LIMIT) {
    throw new InvalidArgumentError(`maxDigits must be at most ${RANDOM_MAX_DIGITS_LIMIT}, got ${maxDigits}`);
  }

  const count = digits === RANDOM_DIGITS_UNSPECIFIED ? rng(maxDigits + 1) : digits;
  if (count === 0) return HugeInt.zero();

  // Built most significant first; the leading digit is re-rolled from [1, 9]
  let text = String(rng(10) || 1 + rng(9));
  for (let i = 1; i < count; i++) {
    text += String(rng(10));
  }
  return HugeInt.fromString(text);
}
