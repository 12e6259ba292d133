/**
 * Arbitrary-precision decimal integer arithmetic
 */

export {
  HugeInt,
  isIntegerLiteral,
  min,
  max,
  clamp
} from './HugeInt.js';

export type { Sign, HugeIntLike } from './HugeInt.js';

export {
  pow,
  sqrt,
  log,
  gcd,
  lcm,
  factorial,
  nextPrime
} from './algorithms.js';

export { random, RANDOM_DIGITS_UNSPECIFIED } from './random.js';

export type { RandomOptions } from './random.js';

export { parseHugeInt, tryParseHugeInt } from './parse.js';

export type { ParseHugeIntOptions } from './parse.js';

export {
  HugeIntError,
  InvalidLiteralError,
  DivideByZeroError,
  NegativeFactorialError,
  MathDomainError,
  InvalidArgumentError,
  isHugeIntError,
  normalizeError
} from './errors.js';

export type { HugeIntErrorCode } from './errors.js';
