/**
 * Arbitrary-precision signed integer arithmetic
 *
 * Values are stored as a sign plus base-10 digits, least significant first:
 *
 *   12345000  ->  digits [0, 0, 0, 5, 4, 3, 2, 1], sign 1
 *
 * Base 10 trades density for trivial string conversion. Every operation that
 * touches the digit array normalizes before returning, so the following
 * always hold:
 * - the most significant digit is never 0 (zero is the empty array)
 * - sign === 0 exactly when the digit array is empty
 * - every digit is in [0, 9]
 */

import { DivideByZeroError, InvalidArgumentError, InvalidLiteralError } from './errors.js';

export type Sign = 1 | -1 | 0;

/** Anything the arithmetic methods accept as an operand */
export type HugeIntLike = HugeInt | string | number | bigint;

const CHAR_0 = 48;
const CHAR_9 = 57;
const CHAR_PLUS = 43;
const CHAR_MINUS = 45;

/**
 * Test whether `chars[start, end)` matches `[+-]?[0-9]+`
 */
export function isIntegerLiteral(chars: string, start = 0, end = chars.length): boolean {
  if (!Number.isInteger(start) || !Number.isInteger(end)) return false;
  if (start < 0 || end > chars.length) return false;

  const len = end - start;
  if (len <= 0) return false;

  const first = chars.charCodeAt(start);
  const hasSign = first === CHAR_PLUS || first === CHAR_MINUS;
  if (hasSign && len === 1) return false;

  for (let i = start + (hasSign ? 1 : 0); i < end; i++) {
    const c = chars.charCodeAt(i);
    if (c < CHAR_0 || c > CHAR_9) return false;
  }
  return true;
}

function flipSign(sign: Sign): Sign {
  if (sign === 1) return -1;
  if (sign === -1) return 1;
  return 0;
}

/**
 * Compare two normalized magnitudes (little-endian digit arrays)
 */
function compareMagnitude(a: readonly number[], b: readonly number[]): -1 | 0 | 1 {
  if (a.length !== b.length) return a.length > b.length ? 1 : -1;
  for (let i = a.length - 1; i >= 0; i--) {
    if (a[i] !== b[i]) return a[i] > b[i] ? 1 : -1;
  }
  return 0;
}

/**
 * Copy `digits` and pad with most-significant zeros up to `length`
 */
function padDigits(digits: readonly number[], length: number): number[] {
  const out = digits.slice();
  while (out.length < length) out.push(0);
  return out;
}

export class HugeInt {
  private digits_: number[];
  private sign_: Sign;

  private constructor(sign: Sign, digits: number[]) {
    this.sign_ = sign;
    this.digits_ = digits;
  }

  // ============================================================================
  // Construction
  // ============================================================================

  /** A fresh canonical zero */
  static zero(): HugeInt {
    return new HugeInt(0, []);
  }

  /**
   * Parse a decimal literal: optional `+`/`-` followed by one or more ASCII digits.
   * Leading zeros are dropped; "-000" is zero.
   */
  static fromString(text: string): HugeInt {
    return HugeInt.fromChars(text, 0, text.length);
  }

  /**
   * Parse the literal in `chars[start, end)` without slicing the string first
   */
  static fromChars(chars: string, start = 0, end = chars.length): HugeInt {
    if (!isIntegerLiteral(chars, start, end)) {
      throw new InvalidLiteralError(chars.slice(start, end));
    }

    const first = chars.charCodeAt(start);
    const skip = first === CHAR_PLUS || first === CHAR_MINUS ? 1 : 0;
    const digitLen = end - start - skip;

    const digits = new Array<number>(digitLen);
    for (let i = 0; i < digitLen; i++) {
      digits[i] = chars.charCodeAt(end - 1 - i) - CHAR_0;
    }

    return new HugeInt(first === CHAR_MINUS ? -1 : 1, digits).normalize();
  }

  /**
   * Create from a JS number. Only safe integers are accepted, since anything
   * past 2^53 has already lost digits.
   */
  static fromNumber(value: number): HugeInt {
    if (!Number.isSafeInteger(value)) {
      throw new InvalidArgumentError(`Expected a safe integer, got ${value}`);
    }
    if (value === 0) return HugeInt.zero();

    const digits: number[] = [];
    let rest = Math.abs(value);
    while (rest > 0) {
      digits.push(rest % 10);
      rest = Math.floor(rest / 10);
    }
    return new HugeInt(value > 0 ? 1 : -1, digits);
  }

  /**
   * Create from a native bigint (exact)
   */
  static fromBigInt(value: bigint): HugeInt {
    return HugeInt.fromString(value.toString());
  }

  /**
   * Coerce an operand. A HugeInt is returned as is, not copied.
   */
  static from(value: HugeIntLike): HugeInt {
    if (value instanceof HugeInt) return value;
    if (typeof value === 'string') return HugeInt.fromString(value);
    if (typeof value === 'number') return HugeInt.fromNumber(value);
    return HugeInt.fromBigInt(value);
  }

  /**
   * 10^exponent
   */
  static pow10(exponent: number): HugeInt {
    if (!Number.isSafeInteger(exponent) || exponent < 0) {
      throw new InvalidArgumentError(`Exponent must be a non-negative integer, got ${exponent}`);
    }
    const digits = new Array<number>(exponent).fill(0);
    digits.push(1);
    return new HugeInt(1, digits);
  }

  /** Deep copy */
  clone(): HugeInt {
    return new HugeInt(this.sign_, this.digits_.slice());
  }

  /**
   * Move the digit storage into a new value, leaving this one as zero
   */
  take(): HugeInt {
    const moved = new HugeInt(this.sign_, this.digits_);
    this.digits_ = [];
    this.sign_ = 0;
    return moved;
  }

  // ============================================================================
  // Normalization
  // ============================================================================

  private normalize(): this {
    const d = this.digits_;
    while (d.length > 0 && d[d.length - 1] === 0) d.pop();
    if (d.length === 0) this.sign_ = 0;
    return this;
  }

  // Require this != 0
  private absInc(): void {
    const d = this.digits_;
    d.push(0); // room for the carry

    let i = 0;
    while (d[i] === 9) i++;
    d[i]++;
    while (i !== 0) d[--i] = 0;

    this.normalize();
  }

  // Require this != 0
  private absDec(): void {
    const d = this.digits_;

    let i = 0;
    while (d[i] === 0) i++;
    d[i]--;
    while (i !== 0) d[--i] = 9;

    this.normalize();
  }

  private assign(result: HugeInt): HugeInt {
    this.digits_ = result.digits_;
    this.sign_ = result.sign_;
    return this;
  }

  // ============================================================================
  // Basic properties
  // ============================================================================

  get sign(): Sign {
    return this.sign_;
  }

  /** Number of decimal digits; 0 for zero */
  digitCount(): number {
    return this.digits_.length;
  }

  /** Copy of the digits, least significant first */
  toDigits(): number[] {
    return this.digits_.slice();
  }

  isZero(): boolean {
    return this.sign_ === 0;
  }

  isPositive(): boolean {
    return this.sign_ === 1;
  }

  isNegative(): boolean {
    return this.sign_ === -1;
  }

  isEven(): boolean {
    return this.sign_ === 0 || (this.digits_[0] & 1) === 0;
  }

  isOdd(): boolean {
    return !this.isEven();
  }

  // ============================================================================
  // Comparison
  // ============================================================================

  /**
   * Compare this with other
   * Returns: -1 if this < other, 0 if equal, 1 if this > other
   */
  cmp(other: HugeIntLike): -1 | 0 | 1 {
    const that = HugeInt.from(other);

    // positive > zero > negative
    if (this.sign_ !== that.sign_) return this.sign_ > that.sign_ ? 1 : -1;

    const mag = compareMagnitude(this.digits_, that.digits_);
    if (this.sign_ === -1) {
      // Both negative: flip comparison
      if (mag === -1) return 1;
      if (mag === 1) return -1;
      return 0;
    }
    return mag;
  }

  /** Comparator for Array#sort */
  static compare(a: HugeIntLike, b: HugeIntLike): -1 | 0 | 1 {
    return HugeInt.from(a).cmp(b);
  }

  eq(other: HugeIntLike): boolean {
    const that = HugeInt.from(other);
    if (this.sign_ !== that.sign_ || this.digits_.length !== that.digits_.length) return false;
    return this.digits_.every((d, i) => d === that.digits_[i]);
  }

  ne(other: HugeIntLike): boolean { return !this.eq(other); }
  lt(other: HugeIntLike): boolean { return this.cmp(other) === -1; }
  lte(other: HugeIntLike): boolean { return this.cmp(other) <= 0; }
  gt(other: HugeIntLike): boolean { return this.cmp(other) === 1; }
  gte(other: HugeIntLike): boolean { return this.cmp(other) >= 0; }

  // ============================================================================
  // Arithmetic operations
  // ============================================================================

  negate(): HugeInt {
    return new HugeInt(flipSign(this.sign_), this.digits_.slice());
  }

  abs(): HugeInt {
    return this.sign_ === -1 ? this.negate() : this.clone();
  }

  add(rhs: HugeIntLike): HugeInt {
    const that = HugeInt.from(rhs);

    if (this.sign_ === 0 || that.sign_ === 0) {
      return this.sign_ === 0 ? that.clone() : this.clone();
    }

    // Opposite signs: subtract the magnitudes instead
    if (this.sign_ === 1 && that.sign_ === -1) return this.sub(that.negate());
    if (this.sign_ === -1 && that.sign_ === 1) return that.sub(this.negate());

    const size = Math.max(this.digits_.length, that.digits_.length) + 1;
    const a = padDigits(this.digits_, size);
    const b = padDigits(that.digits_, size);
    const c = new Array<number>(size).fill(0);

    for (let i = 0; i < size - 1; i++) {
      c[i] += a[i] + b[i];
      c[i + 1] = Math.floor(c[i] / 10);
      c[i] %= 10;
    }

    return new HugeInt(this.sign_, c).normalize();
  }

  sub(rhs: HugeIntLike): HugeInt {
    const that = HugeInt.from(rhs);

    if (this.sign_ === 0 || that.sign_ === 0) {
      return this.sign_ === 0 ? that.negate() : this.clone();
    }

    if (this.sign_ !== that.sign_) return this.add(that.negate());

    const size = Math.max(this.digits_.length, that.digits_.length);
    let a = padDigits(this.digits_, size);
    let b = padDigits(that.digits_, size);
    let sign: Sign = this.sign_;

    // Keep |a| >= |b|
    if (compareMagnitude(this.digits_, that.digits_) === -1) {
      [a, b] = [b, a];
      sign = flipSign(sign);
    }

    const c = new Array<number>(size).fill(0);
    for (let i = 0; i < size; i++) {
      if (a[i] < b[i]) {
        a[i + 1]--;
        a[i] += 10;
      }
      c[i] = a[i] - b[i];
    }

    return new HugeInt(sign, c).normalize();
  }

  mul(rhs: HugeIntLike): HugeInt {
    const that = HugeInt.from(rhs);
    if (this.sign_ === 0 || that.sign_ === 0) return HugeInt.zero();

    const a = this.digits_;
    const b = that.digits_;
    const c = new Array<number>(a.length + b.length).fill(0);

    for (let i = 0; i < a.length; i++) {
      for (let j = 0; j < b.length; j++) {
        c[i + j] += a[i] * b[j];
        c[i + j + 1] += Math.floor(c[i + j] / 10);
        c[i + j] %= 10;
      }
    }

    return new HugeInt(this.sign_ === that.sign_ ? 1 : -1, c).normalize();
  }

  /**
   * Truncating division (rounds toward zero)
   */
  div(rhs: HugeIntLike): HugeInt {
    return this.divMod(rhs)[0];
  }

  /**
   * Remainder of truncating division; takes the sign of the dividend
   */
  mod(rhs: HugeIntLike): HugeInt {
    return this.divMod(rhs)[1];
  }

  /**
   * Quotient and remainder from a single long division
   */
  divMod(rhs: HugeIntLike): [HugeInt, HugeInt] {
    const that = HugeInt.from(rhs);
    if (that.sign_ === 0) throw new DivideByZeroError();

    if (this.digits_.length < that.digits_.length) {
      return [HugeInt.zero(), this.clone()];
    }

    const size = this.digits_.length - that.digits_.length + 1;
    let remainder = this.abs();

    // that * 10^size; the loop drops one low zero before its first use
    const scaled = new HugeInt(1, new Array<number>(size).fill(0).concat(that.digits_));
    const quotient = new Array<number>(size).fill(0);

    for (let i = size - 1; i >= 0; i--) {
      scaled.digits_.shift(); // scaled = that * 10^i
      while (remainder.gte(scaled)) {
        quotient[i]++;
        remainder = remainder.sub(scaled);
      }
      if (quotient[i] > 9) {
        throw new Error(`Long division produced digit ${quotient[i]} at position ${i}`);
      }
    }

    remainder.sign_ = remainder.digits_.length === 0 ? 0 : this.sign_;
    const q = new HugeInt(this.sign_ === that.sign_ ? 1 : -1, quotient).normalize();
    return [q, remainder];
  }

  // ============================================================================
  // In-place updates
  // ============================================================================

  /** ++this */
  increment(): HugeInt {
    if (this.sign_ === 0) {
      this.sign_ = 1;
      this.digits_.push(1);
    } else if (this.sign_ === 1) {
      this.absInc();
    } else {
      this.absDec();
    }
    return this;
  }

  /** --this */
  decrement(): HugeInt {
    if (this.sign_ === 0) {
      this.sign_ = -1;
      this.digits_.push(1);
    } else if (this.sign_ === 1) {
      this.absDec();
    } else {
      this.absInc();
    }
    return this;
  }

  addAssign(rhs: HugeIntLike): HugeInt { return this.assign(this.add(rhs)); }
  subAssign(rhs: HugeIntLike): HugeInt { return this.assign(this.sub(rhs)); }
  mulAssign(rhs: HugeIntLike): HugeInt { return this.assign(this.mul(rhs)); }
  divAssign(rhs: HugeIntLike): HugeInt { return this.assign(this.div(rhs)); }
  modAssign(rhs: HugeIntLike): HugeInt { return this.assign(this.mod(rhs)); }

  // ============================================================================
  // Conversion
  // ============================================================================

  /**
   * Canonical decimal form: no leading zeros, "-" for negatives, never "+"
   */
  toString(): string {
    if (this.sign_ === 0) return '0';
    const body = this.digits_.slice().reverse().join('');
    return this.sign_ === -1 ? `-${body}` : body;
  }

  toJSON(): string {
    return this.toString();
  }

  /** Exact native bigint */
  toBigInt(): bigint {
    return BigInt(this.toString());
  }

  /**
   * Nearest double; precision is lost past 2^53 and out-of-range values
   * become +/-Infinity
   */
  toNumber(): number {
    return Number(this.toString());
  }

  /**
   * Signed 32-bit integer, wrapping modulo 2^32 on overflow (same as an
   * int32_t cast or `x | 0`)
   */
  toInt32(): number {
    let result = 0;
    for (let i = this.digits_.length - 1; i >= 0; i--) {
      result = (result * 10 + this.digits_[i]) | 0;
    }
    return this.sign_ === -1 ? -result | 0 : result;
  }

  /**
   * Unsigned 32-bit hash of the canonical form; equal values hash equally
   */
  hashCode(): number {
    let hash = this.sign_ + 1;
    for (const d of this.digits_) {
      hash = (Math.imul(hash, 31) + d) | 0;
    }
    return hash >>> 0;
  }
}

// ============================================================================
// Utility functions
// ============================================================================

/** Smaller of the two, as a fresh value */
export function min(a: HugeIntLike, b: HugeIntLike): HugeInt {
  const x = HugeInt.from(a);
  return (x.lte(b) ? x : HugeInt.from(b)).clone();
}

/** Larger of the two, as a fresh value */
export function max(a: HugeIntLike, b: HugeIntLike): HugeInt {
  const x = HugeInt.from(a);
  return (x.gte(b) ? x : HugeInt.from(b)).clone();
}

/**
 * Clamp value between bounds. Never returns one of the arguments, so the
 * result can be updated in place.
 */
export function clamp(value: HugeIntLike, lo: HugeIntLike, hi: HugeIntLike): HugeInt {
  const v = HugeInt.from(value);
  if (v.lt(lo)) return HugeInt.from(lo).clone();
  if (v.gt(hi)) return HugeInt.from(hi).clone();
  return v.clone();
}
