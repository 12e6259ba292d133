/**
 * Number-theoretic helpers built on HugeInt
 */

import { HugeInt, type HugeIntLike } from './HugeInt.js';
import { MathDomainError, NegativeFactorialError } from './errors.js';

/**
 * `(base ** exp) % mod` by square-and-multiply.
 *
 * `mod` = 0 is the "no modulus" sentinel: the reduction step is skipped, it
 * does not mean "modulo zero". Any other `mod` reduces after every
 * multiplication with truncating `%`, so a negative result is possible for a
 * negative base.
 *
 * A negative exponent yields 0 (integer power) unless |base| is 1; for a zero
 * base it is a MathDomainError.
 */
export function pow(base: HugeIntLike, exp: HugeIntLike, mod: HugeIntLike = 0): HugeInt {
  const b = HugeInt.from(base);
  const e = HugeInt.from(exp);
  const m = HugeInt.from(mod);

  // |base| == 1: only a negative base with an odd exponent gives -1
  if (b.abs().eq(1)) {
    return HugeInt.fromNumber(b.isNegative() && e.isOdd() ? -1 : 1);
  }

  if (e.isNegative()) {
    if (b.isZero()) throw new MathDomainError('Zero cannot be raised to a negative power');
    return HugeInt.zero();
  }

  const reduce = (v: HugeInt) => (m.isZero() ? v : v.mod(m));

  let num = b.clone();
  let n = e.clone();
  let result = HugeInt.fromNumber(1);

  while (!n.isZero()) {
    if (n.isOdd()) {
      result = reduce(result.mul(num));
    }
    num = reduce(num.mul(num));
    n = n.div(2);
  }

  return result;
}

/**
 * Integer square root, floor(sqrt(n)), by Newton's method
 */
export function sqrt(value: HugeIntLike): HugeInt {
  const n = HugeInt.from(value);
  if (n.isNegative()) throw new MathDomainError('Cannot compute square root of a negative integer');

  if (n.isZero()) return HugeInt.zero();
  if (n.lt(4)) return HugeInt.fromNumber(1);
  if (n.lt(9)) return HugeInt.fromNumber(2);
  if (n.lt(16)) return HugeInt.fromNumber(3);

  // Seed at 10^(digits/2 - 1), at or below the root. One step lands at or
  // above floor(sqrt(n)); from there the sequence decreases until it stops.
  const step = (x: HugeInt) => x.add(n.div(x)).div(2);

  let cur = step(HugeInt.pow10(Math.floor(n.digitCount() / 2) - 1));
  for (;;) {
    const next = step(cur);
    if (next.gte(cur)) return cur;
    cur = next;
  }
}

/**
 * floor(log_base(value))
 */
export function log(value: HugeIntLike, base: HugeIntLike): HugeInt {
  const n = HugeInt.from(value);
  const b = HugeInt.from(base);
  if (!n.isPositive() || b.lt(2)) {
    throw new MathDomainError(`Logarithm undefined for value ${n} and base ${b}`);
  }

  if (b.eq(10)) return HugeInt.fromNumber(n.digitCount() - 1);

  const result = HugeInt.zero();
  let rest = n.div(b);
  while (!rest.isZero()) {
    result.increment();
    rest = rest.div(b);
  }
  return result;
}

/**
 * Greatest common divisor (Euclid); never negative
 */
export function gcd(a: HugeIntLike, b: HugeIntLike): HugeInt {
  let x = HugeInt.from(a);
  let y = HugeInt.from(b);
  while (!y.isZero()) {
    [x, y] = [y, x.mod(y)];
  }
  return x.abs();
}

/**
 * Least common multiple; never negative, 0 if either input is 0
 */
export function lcm(a: HugeIntLike, b: HugeIntLike): HugeInt {
  const x = HugeInt.from(a);
  const y = HugeInt.from(b);
  if (x.isZero() || y.isZero()) return HugeInt.zero();
  return x.mul(y).abs().div(gcd(x, y));
}

export function factorial(value: HugeIntLike): HugeInt {
  const n = HugeInt.from(value);
  if (n.isNegative()) throw new NegativeFactorialError();

  let result = HugeInt.fromNumber(1); // 0! == 1
  for (const i = n.clone(); i.isPositive(); i.decrement()) {
    result = result.mul(i);
  }
  return result;
}

/**
 * Smallest prime strictly greater than `value`
 */
export function nextPrime(value: HugeIntLike): HugeInt {
  const n = HugeInt.from(value);
  if (n.lt(2)) return HugeInt.fromNumber(2);

  // Every prime past 2 is odd: step back to an odd start, then walk by 2
  const prime = n.clone();
  if (prime.isEven()) prime.decrement();

  for (;;) {
    prime.increment().increment();
    if (isPrimeByTrialDivision(prime)) return prime;
  }
}

function isPrimeByTrialDivision(candidate: HugeInt): boolean {
  for (const i = HugeInt.fromNumber(2); i.mul(i).lte(candidate); i.increment()) {
    if (candidate.mod(i).isZero()) return false;
  }
  return true;
}
