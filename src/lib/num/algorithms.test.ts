import { describe, test, expect } from '@jest/globals';
import { HugeInt } from './HugeInt.js';
import { pow, sqrt, log, gcd, lcm, factorial, nextPrime } from './algorithms.js';
import { MathDomainError, NegativeFactorialError } from './errors.js';

describe('pow', () => {
  test('modular', () => {
    expect(pow('2', '10', '1000').toString()).toBe('24');
  });

  test('large exact power', () => {
    expect(pow(2, 100).toString()).toBe('1267650600228229401496703205376');
  });

  test('zero exponent', () => {
    expect(pow(12345, 0).toString()).toBe('1');
    expect(pow(0, 0).toString()).toBe('1');
  });

  test('unit base', () => {
    expect(pow(1, 1000).toString()).toBe('1');
    expect(pow(-1, 3).toString()).toBe('-1');
    expect(pow(-1, 4).toString()).toBe('1');
    expect(pow(1, -5).toString()).toBe('1');
    expect(pow(-1, -3).toString()).toBe('-1');
  });

  test('negative exponent', () => {
    expect(pow(2, -1).isZero()).toBe(true);
    expect(pow(-7, -2).isZero()).toBe(true);
    expect(() => pow(0, -1)).toThrow(MathDomainError);
  });

  test('negative base', () => {
    expect(pow(-3, 3).toString()).toBe('-27');
    expect(pow(-3, 3, 5).toString()).toBe('-2');
  });

  test('mod 0 means no reduction', () => {
    expect(pow(10, 3, 0).toString()).toBe('1000');
  });

  test('does not mutate its arguments', () => {
    const base = HugeInt.fromString('3');
    const exp = HugeInt.fromString('5');
    expect(pow(base, exp).toString()).toBe('243');
    expect(base.toString()).toBe('3');
    expect(exp.toString()).toBe('5');
  });
});

describe('sqrt', () => {
  test('small inputs', () => {
    expect(sqrt(0).toString()).toBe('0');
    expect(sqrt(1).toString()).toBe('1');
    expect(sqrt(3).toString()).toBe('1');
    expect(sqrt(4).toString()).toBe('2');
    expect(sqrt(8).toString()).toBe('2');
    expect(sqrt(9).toString()).toBe('3');
    expect(sqrt(15).toString()).toBe('3');
    expect(sqrt(16).toString()).toBe('4');
  });

  test('floors non-squares', () => {
    expect(sqrt('26').toString()).toBe('5');
    expect(sqrt(99).toString()).toBe('9');
  });

  test('terminates when Newton steps alternate', () => {
    // 24 and 35 sit just below a perfect square
    expect(sqrt(24).toString()).toBe('4');
    expect(sqrt(35).toString()).toBe('5');
    expect(sqrt('9999999999').toString()).toBe('99999');
  });

  test('large perfect square', () => {
    expect(sqrt(HugeInt.pow10(40)).toString()).toBe('100000000000000000000');
  });

  test('negative input', () => {
    expect(() => sqrt(-4)).toThrow(MathDomainError);
  });
});

describe('log', () => {
  test('base 10 uses digit count', () => {
    expect(log(1000, 10).toString()).toBe('3');
    expect(log(999, 10).toString()).toBe('2');
    expect(log(1, 10).toString()).toBe('0');
  });

  test('other bases', () => {
    expect(log(1024, 2).toString()).toBe('10');
    expect(log(1023, 2).toString()).toBe('9');
    expect(log(80, 3).toString()).toBe('3');
    expect(log(1, 2).toString()).toBe('0');
  });

  test('domain errors', () => {
    expect(() => log(0, 2)).toThrow(MathDomainError);
    expect(() => log(-8, 2)).toThrow(MathDomainError);
    expect(() => log(8, 1)).toThrow(MathDomainError);
    expect(() => log(8, -2)).toThrow(MathDomainError);
  });
});

describe('gcd and lcm', () => {
  test('gcd', () => {
    expect(gcd(12, 18).toString()).toBe('6');
    expect(gcd(-4, 6).toString()).toBe('2');
    expect(gcd(17, 5).toString()).toBe('1');
  });

  test('gcd with zero is the absolute value', () => {
    expect(gcd(-4, 0).toString()).toBe('4');
    expect(gcd(0, 9).toString()).toBe('9');
    expect(gcd(0, 0).isZero()).toBe(true);
  });

  test('lcm', () => {
    expect(lcm(4, 6).toString()).toBe('12');
    expect(lcm(-4, 6).toString()).toBe('12');
    expect(lcm(0, 5).isZero()).toBe(true);
    expect(lcm(7, 0).isZero()).toBe(true);
  });
});

describe('factorial', () => {
  test('small values', () => {
    expect(factorial('5').toString()).toBe('120');
    expect(factorial(0).toString()).toBe('1');
    expect(factorial(1).toString()).toBe('1');
  });

  test('large value', () => {
    expect(factorial(25).toString()).toBe('15511210043330985984000000');
  });

  test('negative input', () => {
    expect(() => factorial('-1')).toThrow(NegativeFactorialError);
  });

  test('does not mutate its argument', () => {
    const n = HugeInt.fromString('6');
    expect(factorial(n).toString()).toBe('720');
    expect(n.toString()).toBe('6');
  });
});

describe('nextPrime', () => {
  test('below 2', () => {
    expect(nextPrime(1).toString()).toBe('2');
    expect(nextPrime(0).toString()).toBe('2');
    expect(nextPrime(-5).toString()).toBe('2');
  });

  test('strictly greater than the input', () => {
    expect(nextPrime('10').toString()).toBe('11');
    expect(nextPrime(2).toString()).toBe('3');
    expect(nextPrime(3).toString()).toBe('5');
    expect(nextPrime(13).toString()).toBe('17');
    expect(nextPrime(14).toString()).toBe('17');
    expect(nextPrime(89).toString()).toBe('97');
  });

  test('larger input', () => {
    expect(nextPrime(1000000).toString()).toBe('1000003');
  });
});
