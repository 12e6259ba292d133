import { describe, test, expect, afterEach } from '@jest/globals';
import { random } from './random.js';
import { InvalidArgumentError } from './errors.js';
import { seededRNG, type RNG } from '../../util/rng.js';
import { resetConfigCache, RANDOM_MAX_DIGITS_LIMIT } from '../../config/index.js';

/** Replays fixed draws, reduced into range */
function scripted(...draws: number[]): RNG {
  let i = 0;
  return (maxExclusive: number) => draws[i++] % maxExclusive;
}

describe('random', () => {
  afterEach(() => {
    delete process.env.HUGEINT_RANDOM_MAX_DIGITS;
    resetConfigCache();
  });

  test('exact digit count, leading zero re-rolled from 1..9', () => {
    // 0 -> re-roll 5 -> digit 6, then 7, 2
    const n = random(3, { rng: scripted(0, 5, 7, 2) });
    expect(n.toString()).toBe('672');
  });

  test('leading digit kept when non-zero', () => {
    expect(random(2, { rng: scripted(9, 0) }).toString()).toBe('90');
  });

  test('zero digits is canonical zero', () => {
    const n = random(0, { rng: scripted() });
    expect(n.isZero()).toBe(true);
    expect(n.sign).toBe(0);
  });

  test('unspecified digit count is drawn from [0, maxDigits]', () => {
    // count 4, then digits 3, 1, 2, 3
    const n = random(-1, { rng: scripted(4, 3, 1, 2, 3), maxDigits: 5 });
    expect(n.toString()).toBe('3123');
  });

  test('unspecified draw of zero digits', () => {
    expect(random(-1, { rng: scripted(0), maxDigits: 5 }).isZero()).toBe(true);
  });

  test('default bound comes from config', () => {
    process.env.HUGEINT_RANDOM_MAX_DIGITS = '2';
    resetConfigCache();
    const rng = seededRNG(11);
    for (let i = 0; i < 50; i++) {
      const n = random(-1, { rng });
      expect(n.digitCount()).toBeLessThanOrEqual(2);
      expect(n.isNegative()).toBe(false);
    }
  });

  test('seeded sources are reproducible', () => {
    const a = random(50, { rng: seededRNG(7) });
    const b = random(50, { rng: seededRNG(7) });
    expect(a.eq(b)).toBe(true);
    expect(a.digitCount()).toBe(50);
    expect(a.isPositive()).toBe(true);
  });

  test('crypto source by default', () => {
    const n = random(40);
    expect(n.digitCount()).toBe(40);
    expect(n.isPositive()).toBe(true);
  });

  test('rejects invalid digit counts', () => {
    expect(() => random(-2)).toThrow(InvalidArgumentError);
    expect(() => random(1.5)).toThrow(InvalidArgumentError);
    expect(() => random(-1, { maxDigits: -3 })).toThrow(InvalidArgumentError);
  });

  test('rejects a digit bound past the entropy source range', () => {
    expect(() => random(-1, { maxDigits: 2 ** 50 })).toThrow(InvalidArgumentError);
    expect(() => random(-1, { maxDigits: RANDOM_MAX_DIGITS_LIMIT + 1 })).toThrow(
      `maxDigits must be at most ${RANDOM_MAX_DIGITS_LIMIT}, got ${RANDOM_MAX_DIGITS_LIMIT + 1}`,
    );
  });

  test('the largest digit bound is accepted', () => {
    expect(random(-1, { maxDigits: RANDOM_MAX_DIGITS_LIMIT, rng: () => 0 }).isZero()).toBe(true);
  });
});
