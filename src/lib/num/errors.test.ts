import { describe, test, expect } from '@jest/globals';
import {
  HugeIntError,
  MathDomainError,
  DivideByZeroError,
  InvalidArgumentError,
  isHugeIntError,
  normalizeError,
} from './errors.js';

describe('errors', () => {
  test('subclasses share the base class and carry a code', () => {
    const err = new MathDomainError();
    expect(err).toBeInstanceOf(HugeIntError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('MathDomainError');
    expect(err.code).toBe('math_domain');
    expect(err.message).toBe('Math domain error');
  });

  test('isHugeIntError narrows', () => {
    expect(isHugeIntError(new DivideByZeroError())).toBe(true);
    expect(isHugeIntError(new Error('x'))).toBe(false);
    expect(isHugeIntError('x')).toBe(false);
  });

  test('normalizeError shapes any throwable', () => {
    expect(normalizeError(new InvalidArgumentError('bad'))).toEqual({
      name: 'InvalidArgumentError',
      message: 'bad',
      code: 'invalid_argument',
    });
    expect(normalizeError(new TypeError('nope'))).toEqual({ name: 'TypeError', message: 'nope' });
    expect(normalizeError(42)).toEqual({ name: 'number', message: '42' });
  });
});
