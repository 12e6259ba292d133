/**
 * Error hierarchy for HugeInt arithmetic
 *
 * Every failure surfaces synchronously at the offending call; nothing is
 * retried or recovered inside the number core.
 */

export type HugeIntErrorCode =
  | 'invalid_literal'
  | 'divide_by_zero'
  | 'negative_factorial'
  | 'math_domain'
  | 'invalid_argument';

export class HugeIntError extends Error {
  constructor(message: string, public readonly code: HugeIntErrorCode) {
    super(message);
    this.name = 'HugeIntError';
  }
}

export class InvalidLiteralError extends HugeIntError {
  constructor(public readonly input: string) {
    super(`Invalid integer literal: ${JSON.stringify(input)}`, 'invalid_literal');
    this.name = 'InvalidLiteralError';
  }
}

export class DivideByZeroError extends HugeIntError {
  constructor() {
    super('Divide by zero', 'divide_by_zero');
    this.name = 'DivideByZeroError';
  }
}

export class NegativeFactorialError extends HugeIntError {
  constructor() {
    super('Negative integer has no factorial', 'negative_factorial');
    this.name = 'NegativeFactorialError';
  }
}

export class MathDomainError extends HugeIntError {
  constructor(message = 'Math domain error') {
    super(message, 'math_domain');
    this.name = 'MathDomainError';
  }
}

export class InvalidArgumentError extends HugeIntError {
  constructor(message: string) {
    super(message, 'invalid_argument');
    this.name = 'InvalidArgumentError';
  }
}

export function isHugeIntError(err: unknown): err is HugeIntError {
  return err instanceof HugeIntError;
}

export function normalizeError(err: unknown): { name: string; message: string; code?: HugeIntErrorCode } {
  if (isHugeIntError(err)) {
    return { name: err.name, message: err.message, code: err.code };
  }
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
    };
  }
  return {
    name: typeof err,
    message: String(err),
  };
}
