// Price arithmetic error types

export type PriceMathErrorCode =
  | 'EXPONENT_MISMATCH'
  | 'EXPONENT_OVERFLOW'
  | 'EXPONENT_UNDERFLOW'
  | 'DIVISION_BY_ZERO'
  | 'ARITHMETIC_OVERFLOW'
  | 'NEGATIVE_RESULT'
  | 'INVALID_PRICE';

/**
 * Base class for every failure raised by the price-math core.
 * Operations never return a wrapped or truncated value in place of one of these.
 */
export abstract class PriceMathError extends Error {
  abstract readonly code: PriceMathErrorCode;
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
  }
}

export class ExponentMismatchError extends PriceMathError {
  readonly code = 'EXPONENT_MISMATCH';

  constructor(left: number, right: number) {
    super(`Cannot operate on different exponents: ${left} vs ${right}`, { left, right });
  }
}

export class ExponentOverflowError extends PriceMathError {
  readonly code = 'EXPONENT_OVERFLOW';

  constructor(exponent: number, max: number) {
    super(`Exponent ${exponent} exceeds maximum ${max}`, { exponent, max });
  }
}

export class ExponentUnderflowError extends PriceMathError {
  readonly code = 'EXPONENT_UNDERFLOW';

  constructor(dividendExponent: number, divisorExponent: number) {
    super(
      `Divisor exponent ${divisorExponent} is greater than dividend exponent ${dividendExponent}`,
      { dividendExponent, divisorExponent }
    );
  }
}

export class DivisionByZeroError extends PriceMathError {
  readonly code = 'DIVISION_BY_ZERO';

  constructor() {
    super('Cannot divide by a zero mantissa');
  }
}

export class ArithmeticOverflowError extends PriceMathError {
  readonly code = 'ARITHMETIC_OVERFLOW';

  constructor(operation: string, bits: 64 | 128) {
    super(`Arithmetic overflow in ${operation}: result exceeds ${bits}-bit unsigned range`, {
      operation,
      bits,
    });
  }
}

export class NegativeResultError extends PriceMathError {
  readonly code = 'NEGATIVE_RESULT';

  constructor(minuend: bigint, subtrahend: bigint) {
    super(`Negative price not representable: ${minuend} - ${subtrahend}`, {
      minuend: minuend.toString(),
      subtrahend: subtrahend.toString(),
    });
  }
}

export class InvalidPriceError extends PriceMathError {
  readonly code = 'INVALID_PRICE';

  constructor(field: string, reason: string) {
    super(`Invalid price ${field}: ${reason}`, { field, reason });
  }
}

export type PriceMathErrorTypes =
  | ExponentMismatchError
  | ExponentOverflowError
  | ExponentUnderflowError
  | DivisionByZeroError
  | ArithmeticOverflowError
  | NegativeResultError
  | InvalidPriceError;

export function isPriceMathError(error: unknown): error is PriceMathErrorTypes {
  return error instanceof PriceMathError;
}
