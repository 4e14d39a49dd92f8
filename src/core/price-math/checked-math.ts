import { U128_MAX, U64_MAX } from './constants';
import { ArithmeticOverflowError, DivisionByZeroError, NegativeResultError } from './price-math-errors';

/**
 * Unsigned integer helpers over bigint.
 * Every result is range-checked; nothing wraps.
 */

function limitFor(bits: 64 | 128): bigint {
  return bits === 64 ? U64_MAX : U128_MAX;
}

export function checkedAdd(a: bigint, b: bigint, operation: string, bits: 64 | 128 = 64): bigint {
  const sum = a + b;
  if (sum > limitFor(bits)) {
    throw new ArithmeticOverflowError(operation, bits);
  }
  return sum;
}

export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new NegativeResultError(a, b);
  }
  return a - b;
}

export function checkedMul(a: bigint, b: bigint, operation: string, bits: 64 | 128 = 64): bigint {
  const product = a * b;
  if (product > limitFor(bits)) {
    throw new ArithmeticOverflowError(operation, bits);
  }
  return product;
}

/**
 * Truncating division
 */
export function checkedDiv(a: bigint, b: bigint): bigint {
  if (b === 0n) {
    throw new DivisionByZeroError();
  }
  return a / b;
}

/**
 * Narrow a wide intermediate back to u64
 */
export function toU64(value: bigint, operation: string): bigint {
  if (value > U64_MAX) {
    throw new ArithmeticOverflowError(operation, 64);
  }
  return value;
}

export function pow10(decades: number): bigint {
  return 10n ** BigInt(decades);
}
