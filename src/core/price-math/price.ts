import { Price, PriceFields, SerializedPrice } from '../../types';
import { U64_MAX } from './constants';
import { InvalidPriceError } from './price-math-errors';

export function assertU64(field: string, value: bigint): void {
  if (value < 0n) {
    throw new InvalidPriceError(field, `must be non-negative, received ${value}`);
  }
  if (value > U64_MAX) {
    throw new InvalidPriceError(field, `exceeds 64-bit unsigned range, received ${value}`);
  }
}

export function assertExponent(exponent: number): void {
  if (!Number.isSafeInteger(exponent) || exponent < 0) {
    throw new InvalidPriceError('exponent', `must be a non-negative integer, received ${exponent}`);
  }
}

/**
 * Build a frozen Price after validating every field
 */
export function createPrice(fields: PriceFields): Price {
  assertU64('mantissa', fields.mantissa);
  assertU64('confidence', fields.confidence);
  assertExponent(fields.exponent);
  assertU64('publishTime', fields.publishTime);

  return Object.freeze({
    mantissa: fields.mantissa,
    confidence: fields.confidence,
    exponent: fields.exponent,
    publishTime: fields.publishTime,
  });
}

export function isPrice(value: unknown): value is Price {
  if (typeof value !== 'object' || value === null) return false;
  if (
    !('mantissa' in value) ||
    !('confidence' in value) ||
    !('exponent' in value) ||
    !('publishTime' in value)
  ) {
    return false;
  }

  const { mantissa, confidence, exponent, publishTime } = value;

  return (
    typeof mantissa === 'bigint' &&
    typeof confidence === 'bigint' &&
    typeof publishTime === 'bigint' &&
    typeof exponent === 'number' &&
    Number.isSafeInteger(exponent) &&
    exponent >= 0 &&
    [mantissa, confidence, publishTime].every(field => field >= 0n && field <= U64_MAX)
  );
}

export function serializePrice(price: Price): SerializedPrice {
  return {
    mantissa: price.mantissa.toString(),
    confidence: price.confidence.toString(),
    exponent: price.exponent,
    publishTime: price.publishTime.toString(),
  };
}
