import { Price } from '../../types';
import { createPrice } from '../../core/price-math';

const UNSIGNED_INTEGER = /^\d+$/;

/**
 * Parse a base-10 unsigned integer argument
 * @param value Raw argument
 * @param fieldName Name of the field for error messages
 */
export function parseUnsignedInteger(value: string, fieldName: string): bigint {
  const trimmed = value.trim();
  if (!UNSIGNED_INTEGER.test(trimmed)) {
    throw new Error(`${fieldName} must be an unsigned integer, received "${value}"`);
  }
  return BigInt(trimmed);
}

/**
 * Parse an exponent argument
 * @param value Raw argument
 * @param fieldName Name of the field for error messages
 */
export function parseExponent(value: string, fieldName: string): number {
  const parsed = parseUnsignedInteger(value, fieldName);
  if (parsed > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new Error(`${fieldName} is too large, received "${value}"`);
  }
  return Number(parsed);
}

/**
 * Parse a price tuple of the form mantissa:confidence:exponent:publishTime
 * @param value Raw argument (e.g., 150000000:1000000:8:100)
 * @param fieldName Name of the option for error messages
 */
export function parsePriceTuple(value: string, fieldName: string): Price {
  const parts = value.split(':');
  if (parts.length !== 4) {
    throw new Error(
      `${fieldName} must be formatted as mantissa:confidence:exponent:publishTime, received "${value}"`
    );
  }

  const [mantissa, confidence, exponent, publishTime] = parts;
  return createPrice({
    mantissa: parseUnsignedInteger(mantissa, `${fieldName} mantissa`),
    confidence: parseUnsignedInteger(confidence, `${fieldName} confidence`),
    exponent: parseExponent(exponent, `${fieldName} exponent`),
    publishTime: parseUnsignedInteger(publishTime, `${fieldName} publishTime`),
  });
}
