/**
 * Price Types
 * Fixed-point price tuple shared by the price-math core and the CLI
 */

/**
 * Immutable fixed-point price.
 *
 * `mantissa`, `confidence` and `publishTime` are unsigned 64-bit integers;
 * `exponent` is a non-negative power-of-ten scale applied to both mantissa and confidence.
 */
export interface Price {
  readonly mantissa: bigint;
  readonly confidence: bigint;
  readonly exponent: number;
  readonly publishTime: bigint;
}

export interface PriceFields {
  mantissa: bigint;
  confidence: bigint;
  exponent: number;
  publishTime: bigint;
}

export type PriceOperation = 'add' | 'sub' | 'mul' | 'div' | 'combine';

/**
 * Price with bigint fields rendered as decimal strings, for JSON output
 */
export interface SerializedPrice {
  mantissa: string;
  confidence: string;
  exponent: number;
  publishTime: string;
}
