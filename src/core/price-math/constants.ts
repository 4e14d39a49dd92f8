/**
 * Price Math Constants
 * Fixed-point normalization and range limits
 */

/** Decimal places of the internal fixed-point normalization used by mul/div */
export const PD_EXPO = 9;

/** 10^PD_EXPO, divided out of products and multiplied into dividends */
export const PD_SCALE = 1_000_000_000n;

export const SCALE = PD_SCALE;

/** Mantissas produced by normalizePrice fit in this many bits */
export const MAX_MANTISSA_BITS = 28;

export const MAX_PD_MANTISSA = (1n << BigInt(MAX_MANTISSA_BITS)) - 1n;

/** Largest exponent a multiplication may produce */
export const MAX_EXPO = 18;

export const U64_MAX = (1n << 64n) - 1n;

/** Width of intermediate products inside mulPrices/divPrices */
export const U128_MAX = (1n << 128n) - 1n;

/** 10^20 > U64_MAX, so rescaling a u64 across this many decades always saturates */
export const MAX_SCALE_DECADES = 20;
