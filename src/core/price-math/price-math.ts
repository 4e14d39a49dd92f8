/**
 * Price Math
 * Exponent-aware fixed-point arithmetic over Price tuples with confidence propagation
 */

import { Price } from '../../types';
import { checkedAdd, checkedDiv, checkedMul, checkedSub, pow10, toU64 } from './checked-math';
import { MAX_EXPO, MAX_PD_MANTISSA, MAX_SCALE_DECADES, PD_SCALE } from './constants';
import { assertExponent, assertU64, createPrice } from './price';
import {
  ArithmeticOverflowError,
  DivisionByZeroError,
  ExponentMismatchError,
  ExponentOverflowError,
  ExponentUnderflowError,
} from './price-math-errors';

function latest(a: Price, b: Price): bigint {
  return a.publishTime > b.publishTime ? a.publishTime : b.publishTime;
}

function requireSameExponent(a: Price, b: Price): void {
  if (a.exponent !== b.exponent) {
    throw new ExponentMismatchError(a.exponent, b.exponent);
  }
}

/**
 * Rescale a bare mantissa between exponents.
 * Moving to a larger exponent divides and truncates; moving to a smaller one multiplies.
 */
export function scalePrice(mantissa: bigint, fromExpo: number, toExpo: number): bigint {
  assertU64('mantissa', mantissa);
  assertExponent(fromExpo);
  assertExponent(toExpo);

  if (fromExpo < toExpo) {
    const decades = toExpo - fromExpo;
    if (decades >= MAX_SCALE_DECADES) return 0n;
    return mantissa / pow10(decades);
  }

  if (fromExpo > toExpo) {
    const decades = fromExpo - toExpo;
    if (mantissa === 0n) return 0n;
    if (decades >= MAX_SCALE_DECADES) {
      throw new ArithmeticOverflowError('scalePrice', 64);
    }
    return checkedMul(mantissa, pow10(decades), 'scalePrice');
  }

  return mantissa;
}

/**
 * Rescale mantissa and confidence together so the price can be combined with
 * another price at `toExpo`
 */
export function scalePriceTo(price: Price, toExpo: number): Price {
  return createPrice({
    mantissa: scalePrice(price.mantissa, price.exponent, toExpo),
    confidence: scalePrice(price.confidence, price.exponent, toExpo),
    exponent: toExpo,
    publishTime: price.publishTime,
  });
}

/**
 * Sum of two prices at the same exponent. Confidences add linearly.
 */
export function addPrices(a: Price, b: Price): Price {
  requireSameExponent(a, b);

  return createPrice({
    mantissa: checkedAdd(a.mantissa, b.mantissa, 'addPrices'),
    confidence: checkedAdd(a.confidence, b.confidence, 'addPrices'),
    exponent: a.exponent,
    publishTime: latest(a, b),
  });
}

/**
 * Difference of two prices at the same exponent. Fails rather than going negative.
 */
export function subPrices(a: Price, b: Price): Price {
  requireSameExponent(a, b);

  return createPrice({
    mantissa: checkedSub(a.mantissa, b.mantissa),
    confidence: checkedAdd(a.confidence, b.confidence, 'subPrices'),
    exponent: a.exponent,
    publishTime: latest(a, b),
  });
}

/**
 * Product of two prices. Exponents add; PD_SCALE is divided out of the product.
 * Confidence uses first-order propagation, dropping a.conf * b.conf.
 */
export function mulPrices(a: Price, b: Price): Price {
  const exponent = a.exponent + b.exponent;
  if (exponent > MAX_EXPO) {
    throw new ExponentOverflowError(exponent, MAX_EXPO);
  }

  const product = checkedMul(a.mantissa, b.mantissa, 'mulPrices', 128);
  const confidenceSpread = checkedAdd(
    checkedMul(a.confidence, b.mantissa, 'mulPrices', 128),
    checkedMul(b.confidence, a.mantissa, 'mulPrices', 128),
    'mulPrices',
    128
  );

  return createPrice({
    mantissa: toU64(product / PD_SCALE, 'mulPrices'),
    confidence: toU64(confidenceSpread / PD_SCALE, 'mulPrices'),
    exponent,
    publishTime: latest(a, b),
  });
}

/**
 * Quotient of two prices. The dividend is lifted by PD_SCALE before dividing.
 * Confidence uses the first-order quotient rule.
 */
export function divPrices(a: Price, b: Price): Price {
  if (b.mantissa === 0n) {
    throw new DivisionByZeroError();
  }
  if (b.exponent > a.exponent) {
    throw new ExponentUnderflowError(a.exponent, b.exponent);
  }

  const dividend = checkedMul(a.mantissa, PD_SCALE, 'divPrices', 128);
  const confidenceSpread = checkedAdd(
    checkedMul(a.confidence, PD_SCALE, 'divPrices', 128),
    checkedMul(b.confidence, a.mantissa, 'divPrices', 128),
    'divPrices',
    128
  );

  return createPrice({
    mantissa: toU64(checkedDiv(dividend, b.mantissa), 'divPrices'),
    confidence: toU64(checkedDiv(confidenceSpread, b.mantissa), 'divPrices'),
    exponent: a.exponent - b.exponent,
    publishTime: latest(a, b),
  });
}

/**
 * Express `price` in the unit of `quote` when both are quoted in a shared currency,
 * e.g. BTC/USD combined with ETH/USD gives BTC/ETH.
 */
export function combinePrices(price: Price, quote: Price): Price {
  return divPrices(price, quote);
}

/**
 * Shrink mantissa and confidence to MAX_MANTISSA_BITS by raising the exponent,
 * truncating one decade at a time
 */
export function normalizePrice(price: Price): Price {
  let { mantissa, confidence, exponent } = price;

  while (mantissa > MAX_PD_MANTISSA || confidence > MAX_PD_MANTISSA) {
    if (exponent >= Number.MAX_SAFE_INTEGER) {
      throw new ExponentOverflowError(exponent + 1, Number.MAX_SAFE_INTEGER);
    }
    mantissa /= 10n;
    confidence /= 10n;
    exponent += 1;
  }

  return createPrice({ mantissa, confidence, exponent, publishTime: price.publishTime });
}
