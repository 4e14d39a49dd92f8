export * from './constants';
export * from './price-math-errors';
export { createPrice, isPrice, serializePrice } from './price';
export {
  scalePrice,
  scalePriceTo,
  addPrices,
  subPrices,
  mulPrices,
  divPrices,
  combinePrices,
  normalizePrice,
} from './price-math';
