import {
  parseExponent,
  parsePriceTuple,
  parseUnsignedInteger,
} from '../../../cli/utils/validation';
import { InvalidPriceError } from '../../../core/price-math';

describe('CLI Validation', () => {
  describe('parseUnsignedInteger', () => {
    it('should parse base-10 unsigned integers', () => {
      expect(parseUnsignedInteger('0', 'Mantissa')).toBe(0n);
      expect(parseUnsignedInteger(' 18446744073709551615 ', 'Mantissa')).toBe(18446744073709551615n);
    });

    it('should reject signs, decimals and other formats', () => {
      for (const value of ['-1', '+1', '1.5', '1e3', '0x10', 'abc', '']) {
        expect(() => parseUnsignedInteger(value, 'Mantissa')).toThrow(
          `Mantissa must be an unsigned integer, received "${value}"`
        );
      }
    });
  });

  describe('parseExponent', () => {
    it('should parse exponents as numbers', () => {
      expect(parseExponent('18', 'Exponent')).toBe(18);
    });

    it('should reject exponents beyond the safe integer range', () => {
      expect(() => parseExponent('9007199254740992', 'Exponent')).toThrow(
        'Exponent is too large, received "9007199254740992"'
      );
    });
  });

  describe('parsePriceTuple', () => {
    it('should parse a mantissa:confidence:exponent:publishTime tuple', () => {
      expect(parsePriceTuple('150000000:1000000:8:100', 'Price A')).toEqual({
        mantissa: 150000000n,
        confidence: 1000000n,
        exponent: 8,
        publishTime: 100n,
      });
    });

    it('should reject tuples with the wrong number of parts', () => {
      expect(() => parsePriceTuple('150000000:1000000:8', 'Price A')).toThrow(
        'Price A must be formatted as mantissa:confidence:exponent:publishTime, received "150000000:1000000:8"'
      );
    });

    it('should name the offending part', () => {
      expect(() => parsePriceTuple('1.5:0:8:100', 'Price B')).toThrow(
        'Price B mantissa must be an unsigned integer, received "1.5"'
      );
    });

    it('should reject values beyond 64 bits', () => {
      expect(() => parsePriceTuple('18446744073709551616:0:8:100', 'Price A')).toThrow(
        InvalidPriceError
      );
    });
  });
});
