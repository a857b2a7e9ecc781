import { InvalidConfigurationError } from '../../../src/utils/common/errors';
import {
  parseEnergyMode,
  parseEnvVar,
  parseFlag,
  parseHashVariant,
  parseInteger,
  parseNonNegativeNumber,
  parseShiftState,
  parseTableSizes,
  validateAnnealingConfig,
} from '../../../src/utils/common/parser';

describe('common utils', () => {
  describe('parseEnvVar', () => {
    it('should return the value when environment variable is defined', () => {
      const value = 'test-value';
      expect(parseEnvVar(value)).toBe(value);
    });

    it('should throw error when environment variable is undefined', () => {
      expect(() => parseEnvVar(undefined, 'WORDS_PATH')).toThrow(
        'Invalid configuration: missing environment variable WORDS_PATH',
      );
    });
  });

  describe('parseInteger', () => {
    it('returns default when value is undefined or blank', () => {
      expect(parseInteger(undefined, 5, 'KMAX')).toBe(5);
      expect(parseInteger('  ', 5, 'KMAX')).toBe(5);
    });
    it('parses provided value when defined', () => {
      expect(parseInteger(' 12 ', 5, 'KMAX')).toBe(12);
    });
    it('throws for fractional or non-numeric values', () => {
      expect(() => parseInteger('1.5', 5, 'KMAX')).toThrow(InvalidConfigurationError);
      expect(() => parseInteger('many', 5, 'KMAX')).toThrow(InvalidConfigurationError);
    });
  });

  describe('parseNonNegativeNumber', () => {
    it('parses fractional tolerances', () => {
      expect(parseNonNegativeNumber('0.25', 0, 'EMAX')).toBe(0.25);
      expect(parseNonNegativeNumber(undefined, 2, 'EMAX')).toBe(2);
    });
    it('throws for negative values', () => {
      expect(() => parseNonNegativeNumber('-1', 0, 'EMAX')).toThrow(InvalidConfigurationError);
    });
  });

  describe('parseTableSizes', () => {
    it('returns the default size when unset', () => {
      expect(parseTableSizes(undefined)).toEqual([1048576]);
    });
    it('parses a comma-separated list in order', () => {
      expect(parseTableSizes('1024, 64,')).toEqual([1024, 64]);
    });
    it('throws for a size that is not a power of two', () => {
      expect(() => parseTableSizes('1024,1000')).toThrow('Table size must be a power of two');
    });
    it('throws for a size of one', () => {
      expect(() => parseTableSizes('1')).toThrow(InvalidConfigurationError);
    });
  });

  describe('parseShiftState', () => {
    it('returns the reference state when unset', () => {
      expect(parseShiftState(undefined)).toEqual({ a: 20, b: 12, c: 7, d: 4 });
    });
    it('parses a:b:c:d', () => {
      expect(parseShiftState('1:2: 3:31')).toEqual({ a: 1, b: 2, c: 3, d: 31 });
    });
    it('throws for the wrong number of fields', () => {
      expect(() => parseShiftState('1:2:3')).toThrow(
        'Invalid configuration: shift state "1:2:3" must have the form a:b:c:d',
      );
    });
    it('throws for out-of-range shifts', () => {
      expect(() => parseShiftState('1:2:3:32')).toThrow(InvalidConfigurationError);
      expect(() => parseShiftState('-1:2:3:4')).toThrow(InvalidConfigurationError);
    });
  });

  describe('parseHashVariant', () => {
    it('parses supported variants case-insensitively', () => {
      expect(parseHashVariant('ADDITIVE')).toBe('additive');
      expect(parseHashVariant(undefined)).toBe('polynomial');
    });
    it('throws for unsupported variants', () => {
      expect(() => parseHashVariant('fnv')).toThrow(InvalidConfigurationError);
    });
  });

  describe('parseEnergyMode', () => {
    it('parses supported modes case-insensitively', () => {
      expect(parseEnergyMode('Average')).toBe('average');
      expect(parseEnergyMode(undefined)).toBe('sum');
    });
    it('throws for unsupported modes', () => {
      expect(() => parseEnergyMode('median')).toThrow(InvalidConfigurationError);
    });
  });

  describe('parseFlag', () => {
    it('only accepts true', () => {
      expect(parseFlag('TRUE')).toBe(true);
      expect(parseFlag('yes')).toBe(false);
      expect(parseFlag(undefined)).toBe(false);
    });
  });

  describe('validateAnnealingConfig', () => {
    const config = {
      size: 1024,
      kmax: 10,
      emax: 0,
      initialState: { a: 20, b: 12, c: 7, d: 4 },
      energyMode: 'sum' as const,
    };

    it('accepts a valid configuration', () => {
      expect(validateAnnealingConfig(config)).toEqual(config);
    });
    it('accepts a zero iteration budget', () => {
      expect(validateAnnealingConfig({ ...config, kmax: 0 }).kmax).toBe(0);
    });
    it('rejects invalid fields', () => {
      expect(() => validateAnnealingConfig({ ...config, size: 6 })).toThrow(
        InvalidConfigurationError,
      );
      expect(() => validateAnnealingConfig({ ...config, kmax: 2.5 })).toThrow(
        InvalidConfigurationError,
      );
      expect(() => validateAnnealingConfig({ ...config, emax: -1 })).toThrow(
        InvalidConfigurationError,
      );
      expect(() =>
        validateAnnealingConfig({ ...config, initialState: { a: 20, b: 12, c: 7, d: 40 } }),
      ).toThrow('initialState.d');
    });
  });
});
