import { ConfigAccessor } from '../../../src/core/config-accessor';
import { MapSettingsStore } from '../../../src/stores/settings-store';
import { MapConnectionStringStore } from '../../../src/stores/connection-string-store';
import {
  ConfigValidationError,
  MissingValueError,
  ValueParseError,
} from '../../../src/errors/config-errors';

describe('ConfigAccessor', () => {
  const settings = new MapSettingsStore({
    NAME: 'orders-api',
    EMPTY: '',
    BLANK: '   ',
    ENABLED: 'True',
    PORT: '8080',
    BIG: '9007199254740993',
    RATIO: '0.75',
    START: '2024-01-15T08:00:00Z',
    WORD: 'abc',
    HOSTS: 'a,b,c',
    SPARSE: 'a,,b,',
    LEADING: ',a',
    SOLO: 'solo',
    PIPED: 'x|y',
    COUNT: '42',
    LABEL: 'release 7',
  });

  const connectionStrings = new MapConnectionStringStore({
    primary: { connectionString: 'postgres://db-primary/app', providerName: 'pg' },
    fallback: 'postgres://db-fallback/app',
    hollow: '',
  });

  let accessor: ConfigAccessor;

  beforeEach(() => {
    accessor = new ConfigAccessor({ settings, connectionStrings });
  });

  describe('getSetting', () => {
    it('should return a stored value', () => {
      expect(accessor.getSetting('NAME')).toBe('orders-api');
    });

    it('should throw MissingValueError when the key is absent', () => {
      expect(() => accessor.getSetting('ABSENT')).toThrow(MissingValueError);
      expect(() => accessor.getSetting('ABSENT')).toThrow(
        'AppSetting had no value or the key was missing'
      );
    });

    it('should throw MissingValueError for empty and whitespace values', () => {
      expect(() => accessor.getSetting('EMPTY')).toThrow(MissingValueError);
      expect(() => accessor.getSetting('BLANK')).toThrow(MissingValueError);
    });

    it('should record the key and kind on the error', () => {
      expect(() => accessor.getSetting('ABSENT')).toThrow(
        expect.objectContaining({ kind: 'MissingValue', key: 'ABSENT' })
      );
    });
  });

  describe('getSettingOrDefault', () => {
    it('should return the stored value when present', () => {
      expect(accessor.getSettingOrDefault('NAME', 'fallback')).toBe('orders-api');
    });

    it('should return the default when absent or empty', () => {
      expect(accessor.getSettingOrDefault('ABSENT', 'fallback')).toBe('fallback');
      expect(accessor.getSettingOrDefault('EMPTY', 'fallback')).toBe('fallback');
    });

    it('should return undefined when absent without a default', () => {
      expect(accessor.getSettingOrDefault('ABSENT')).toBeUndefined();
    });

    it('should return a whitespace value as stored', () => {
      expect(accessor.getSettingOrDefault('BLANK', 'fallback')).toBe('   ');
    });
  });

  describe('getSettingAsBool', () => {
    it('should parse the stored value', () => {
      expect(accessor.getSettingAsBool('ENABLED')).toBe(true);
    });

    it('should prefer the stored value over the default', () => {
      expect(accessor.getSettingAsBool('ENABLED', false)).toBe(true);
    });

    it('should return the default when absent', () => {
      expect(accessor.getSettingAsBool('ABSENT', false)).toBe(false);
      expect(accessor.getSettingAsBool('EMPTY', true)).toBe(true);
    });

    it('should throw MissingValueError when absent without a default', () => {
      expect(() => accessor.getSettingAsBool('ABSENT')).toThrow(
        'No AppSetting with a key of ABSENT or it has no value. The key must have a value or a default provided'
      );
    });

    it('should throw ValueParseError for non-boolean text', () => {
      expect(() => accessor.getSettingAsBool('PORT', false)).toThrow(ValueParseError);
    });
  });

  describe('getSettingAsInt', () => {
    it('should return the default when absent', () => {
      expect(accessor.getSettingAsInt('ABSENT', 7)).toBe(7);
    });

    it('should parse the stored value', () => {
      expect(accessor.getSettingAsInt('PORT', 7)).toBe(8080);
      expect(accessor.getSettingAsInt('PORT')).toBe(8080);
    });

    it('should accept zero as a default', () => {
      expect(accessor.getSettingAsInt('ABSENT', 0)).toBe(0);
    });

    it('should throw ValueParseError for non-numeric text', () => {
      expect(() => accessor.getSettingAsInt('WORD', 7)).toThrow(ValueParseError);
      expect(() => accessor.getSettingAsInt('WORD', 7)).toThrow(
        'AppSetting WORD must be a valid 32-bit integer, got: abc'
      );
    });

    it('should throw ValueParseError for a whitespace value', () => {
      expect(() => accessor.getSettingAsInt('BLANK', 7)).toThrow(ValueParseError);
    });

    it('should throw MissingValueError when absent without a default', () => {
      expect(() => accessor.getSettingAsInt('ABSENT')).toThrow(MissingValueError);
    });
  });

  describe('getSettingAsLong', () => {
    it('should keep precision beyond the safe integer range', () => {
      expect(accessor.getSettingAsLong('BIG')).toBe(9007199254740993n);
    });

    it('should return the default when absent', () => {
      expect(accessor.getSettingAsLong('ABSENT', 5n)).toBe(5n);
    });

    it('should throw ValueParseError for non-numeric text', () => {
      expect(() => accessor.getSettingAsLong('RATIO', 0n)).toThrow(ValueParseError);
    });
  });

  describe('getSettingAsDouble', () => {
    it('should parse the stored value', () => {
      expect(accessor.getSettingAsDouble('RATIO')).toBe(0.75);
    });

    it('should return the default when absent', () => {
      expect(accessor.getSettingAsDouble('ABSENT', 1.5)).toBe(1.5);
    });

    it('should throw ValueParseError for non-numeric text', () => {
      expect(() => accessor.getSettingAsDouble('WORD')).toThrow(ValueParseError);
    });
  });

  describe('getSettingAsDate', () => {
    it('should parse the stored value', () => {
      expect(accessor.getSettingAsDate('START').toISOString()).toBe('2024-01-15T08:00:00.000Z');
    });

    it('should return the default when absent', () => {
      const fallback = new Date('2020-01-01T00:00:00Z');
      expect(accessor.getSettingAsDate('ABSENT', fallback)).toBe(fallback);
    });

    it('should throw ValueParseError for invalid dates', () => {
      expect(() => accessor.getSettingAsDate('WORD')).toThrow(ValueParseError);
    });

    it('should throw ValueParseError for numeric and number-bearing text', () => {
      expect(() => accessor.getSettingAsDate('COUNT')).toThrow(
        'AppSetting COUNT must be a valid date, got: 42'
      );
      expect(() => accessor.getSettingAsDate('LABEL', new Date(0))).toThrow(ValueParseError);
      expect(() => accessor.getSettingAsDate('PORT')).toThrow(ValueParseError);
    });
  });

  describe('getSettingArray', () => {
    it('should split on the default delimiter', () => {
      expect(accessor.getSettingArray('HOSTS')).toEqual(['a', 'b', 'c']);
    });

    it('should return a single entry when the delimiter is absent', () => {
      expect(accessor.getSettingArray('SOLO')).toEqual(['solo']);
    });

    it('should drop empty entries by default', () => {
      expect(accessor.getSettingArray('SPARSE')).toEqual(['a', 'b']);
    });

    it('should keep empty entries when asked', () => {
      expect(accessor.getSettingArray('SPARSE', ',', false)).toEqual(['a', '', 'b', '']);
    });

    it('should split on a leading delimiter instead of returning the value whole', () => {
      expect(accessor.getSettingArray('LEADING')).toEqual(['a']);
    });

    it('should honour a custom delimiter', () => {
      expect(accessor.getSettingArray('PIPED', '|')).toEqual(['x', 'y']);
      expect(accessor.getSettingArray('HOSTS', '|')).toEqual(['a,b,c']);
    });

    it('should throw MissingValueError when the key is absent', () => {
      expect(() => accessor.getSettingArray('ABSENT')).toThrow(MissingValueError);
    });

    it('should reject an empty delimiter', () => {
      expect(() => accessor.getSettingArray('HOSTS', '')).toThrow(ConfigValidationError);
    });
  });

  describe('getConnectionString', () => {
    it('should return the primary connection string when present', () => {
      expect(accessor.getConnectionString('primary', 'fallback')).toBe('postgres://db-primary/app');
    });

    it('should use the fallback when the primary is absent', () => {
      expect(accessor.getConnectionString('missing', 'fallback')).toBe(
        'postgres://db-fallback/app'
      );
    });

    it('should throw MissingValueError when both are absent', () => {
      expect(() => accessor.getConnectionString('missing', 'also-missing')).toThrow(
        MissingValueError
      );
      expect(() => accessor.getConnectionString('missing', 'also-missing')).toThrow(
        'The specified key for the connection string was not found'
      );
    });

    it('should report the fallback name when the fallback is absent', () => {
      expect(() => accessor.getConnectionString('missing', 'also-missing')).toThrow(
        expect.objectContaining({ key: 'also-missing' })
      );
    });

    it('should throw MissingValueError when absent without a fallback', () => {
      expect(() => accessor.getConnectionString('missing')).toThrow(MissingValueError);
    });

    it('should treat an empty fallback name as no fallback', () => {
      expect(() => accessor.getConnectionString('missing', '')).toThrow(
        expect.objectContaining({ key: 'missing' })
      );
    });

    it('should throw when the stored connection string is empty', () => {
      expect(() => accessor.getConnectionString('hollow', 'fallback')).toThrow(
        'The value for the specified key for the connection string was empty'
      );
    });

    it('should throw when no connection-string store was supplied', () => {
      const bare = new ConfigAccessor({ settings });
      expect(() => bare.getConnectionString('primary')).toThrow(MissingValueError);
    });
  });

  describe('getConnectionStringEntry', () => {
    it('should return the provider name with the string', () => {
      expect(accessor.getConnectionStringEntry('primary')).toEqual({
        name: 'primary',
        connectionString: 'postgres://db-primary/app',
        providerName: 'pg',
      });
    });

    it('should return the fallback entry under its own name', () => {
      expect(accessor.getConnectionStringEntry('missing', 'fallback')).toEqual({
        name: 'fallback',
        connectionString: 'postgres://db-fallback/app',
      });
    });
  });

  describe('logging', () => {
    it('should log when a default is applied', () => {
      const logger = { debug: jest.fn() };
      const logged = new ConfigAccessor({ settings, logger });

      logged.getSettingAsInt('ABSENT', 3);

      expect(logger.debug).toHaveBeenCalledWith('App setting default applied', { key: 'ABSENT' });
    });

    it('should log when a connection string falls back', () => {
      const logger = { debug: jest.fn() };
      const logged = new ConfigAccessor({ settings, connectionStrings, logger });

      logged.getConnectionString('missing', 'fallback');

      expect(logger.debug).toHaveBeenCalledWith('Connection string fallback used', {
        name: 'missing',
        fallbackName: 'fallback',
      });
    });

    it('should not log when the stored value is used', () => {
      const logger = { debug: jest.fn() };
      const logged = new ConfigAccessor({ settings, logger });

      logged.getSettingAsInt('PORT', 3);

      expect(logger.debug).not.toHaveBeenCalled();
    });
  });
});
