import {
  AccessorLogger,
  ConfigAccessorOptions,
  ConnectionStringEntry,
  ConnectionStringSource,
  SettingsSource,
} from '../types';
import { ConfigValidationError, MissingValueError, ValueParseError } from '../errors/config-errors';
import { parseBoolean, parseDate, parseDouble, parseInt32, parseInt64 } from './converters';
import { MapConnectionStringStore } from '../stores/connection-string-store';

const MISSING_APP_SETTING = 'AppSetting had no value or the key was missing';
const CONNECTION_STRING_NOT_FOUND = 'The specified key for the connection string was not found';
const CONNECTION_STRING_EMPTY = 'The value for the specified key for the connection string was empty';

/**
 * ConfigAccessor - Typed reads over an app-settings store and a
 * connection-string store
 *
 * Every typed getter follows one rule: a non-empty stored value is parsed
 * (and must parse), otherwise the default is used, otherwise the read fails
 * with MissingValueError.
 *
 * Usage:
 *   const accessor = new ConfigAccessor({ settings: new EnvSettingsStore() });
 *   const timeoutMs = accessor.getSettingAsInt('HTTP_TIMEOUT_MS', 5000);
 */
export class ConfigAccessor {
  private readonly settings: SettingsSource;
  private readonly connectionStrings: ConnectionStringSource;
  private readonly logger: AccessorLogger | undefined;

  constructor(options: ConfigAccessorOptions) {
    this.settings = options.settings;
    this.connectionStrings = options.connectionStrings ?? new MapConnectionStringStore();
    this.logger = options.logger;
  }

  /**
   * Get a required app setting (throws if missing, empty or whitespace)
   */
  getSetting(key: string): string {
    const value = this.settings.get(key);
    if (value === undefined || value.trim() === '') {
      throw new MissingValueError(key, MISSING_APP_SETTING);
    }
    return value;
  }

  /**
   * Get an app setting, falling back to the default when absent or empty.
   * A whitespace-only value is returned as stored.
   */
  getSettingOrDefault(key: string, defaultValue: string): string;
  getSettingOrDefault(key: string, defaultValue?: string): string | undefined;
  getSettingOrDefault(key: string, defaultValue?: string): string | undefined {
    const value = this.settings.get(key);
    if (isEmpty(value)) {
      this.logDefaultApplied(key);
      return defaultValue;
    }
    return value;
  }

  getSettingAsBool(key: string, defaultValue?: boolean): boolean {
    return this.readTyped(key, defaultValue, parseBoolean, 'boolean');
  }

  /**
   * 32-bit signed integer
   */
  getSettingAsInt(key: string, defaultValue?: number): number {
    return this.readTyped(key, defaultValue, parseInt32, '32-bit integer');
  }

  /**
   * 64-bit signed integer, as a bigint so the full range survives
   */
  getSettingAsLong(key: string, defaultValue?: bigint): bigint {
    return this.readTyped(key, defaultValue, parseInt64, '64-bit integer');
  }

  getSettingAsDouble(key: string, defaultValue?: number): number {
    return this.readTyped(key, defaultValue, parseDouble, 'number');
  }

  getSettingAsDate(key: string, defaultValue?: Date): Date {
    return this.readTyped(key, defaultValue, parseDate, 'date');
  }

  /**
   * Split a delimited app setting. A value without the delimiter comes back
   * as a single entry; a missing or blank value throws MissingValueError.
   */
  getSettingArray(key: string, delimiter = ',', removeEmptyEntries = true): string[] {
    if (delimiter === '') {
      throw new ConfigValidationError('delimiter must not be empty', key);
    }

    const value = this.getSetting(key);
    // A leading delimiter splits too: ",a" → ["a"], not [",a"]
    if (!value.includes(delimiter)) {
      return [value];
    }

    const parts = value.split(delimiter);
    return removeEmptyEntries ? parts.filter((part) => part !== '') : parts;
  }

  /**
   * Resolve a connection string, trying `fallbackName` once when `name` is not found
   */
  getConnectionString(name: string, fallbackName?: string): string {
    return this.getConnectionStringEntry(name, fallbackName).connectionString;
  }

  getConnectionStringEntry(name: string, fallbackName?: string): ConnectionStringEntry {
    const entry = this.connectionStrings.get(name);

    if (!entry) {
      if (fallbackName) {
        this.logger?.debug('Connection string fallback used', { name, fallbackName });
        return this.getConnectionStringEntry(fallbackName);
      }
      throw new MissingValueError(name, CONNECTION_STRING_NOT_FOUND);
    }

    if (entry.connectionString === '') {
      throw new MissingValueError(name, CONNECTION_STRING_EMPTY);
    }

    return entry;
  }

  /**
   * Raw value, or MissingValueError when it is empty and the caller has no default
   */
  protected requireOrDefault(key: string, hasDefault: false): string;
  protected requireOrDefault(key: string, hasDefault: boolean): string | undefined;
  protected requireOrDefault(key: string, hasDefault: boolean): string | undefined {
    const value = this.settings.get(key);
    if (isEmpty(value) && !hasDefault) {
      throw new MissingValueError(
        key,
        `No AppSetting with a key of ${key} or it has no value. The key must have a value or a default provided`
      );
    }
    return value;
  }

  private readTyped<T>(
    key: string,
    defaultValue: T | undefined,
    parse: (text: string) => T | undefined,
    typeName: string
  ): T {
    if (defaultValue === undefined) {
      return this.convert(key, this.requireOrDefault(key, false), parse, typeName);
    }

    const value = this.requireOrDefault(key, true);
    if (isEmpty(value)) {
      this.logDefaultApplied(key);
      return defaultValue;
    }
    return this.convert(key, value, parse, typeName);
  }

  private convert<T>(
    key: string,
    value: string,
    parse: (text: string) => T | undefined,
    typeName: string
  ): T {
    const parsed = parse(value);
    if (parsed === undefined) {
      throw new ValueParseError(key, value, typeName);
    }
    return parsed;
  }

  private logDefaultApplied(key: string): void {
    this.logger?.debug('App setting default applied', { key });
  }
}

function isEmpty(value: string | undefined): value is undefined | '' {
  return value === undefined || value === '';
}
