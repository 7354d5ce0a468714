import { ConfigurationErrorKind } from '../types';

/**
 * Base class for every error raised while reading configuration.
 * `key` names the setting, connection string or collection entry involved.
 */
export class ConfigurationError extends Error {
  readonly kind: ConfigurationErrorKind;
  readonly key: string | undefined;

  constructor(kind: ConfigurationErrorKind, message: string, key?: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.key = key;

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, new.target);
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Required value absent or empty and no default supplied
 */
export class MissingValueError extends ConfigurationError {
  constructor(key: string, message: string) {
    super('MissingValue', message, key);
  }
}

/**
 * Stored text present but not convertible to the requested type
 */
export class ValueParseError extends ConfigurationError {
  readonly value: string;
  readonly targetType: string;

  constructor(key: string, value: string, targetType: string) {
    super('ParseError', `AppSetting ${key} must be a valid ${targetType}, got: ${value}`, key);
    this.value = value;
    this.targetType = targetType;
  }
}

/**
 * Validation failure: bad collection entry, bad argument or bad configuration value
 */
export class ConfigValidationError extends ConfigurationError {
  constructor(message: string, key?: string) {
    super('ConfigError', message, key);
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
