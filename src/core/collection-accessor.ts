/**
 * Validated reads from a caller-supplied key/value collection, such as the
 * options section handed to a plugin or provider.
 */
import { SettingsCollection } from '../types';
import { ConfigValidationError } from '../errors/config-errors';
import { validateRange } from '../config/validators';
import { parseBoolean, parseInt32 } from './converters';

export const INT32_MAX_VALUE = 2147483647;

/**
 * Own-property lookup; Map entries or plain record fields
 */
export function lookup(collection: SettingsCollection, name: string): string | undefined {
  if (isReadonlyMap(collection)) {
    return collection.get(name);
  }
  return Object.prototype.hasOwnProperty.call(collection, name) ? collection[name] : undefined;
}

/**
 * Get a string entry.
 * Without a name, the default is returned, and a blank default is an error.
 * With a name, the entry is returned as stored (undefined when absent).
 */
export function getString(
  collection: SettingsCollection,
  name: string | undefined,
  defaultValue = ''
): string | undefined {
  if (!name) {
    if (defaultValue.trim() === '') {
      throw new ConfigValidationError(`${name ?? ''} must have a value`, name);
    }
    return defaultValue;
  }

  return lookup(collection, name);
}

/**
 * Get a strict boolean entry ("true"/"false", any case).
 * An absent entry without a default fails as non-boolean.
 */
export function getBoolean(
  collection: SettingsCollection,
  name: string,
  defaultValue?: boolean
): boolean {
  const value = lookup(collection, name);

  if (value === undefined && defaultValue !== undefined) {
    return defaultValue;
  }

  const parsed = parseBoolean(value);
  if (parsed === undefined) {
    throw new ConfigValidationError(`${name} must be boolean`, name);
  }
  return parsed;
}

/**
 * Get a range-checked 32-bit integer entry.
 * An absent entry returns the default without a range check.
 */
export function getInt(
  collection: SettingsCollection,
  name: string,
  defaultValue: number,
  minAllowed = 0,
  maxAllowed = INT32_MAX_VALUE
): number {
  const value = lookup(collection, name);

  if (value === undefined) {
    return defaultValue;
  }

  const parsed = parseInt32(value);
  if (parsed === undefined) {
    throw new ConfigValidationError(`${name} must be a number`, name);
  }

  validateRange(parsed, minAllowed, maxAllowed, name);
  return parsed;
}

function isReadonlyMap(
  collection: SettingsCollection
): collection is ReadonlyMap<string, string> {
  return collection instanceof Map;
}
