/**
 * Validation utilities for configuration values
 */
import { ConfigValidationError } from '../errors/config-errors';

/**
 * Validate that a value is within a numeric range (inclusive)
 */
export function validateRange(value: number, min: number, max: number, fieldName: string): void {
  if (value < min || value > max) {
    throw new ConfigValidationError(
      `${fieldName} must be between ${min} and ${max}, got: ${value}`,
      fieldName
    );
  }
}

/**
 * Validate that a value is one of allowed options
 */
export function validateEnum<T extends string>(
  value: string,
  allowedValues: readonly T[],
  fieldName: string
): void {
  if (!allowedValues.some((allowed) => allowed === value)) {
    throw new ConfigValidationError(
      `${fieldName} must be one of: ${allowedValues.join(', ')}, got: ${value}`,
      fieldName
    );
  }
}

/**
 * Validate that a value can start an environment variable name
 */
export function validateEnvPrefix(value: string, fieldName: string): void {
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(value)) {
    throw new ConfigValidationError(
      `${fieldName} must contain only letters, digits and underscores, got: ${value}`,
      fieldName
    );
  }
}
