/**
 * Type definitions for the settings accessor
 */

// ==================== Stores ====================

/**
 * Read-only key → string lookup backing app settings
 */
export interface SettingsSource {
  get(key: string): string | undefined;
}

export interface ConnectionStringEntry {
  name: string;
  connectionString: string;
  /**
   * Driver or provider hint stored beside the string (e.g. "pg", "mssql").
   * Carried through, never interpreted here.
   */
  providerName?: string;
}

/**
 * Read-only name → connection string lookup
 */
export interface ConnectionStringSource {
  get(name: string): ConnectionStringEntry | undefined;
}

/**
 * Caller-owned collection read by the collection accessor
 */
export type SettingsCollection =
  | ReadonlyMap<string, string>
  | Readonly<Record<string, string | undefined>>;

// ==================== Accessor ====================

/**
 * Minimal logging surface the accessor needs; a winston Logger satisfies it
 */
export interface AccessorLogger {
  debug(message: string, meta?: Record<string, unknown>): unknown;
}

export interface ConfigAccessorOptions {
  settings: SettingsSource;
  connectionStrings?: ConnectionStringSource;
  logger?: AccessorLogger;
}

// ==================== Errors ====================

export type ConfigurationErrorKind = 'MissingValue' | 'ParseError' | 'ConfigError';

// ==================== Logging ====================

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export const LOG_FORMATS = ['json', 'pretty'] as const;
