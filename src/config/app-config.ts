import dotenv from 'dotenv';
import winston from 'winston';
import { BaseConfig } from './base-config';
import { LoggingConfig } from './specialized/logging.config';
import { validateEnvPrefix } from './validators';
import { ConfigAccessor } from '../core/config-accessor';
import { EnvSettingsStore } from '../stores/settings-store';
import {
  DEFAULT_CONNECTION_STRING_PREFIX,
  EnvConnectionStringStore,
} from '../stores/connection-string-store';
import { ConfigValidationError } from '../errors/config-errors';
import { createLogger } from '../utils/logger';

/**
 * AppConfig - Process-wide configuration singleton
 *
 * Owns the accessor behind the static helper functions. Settings and
 * connection strings are read from the process environment; when
 * CONFIG_ENV_FILE is set, that file is loaded into the environment first
 * (variables already set win).
 *
 * Settings:
 * - CONFIG_ENV_FILE: Path of a .env file to load (optional)
 * - CONNECTION_STRING_PREFIX: Env prefix for connection strings (default: 'CONNSTR_')
 * - LOG_LEVEL / LOG_FORMAT: see LoggingConfig; the logger is built after the
 *   settings file is loaded, so both may come from it
 *
 * Usage:
 *   const accessor = AppConfig.getInstance().settings;
 *   const dbUrl = accessor.getConnectionString('primary', 'fallback');
 *
 * Testing:
 *   AppConfig.reset(); // Reset singleton between tests
 */
export class AppConfig extends BaseConfig {
  private static instance: AppConfig | null = null;

  readonly envFile: string | undefined;
  readonly connectionStringPrefix: string;
  readonly loggingConfig: LoggingConfig;
  readonly logger: winston.Logger;

  private constructor(
    accessor: ConfigAccessor,
    connectionStringPrefix: string,
    loggingConfig: LoggingConfig,
    logger: winston.Logger
  ) {
    super(accessor);
    this.envFile = accessor.getSettingOrDefault('CONFIG_ENV_FILE');
    this.connectionStringPrefix = connectionStringPrefix;
    this.loggingConfig = loggingConfig;
    this.logger = logger;
    this.validate();
  }

  /**
   * Get singleton instance
   */
  static getInstance(): AppConfig {
    if (!AppConfig.instance) {
      AppConfig.instance = AppConfig.create();
    }
    return AppConfig.instance;
  }

  /**
   * Reset singleton (for testing)
   */
  static reset(): void {
    AppConfig.instance = null;
  }

  private static create(): AppConfig {
    const settings = new EnvSettingsStore();

    const envFile = settings.get('CONFIG_ENV_FILE');
    if (envFile) {
      const result = dotenv.config({ path: envFile });
      if (result.error) {
        throw new ConfigValidationError(
          `CONFIG_ENV_FILE could not be loaded: ${result.error.message}`,
          'CONFIG_ENV_FILE'
        );
      }
    }

    // Everything below sees the settings file
    const bootstrap = new ConfigAccessor({ settings });
    const prefix = bootstrap.getSettingOrDefault(
      'CONNECTION_STRING_PREFIX',
      DEFAULT_CONNECTION_STRING_PREFIX
    );
    const loggingConfig = new LoggingConfig(bootstrap);
    const logger = createLogger(loggingConfig);
    if (envFile) {
      logger.debug('Loaded settings file', { path: envFile });
    }

    const accessor = new ConfigAccessor({
      settings,
      connectionStrings: new EnvConnectionStringStore(prefix),
      logger,
    });
    return new AppConfig(accessor, prefix, loggingConfig, logger);
  }

  /**
   * Process-wide accessor
   */
  get settings(): ConfigAccessor {
    return this.accessor;
  }

  /**
   * Validate base configuration
   */
  protected validate(): void {
    validateEnvPrefix(this.connectionStringPrefix, 'CONNECTION_STRING_PREFIX');
  }
}
