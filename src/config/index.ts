/**
 * Config Layer - Process-wide configuration
 *
 * Usage:
 *   import { AppConfig } from './config';
 *
 *   const accessor = AppConfig.getInstance().settings;
 *   const level = AppConfig.getInstance().loggingConfig.level;
 *
 * Testing:
 *   beforeEach(() => {
 *     AppConfig.reset(); // Reset singleton for test isolation
 *   });
 */

export { AppConfig } from './app-config';
export { BaseConfig } from './base-config';
export { LoggingConfig } from './specialized/logging.config';

// Export validators
export * from './validators';
