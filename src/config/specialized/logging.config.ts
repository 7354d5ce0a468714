import { BaseConfig } from '../base-config';
import type { ConfigAccessor } from '../../core/config-accessor';
import { LOG_FORMATS, LOG_LEVELS } from '../../types';
import { validateEnum } from '../validators';

/**
 * LoggingConfig - Library logging configuration
 *
 * Settings:
 * - LOG_LEVEL: Logging level - debug, info, warn, error (default: 'info')
 * - LOG_FORMAT: Log format - json or pretty (default: 'json')
 *
 * Both are matched case-insensitively.
 */
export class LoggingConfig extends BaseConfig {
  readonly level: string;
  readonly format: string;

  constructor(accessor: ConfigAccessor) {
    super(accessor);
    this.level = this.getSetting('LOG_LEVEL', 'info').trim().toLowerCase();
    this.format = this.getSetting('LOG_FORMAT', 'json').trim().toLowerCase();
    this.validate();
  }

  get isJson(): boolean {
    return this.format === 'json';
  }

  protected validate(): void {
    validateEnum(this.level, LOG_LEVELS, 'LOG_LEVEL');
    validateEnum(this.format, LOG_FORMATS, 'LOG_FORMAT');
  }
}
