import type { ConfigAccessor } from '../core/config-accessor';

/**
 * BaseConfig - Abstract base class for typed configuration classes
 *
 * Provides:
 * - NODE_ENV, read through the accessor
 * - Protected wrappers over the accessor's typed getters
 * - Validation enforcement (subclasses call validate() once their fields are set)
 */
export abstract class BaseConfig {
  readonly nodeEnv: string;
  protected readonly accessor: ConfigAccessor;

  constructor(accessor: ConfigAccessor) {
    this.accessor = accessor;
    this.nodeEnv = accessor.getSettingOrDefault('NODE_ENV', 'development');
  }

  get isProduction(): boolean {
    return this.nodeEnv === 'production';
  }

  get isTest(): boolean {
    return this.nodeEnv === 'test';
  }

  protected getSetting(key: string, defaultValue: string): string {
    return this.accessor.getSettingOrDefault(key, defaultValue);
  }

  protected requireSetting(key: string): string {
    return this.accessor.getSetting(key);
  }

  protected getSettingAsInt(key: string, defaultValue: number): number {
    return this.accessor.getSettingAsInt(key, defaultValue);
  }

  protected getSettingAsBool(key: string, defaultValue: boolean): boolean {
    return this.accessor.getSettingAsBool(key, defaultValue);
  }

  /**
   * Validate configuration values
   * Must be implemented by all subclasses
   */
  protected abstract validate(): void;
}
