/**
 * Static helper surface over the process-wide accessor
 *
 * Usage:
 *   import { getSetting, getSettingAsInt } from 'settings-accessor';
 *
 *   const apiUrl = getSetting('API_URL');
 *   const poolSize = getSettingAsInt('DB_POOL_SIZE', 10);
 */
import { AppConfig } from './config/app-config';
import { ConnectionStringEntry } from './types';

export function getSetting(key: string): string {
  return AppConfig.getInstance().settings.getSetting(key);
}

export function getSettingOrDefault(key: string, defaultValue: string): string;
export function getSettingOrDefault(key: string, defaultValue?: string): string | undefined;
export function getSettingOrDefault(key: string, defaultValue?: string): string | undefined {
  return AppConfig.getInstance().settings.getSettingOrDefault(key, defaultValue);
}

export function getSettingAsBool(key: string, defaultValue?: boolean): boolean {
  return AppConfig.getInstance().settings.getSettingAsBool(key, defaultValue);
}

export function getSettingAsInt(key: string, defaultValue?: number): number {
  return AppConfig.getInstance().settings.getSettingAsInt(key, defaultValue);
}

export function getSettingAsLong(key: string, defaultValue?: bigint): bigint {
  return AppConfig.getInstance().settings.getSettingAsLong(key, defaultValue);
}

export function getSettingAsDouble(key: string, defaultValue?: number): number {
  return AppConfig.getInstance().settings.getSettingAsDouble(key, defaultValue);
}

export function getSettingAsDate(key: string, defaultValue?: Date): Date {
  return AppConfig.getInstance().settings.getSettingAsDate(key, defaultValue);
}

export function getSettingArray(key: string, delimiter = ',', removeEmptyEntries = true): string[] {
  return AppConfig.getInstance().settings.getSettingArray(key, delimiter, removeEmptyEntries);
}

export function getConnectionString(name: string, fallbackName?: string): string {
  return AppConfig.getInstance().settings.getConnectionString(name, fallbackName);
}

export function getConnectionStringEntry(
  name: string,
  fallbackName?: string
): ConnectionStringEntry {
  return AppConfig.getInstance().settings.getConnectionStringEntry(name, fallbackName);
}
