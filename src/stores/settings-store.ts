import fs from 'fs';
import dotenv from 'dotenv';
import { SettingsSource } from '../types';

/**
 * App settings backed by environment variables.
 * Without an explicit env, process.env is read on every lookup so that
 * later changes to the process environment are visible.
 */
export class EnvSettingsStore implements SettingsSource {
  private readonly env: NodeJS.ProcessEnv | undefined;

  constructor(env?: NodeJS.ProcessEnv) {
    this.env = env;
  }

  get(key: string): string | undefined {
    return (this.env ?? process.env)[key];
  }
}

/**
 * In-memory app settings, mainly for tests and embedded defaults
 */
export class MapSettingsStore implements SettingsSource {
  private readonly entries: ReadonlyMap<string, string>;

  constructor(entries: Iterable<readonly [string, string]> | Readonly<Record<string, string>> = {}) {
    this.entries = new Map(isIterable(entries) ? entries : Object.entries(entries));
  }

  /**
   * Parse `.env` formatted content into a store
   */
  static fromDotenv(content: string | Buffer): MapSettingsStore {
    return new MapSettingsStore(dotenv.parse(content));
  }

  /**
   * Read and parse a `.env` file into a store
   */
  static fromDotenvFile(path: string): MapSettingsStore {
    return MapSettingsStore.fromDotenv(fs.readFileSync(path));
  }

  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

function isIterable<T>(value: Iterable<T> | object): value is Iterable<T> {
  return Symbol.iterator in value;
}
