import { ConnectionStringEntry, ConnectionStringSource } from '../types';

export const DEFAULT_CONNECTION_STRING_PREFIX = 'CONNSTR_';
const PROVIDER_SUFFIX = '_PROVIDER';

/**
 * Connection strings backed by environment variables
 *
 * Layout:
 * - <prefix><name>: the connection string
 * - <prefix><name>_PROVIDER: provider name (optional)
 */
export class EnvConnectionStringStore implements ConnectionStringSource {
  readonly prefix: string;
  private readonly env: NodeJS.ProcessEnv | undefined;

  constructor(prefix: string = DEFAULT_CONNECTION_STRING_PREFIX, env?: NodeJS.ProcessEnv) {
    this.prefix = prefix;
    this.env = env;
  }

  get(name: string): ConnectionStringEntry | undefined {
    const env = this.env ?? process.env;
    const connectionString = env[`${this.prefix}${name}`];
    if (connectionString === undefined) {
      return undefined;
    }

    const providerName = env[`${this.prefix}${name}${PROVIDER_SUFFIX}`];
    return providerName ? { name, connectionString, providerName } : { name, connectionString };
  }
}

export type ConnectionStringInput = string | { connectionString: string; providerName?: string };

/**
 * In-memory connection strings
 */
export class MapConnectionStringStore implements ConnectionStringSource {
  private readonly entries = new Map<string, ConnectionStringEntry>();

  constructor(entries: Readonly<Record<string, ConnectionStringInput>> = {}) {
    for (const [name, input] of Object.entries(entries)) {
      this.entries.set(
        name,
        typeof input === 'string' ? { name, connectionString: input } : { name, ...input }
      );
    }
  }

  get(name: string): ConnectionStringEntry | undefined {
    return this.entries.get(name);
  }
}
