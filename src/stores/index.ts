export { EnvSettingsStore, MapSettingsStore } from './settings-store';
export {
  EnvConnectionStringStore,
  MapConnectionStringStore,
  DEFAULT_CONNECTION_STRING_PREFIX,
} from './connection-string-store';
export type { ConnectionStringInput } from './connection-string-store';
