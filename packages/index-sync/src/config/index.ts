export {
  loadConfig,
  buildIndexConfig,
  validateIndexConfig,
  readConfigSection,
  normalizePrefix,
  parseBoolean,
  defaultUserConfigPath,
} from './config.js';

export type { LoadConfigOptions } from './config.js';

export {
  DEFAULT_INDEX_CONFIG,
  DEFAULT_SECTION,
  SYSTEM_CONFIG_PATH,
  CONFIG_KEYS,
} from './types.js';

export type { IndexConfig, IndexConfigOverrides } from './types.js';
