/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `asn1x config` commands.
 */

export {
  ConfigSchema,
  PartialConfigSchema,
  InputConfigSchema,
  OutputConfigSchema,
  SplitConfigSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

export { loadConfig, readConfigFile, listConfig, getConfigValue } from './loader.js';
export type { ReadConfigOptions } from './loader.js';

export { ASN1X_DIR, CONFIG_PATH, getConfigPath, resolveConfigPath } from './paths.js';
export type { ConfigLocation } from './paths.js';

export { loadEnv, getEnv, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
