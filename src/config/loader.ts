/**
 * Configuration Loader
 *
 * 1. Resolve the config path (--config, $ASN1X_CONFIG or ~/.asn1x/config.toml)
 * 2. Load config.toml (only the default location may be missing)
 * 3. Validate with the Zod schema
 * 4. Merge with defaults (user values override defaults)
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import { PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { resolveConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

export interface ReadConfigOptions {
  /** Fail instead of returning the defaults when the file is missing */
  required?: boolean;
}

/**
 * Load the config file named by --config, $ASN1X_CONFIG, or the default
 * location, and merge it over the defaults.
 *
 * Only the default location may be absent; a path the user named must exist.
 *
 * @throws ConfigError if a named file is missing, or the file is unreadable,
 * not TOML, or invalid
 */
export function loadConfig(explicitPath?: string): Config {
  const location = resolveConfigPath(explicitPath);
  return readConfigFile(location.path, { required: location.explicit });
}

/**
 * Read one config file and merge it over the defaults.
 * A missing file yields the defaults unless `required`; nothing is created.
 */
export function readConfigFile(configPath: string, options: ReadConfigOptions = {}): Config {
  if (!fs.existsSync(configPath)) {
    if (options.required) {
      throw new ConfigError(
        `Config file not found: ${configPath}`,
        'Check the --config option or $ASN1X_CONFIG, or run: asn1x config template > <path>'
      );
    }
    return {
      input: { ...DEFAULT_CONFIG.input },
      output: { ...DEFAULT_CONFIG.output },
      split: { ...DEFAULT_CONFIG.split },
    };
  }

  let parsed: unknown;
  try {
    parsed = TOML.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid config file ${configPath}: ${message}`,
      `Fix the syntax in ${configPath}, or compare with: asn1x config template`
    );
  }

  const validationResult = PartialConfigSchema.safeParse(parsed);
  if (!validationResult.success) {
    const issues = validationResult.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }

  const user = validationResult.data;
  return {
    input: { ...DEFAULT_CONFIG.input, ...user.input },
    output: { ...DEFAULT_CONFIG.output, ...user.output },
    split: { ...DEFAULT_CONFIG.split, ...user.split },
  };
}

/**
 * Flatten a config into dot-notation entries,
 * e.g. ['output.naming', 'first-dot']
 */
export function listConfig(config: Config): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: object, prefix: string): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config, '');
  return entries;
}

/**
 * Get a leaf config value by dot-notation key, undefined if unknown
 */
export function getConfigValue(config: Config, key: string): unknown {
  return new Map(listConfig(config)).get(key);
}
