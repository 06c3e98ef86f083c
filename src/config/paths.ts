/**
 * Centralized Path Definitions
 *
 * ~/.asn1x/
 * └── config.toml     (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { getEnv } from './env.js';

export const ASN1X_DIR = join(homedir(), '.asn1x');
export const CONFIG_PATH = join(ASN1X_DIR, 'config.toml');

/**
 * Config file path: $ASN1X_CONFIG when set, otherwise ~/.asn1x/config.toml
 */
export function getConfigPath(): string {
  return resolveConfigPath().path;
}

export interface ConfigLocation {
  path: string;
  /** True when the path came from --config or $ASN1X_CONFIG */
  explicit: boolean;
}

/**
 * Resolve the config file: an explicit path, then $ASN1X_CONFIG, then
 * ~/.asn1x/config.toml.
 */
export function resolveConfigPath(explicitPath?: string): ConfigLocation {
  const path = explicitPath ?? getEnv('ASN1X_CONFIG');
  return path === undefined ? { path: CONFIG_PATH, explicit: false } : { path, explicit: true };
}
