/**
 * Environment Variable Handler
 *
 * Reads asn1x settings from the environment. Supports .env files via
 * dotenv for local use.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

/**
 * Empty strings count as unset, so `ASN1X_CONFIG= asn1x ...` falls back to
 * the default config path.
 */
const optionalPath = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val.trim() === '' ? undefined : val));

export const EnvSchema = z.object({
  /** Path of the TOML config file, overriding ~/.asn1x/config.toml */
  ASN1X_CONFIG: optionalPath,
});

export type EnvVars = z.infer<typeof EnvSchema>;

// Loaded once at first access; _clearEnvCache() resets it for tests
let _envCache: EnvVars | null = null;

/**
 * Load environment variables (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    ASN1X_CONFIG: process.env.ASN1X_CONFIG,
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Clear the cached environment (tests only).
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
