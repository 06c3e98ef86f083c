/**
 * Config Module Tests
 *
 * Tests the configuration loading, validation, and merging logic.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ConfigSchema, PartialConfigSchema } from '../schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from '../defaults.js';
import { getConfigValue, listConfig, loadConfig, readConfigFile } from '../loader.js';
import { _clearEnvCache } from '../env.js';
import { ConfigError } from '../../errors/index.js';

describe('Config Schema', () => {
  it('validates the defaults', () => {
    expect(ConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('rejects an unknown naming strategy', () => {
    const invalid = { ...DEFAULT_CONFIG, output: { ...DEFAULT_CONFIG.output, naming: 'middle-dot' } };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('rejects an extension without a leading dot', () => {
    const invalid = { ...DEFAULT_CONFIG, output: { ...DEFAULT_CONFIG.output, extension: 'asn' } };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('rejects an extension containing a path separator', () => {
    const invalid = { ...DEFAULT_CONFIG, split: { ...DEFAULT_CONFIG.split, extension: './txt' } };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('allows deeply partial config', () => {
    expect(PartialConfigSchema.safeParse({ output: { naming: 'last-dot' } }).success).toBe(true);
  });
});

describe('Config Loading', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'asn1x-config-'));
    configPath = path.join(tempDir, 'config.toml');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _clearEnvCache();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('returns defaults when an optional file does not exist', () => {
    expect(readConfigFile(configPath)).toEqual(DEFAULT_CONFIG);
  });

  it('does not create a missing file', () => {
    readConfigFile(configPath);
    expect(fs.existsSync(configPath)).toBe(false);
  });

  it('throws ConfigError when a required file does not exist', () => {
    expect(() => readConfigFile(configPath, { required: true })).toThrow(ConfigError);
  });

  it('throws ConfigError when an explicit path does not exist', () => {
    expect(() => loadConfig(configPath)).toThrow(`Config file not found: ${configPath}`);
  });

  it('throws ConfigError when $ASN1X_CONFIG names a missing file', () => {
    vi.stubEnv('ASN1X_CONFIG', configPath);
    _clearEnvCache();

    expect(() => loadConfig()).toThrow(ConfigError);
  });

  it('reads the file named by $ASN1X_CONFIG', () => {
    fs.writeFileSync(configPath, '[output]\nextension = ".asn1"\n');
    vi.stubEnv('ASN1X_CONFIG', configPath);
    _clearEnvCache();

    expect(loadConfig().output.extension).toBe('.asn1');
  });

  it('merges user values over defaults', () => {
    fs.writeFileSync(configPath, '[output]\nnaming = "last-dot"\n\n[split]\nout_dir = "blocks"\n');

    const config = loadConfig(configPath);

    expect(config.output).toEqual({ extension: '.asn', naming: 'last-dot' });
    expect(config.split).toEqual({ out_dir: 'blocks', extension: '.txt' });
    expect(config.input).toEqual({ encoding: 'utf-8' });
  });

  it('throws ConfigError on invalid TOML', () => {
    fs.writeFileSync(configPath, '[output\nnaming = ');

    expect(() => loadConfig(configPath)).toThrow(ConfigError);
  });

  it('throws ConfigError listing schema issues', () => {
    fs.writeFileSync(configPath, '[input]\nencoding = "utf-16"\n');

    expect(() => loadConfig(configPath)).toThrow(/input\.encoding/);
  });

  it('parses the template back to the defaults', () => {
    fs.writeFileSync(configPath, CONFIG_TEMPLATE);

    expect(loadConfig(configPath)).toEqual(DEFAULT_CONFIG);
  });
});

describe('listConfig / getConfigValue', () => {
  it('flattens to dot-notation keys', () => {
    expect(listConfig(DEFAULT_CONFIG)).toEqual([
      ['input.encoding', 'utf-8'],
      ['output.extension', '.asn'],
      ['output.naming', 'first-dot'],
      ['split.out_dir', 'asn1_sections'],
      ['split.extension', '.txt'],
    ]);
  });

  it('gets a leaf value', () => {
    expect(getConfigValue(DEFAULT_CONFIG, 'split.out_dir')).toBe('asn1_sections');
  });

  it('returns undefined for unknown or non-leaf keys', () => {
    expect(getConfigValue(DEFAULT_CONFIG, 'output.nope')).toBeUndefined();
    expect(getConfigValue(DEFAULT_CONFIG, 'output')).toBeUndefined();
  });
});
