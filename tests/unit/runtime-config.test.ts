/**
 * Tests for runtime configuration: validation, merging, environment
 * overrides, and config file discovery.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_CONFIG,
  RuntimeConfigError,
  assertThinningFactor,
  findConfigFile,
  loadConfigFile,
  mergeConfigs,
  parseRuntimeEnv,
  resolveRuntimeConfig,
  validateConfig,
} from '../../src/core/runtime-config.js';

describe('validateConfig', () => {
  it('accepts a complete config', () => {
    expect(validateConfig({ thinningFactor: 4, logLevel: 'debug', weakReferences: false })).toEqual({
      thinningFactor: 4,
      logLevel: 'debug',
      weakReferences: false,
    });
  });

  it('ignores unknown keys', () => {
    expect(validateConfig({ theme: 'dark', logLevel: 'warn' })).toEqual({ logLevel: 'warn' });
  });

  it('rejects values that are not objects', () => {
    expect(() => validateConfig(null)).toThrow(RuntimeConfigError);
    expect(() => validateConfig([1, 2])).toThrow('Config must be a JSON object');
    expect(() => validateConfig('thinningFactor=4')).toThrow(RuntimeConfigError);
  });

  it('rejects a bad thinning factor', () => {
    expect(() => validateConfig({ thinningFactor: '8' })).toThrow('thinningFactor must be a number, got string');
    expect(() => validateConfig({ thinningFactor: 0 })).toThrow('thinningFactor must be an integer >= 1, got 0');
    expect(() => validateConfig({ thinningFactor: 2.5 })).toThrow(RuntimeConfigError);
  });

  it('rejects an unknown log level', () => {
    expect(() => validateConfig({ logLevel: 'verbose' })).toThrow('Unknown logLevel "verbose"');
  });

  it('rejects a non-boolean weakReferences', () => {
    expect(() => validateConfig({ weakReferences: 'yes' })).toThrow('weakReferences must be a boolean');
  });
});

describe('assertThinningFactor', () => {
  it('accepts positive integers', () => {
    expect(() => assertThinningFactor(1)).not.toThrow();
    expect(() => assertThinningFactor(64)).not.toThrow();
  });

  it('rejects everything else', () => {
    expect(() => assertThinningFactor(-3)).toThrow(RuntimeConfigError);
    expect(() => assertThinningFactor(Number.NaN)).toThrow(RuntimeConfigError);
  });
});

describe('mergeConfigs', () => {
  it('returns the defaults when given nothing', () => {
    expect(mergeConfigs()).toEqual(DEFAULT_CONFIG);
  });

  it('lets later sources win', () => {
    expect(
      mergeConfigs({ thinningFactor: 2, logLevel: 'debug' }, { thinningFactor: 16 }, { weakReferences: false }),
    ).toEqual({ thinningFactor: 16, logLevel: 'debug', weakReferences: false });
  });

  it('does not modify the defaults', () => {
    mergeConfigs({ thinningFactor: 2 });
    expect(DEFAULT_CONFIG.thinningFactor).toBe(8);
  });
});

describe('parseRuntimeEnv', () => {
  it('reads every variable', () => {
    expect(
      parseRuntimeEnv({
        VIEWBIND_THINNING_FACTOR: '12',
        VIEWBIND_LOG_LEVEL: 'error',
        VIEWBIND_WEAK_REFS: 'FALSE',
      }),
    ).toEqual({ thinningFactor: 12, logLevel: 'error', weakReferences: false });
  });

  it('accepts 1 and 0 for weak references', () => {
    expect(parseRuntimeEnv({ VIEWBIND_WEAK_REFS: '1' })).toEqual({ weakReferences: true });
    expect(parseRuntimeEnv({ VIEWBIND_WEAK_REFS: '0' })).toEqual({ weakReferences: false });
  });

  it('ignores unset and empty variables', () => {
    expect(parseRuntimeEnv({ VIEWBIND_THINNING_FACTOR: '', VIEWBIND_LOG_LEVEL: undefined })).toEqual({});
  });

  it('rejects invalid values', () => {
    expect(() => parseRuntimeEnv({ VIEWBIND_THINNING_FACTOR: 'many' })).toThrow(RuntimeConfigError);
    expect(() => parseRuntimeEnv({ VIEWBIND_LOG_LEVEL: 'loud' })).toThrow('Unknown VIEWBIND_LOG_LEVEL "loud"');
    expect(() => parseRuntimeEnv({ VIEWBIND_WEAK_REFS: 'maybe' })).toThrow(
      'VIEWBIND_WEAK_REFS must be true or false, got "maybe"',
    );
  });
});

describe('config files', () => {
  let dir: string;
  let configPath: string;
  let brokenPath: string;
  let xdgHome: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'viewbind-config-'));
    configPath = join(dir, 'viewbind.config.json');
    brokenPath = join(dir, 'broken.json');
    xdgHome = join(dir, 'xdg');
    await writeFile(configPath, JSON.stringify({ thinningFactor: 4, logLevel: 'debug' }));
    await writeFile(brokenPath, '{ "thinningFactor": ');
    await mkdir(join(xdgHome, 'viewbind'), { recursive: true });
    await writeFile(join(xdgHome, 'viewbind', 'config.json'), JSON.stringify({ weakReferences: false }));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads and validates a file', async () => {
    await expect(loadConfigFile(configPath)).resolves.toEqual({ thinningFactor: 4, logLevel: 'debug' });
  });

  it('reports invalid JSON', async () => {
    await expect(loadConfigFile(brokenPath)).rejects.toThrow(RuntimeConfigError);
    await expect(loadConfigFile(brokenPath)).rejects.toThrow(`Invalid JSON in ${brokenPath}`);
  });

  it('prefers the file named by VIEWBIND_CONFIG', async () => {
    await expect(findConfigFile({ VIEWBIND_CONFIG: configPath, XDG_CONFIG_HOME: xdgHome })).resolves.toBe(
      configPath,
    );
  });

  it('falls back to the XDG config directory', async () => {
    await expect(
      findConfigFile({ VIEWBIND_CONFIG: join(dir, 'missing.json'), XDG_CONFIG_HOME: xdgHome }),
    ).resolves.toBe(join(xdgHome, 'viewbind', 'config.json'));
  });

  it('lets the environment override the file', async () => {
    await expect(
      resolveRuntimeConfig({ VIEWBIND_CONFIG: configPath, VIEWBIND_LOG_LEVEL: 'warn' }),
    ).resolves.toEqual({ thinningFactor: 4, logLevel: 'warn', weakReferences: true });
  });
});
