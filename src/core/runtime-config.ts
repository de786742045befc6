/**
 * Runtime configuration model.
 *
 * Unified configuration for the binding runtime, merged from multiple
 * sources: defaults → config file → env vars.
 *
 * The runtime reads this when a PresenterManager is created to know:
 *   - How aggressively to thin backed-up state queues
 *   - How much to log
 *   - Whether views are held weakly (with reclamation detection)
 */

import { isLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';

// ── Configuration Schema ─────────────────────────────────────────

export interface RuntimeConfig {
  /**
   * Thinning divisor K. When a drain pass starts with `size` queued
   * snapshots, roughly every (size / K)th one is delivered.
   * Must be an integer ≥ 1.
   */
  thinningFactor: number;

  /** Logging level. */
  logLevel: LogLevel;

  /**
   * Hold views through WeakRef and disconnect handles whose view was
   * garbage-collected without disconnecting. When false, views are held
   * strongly and only explicit disconnect releases them.
   */
  weakReferences: boolean;
}

export class RuntimeConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RuntimeConfigError';
  }
}

// ── Defaults ─────────────────────────────────────────────────────

export const DEFAULT_CONFIG: RuntimeConfig = {
  thinningFactor: 8,
  logLevel: 'info',
  weakReferences: true,
};

// ── Validation ───────────────────────────────────────────────────

export function assertThinningFactor(value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RuntimeConfigError(`thinningFactor must be an integer >= 1, got ${value}`);
  }
}

/**
 * Validate an untrusted partial config (e.g., parsed JSON).
 * Unknown keys are ignored; known keys with a wrong type throw.
 */
export function validateConfig(input: unknown): Partial<RuntimeConfig> {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new RuntimeConfigError('Config must be a JSON object');
  }

  const config: Partial<RuntimeConfig> = {};

  if ('thinningFactor' in input && input.thinningFactor !== undefined) {
    const value = input.thinningFactor;
    if (typeof value !== 'number') {
      throw new RuntimeConfigError(`thinningFactor must be a number, got ${typeof value}`);
    }
    assertThinningFactor(value);
    config.thinningFactor = value;
  }

  if ('logLevel' in input && input.logLevel !== undefined) {
    if (!isLogLevel(input.logLevel)) {
      throw new RuntimeConfigError(`Unknown logLevel "${String(input.logLevel)}"`);
    }
    config.logLevel = input.logLevel;
  }

  if ('weakReferences' in input && input.weakReferences !== undefined) {
    if (typeof input.weakReferences !== 'boolean') {
      throw new RuntimeConfigError('weakReferences must be a boolean');
    }
    config.weakReferences = input.weakReferences;
  }

  return config;
}

// ── Config Merging ───────────────────────────────────────────────

/**
 * Merge configuration from multiple sources.
 *
 * Sources are applied in order (later sources override earlier):
 *   1. defaults (DEFAULT_CONFIG)
 *   2. config file
 *   3. env vars
 */
export function mergeConfigs(...sources: Partial<RuntimeConfig>[]): RuntimeConfig {
  let result: RuntimeConfig = { ...DEFAULT_CONFIG };

  for (const source of sources) {
    if (source.thinningFactor !== undefined) result = { ...result, thinningFactor: source.thinningFactor };
    if (source.logLevel !== undefined) result = { ...result, logLevel: source.logLevel };
    if (source.weakReferences !== undefined) result = { ...result, weakReferences: source.weakReferences };
  }

  return result;
}

// ── Environment ──────────────────────────────────────────────────

/**
 * Read config overrides from environment variables:
 *   VIEWBIND_THINNING_FACTOR  integer ≥ 1
 *   VIEWBIND_LOG_LEVEL        silent | error | warn | info | debug
 *   VIEWBIND_WEAK_REFS        true | false | 1 | 0
 */
export function parseRuntimeEnv(
  env: Record<string, string | undefined> = process.env,
): Partial<RuntimeConfig> {
  const config: Partial<RuntimeConfig> = {};

  const factor = env['VIEWBIND_THINNING_FACTOR'];
  if (factor !== undefined && factor !== '') {
    const parsed = Number(factor);
    assertThinningFactor(parsed);
    config.thinningFactor = parsed;
  }

  const level = env['VIEWBIND_LOG_LEVEL'];
  if (level !== undefined && level !== '') {
    if (!isLogLevel(level)) {
      throw new RuntimeConfigError(`Unknown VIEWBIND_LOG_LEVEL "${level}"`);
    }
    config.logLevel = level;
  }

  const weak = env['VIEWBIND_WEAK_REFS'];
  if (weak !== undefined && weak !== '') {
    switch (weak.toLowerCase()) {
      case 'true':
      case '1':
        config.weakReferences = true;
        break;
      case 'false':
      case '0':
        config.weakReferences = false;
        break;
      default:
        throw new RuntimeConfigError(`VIEWBIND_WEAK_REFS must be true or false, got "${weak}"`);
    }
  }

  return config;
}

// ── Config File Loading ──────────────────────────────────────────

/** Load and validate a partial RuntimeConfig from a JSON file. */
export async function loadConfigFile(path: string): Promise<Partial<RuntimeConfig>> {
  const fs = await import('node:fs/promises');
  const content = await fs.readFile(path, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new RuntimeConfigError(`Invalid JSON in ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return validateConfig(parsed);
}

/**
 * Search for a config file in standard locations.
 *
 * Checks (in order):
 *   1. VIEWBIND_CONFIG env var
 *   2. ./viewbind.config.json (current directory)
 *   3. ~/.config/viewbind/config.json (XDG)
 *
 * Returns the path of the first file found, or undefined.
 */
export async function findConfigFile(
  env: Record<string, string | undefined> = process.env,
): Promise<string | undefined> {
  const fs = await import('node:fs/promises');
  const path = await import('node:path');
  const os = await import('node:os');

  const candidates: string[] = [];

  const envPath = env['VIEWBIND_CONFIG'];
  if (envPath) candidates.push(envPath);

  candidates.push(path.join(process.cwd(), 'viewbind.config.json'));

  const xdgConfig = env['XDG_CONFIG_HOME'] || path.join(os.homedir(), '.config');
  candidates.push(path.join(xdgConfig, 'viewbind', 'config.json'));

  for (const candidate of candidates) {
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      continue;
    }
  }

  return undefined;
}

// ── Full Resolution ──────────────────────────────────────────────

/**
 * Resolve the complete runtime configuration from all sources.
 *
 * Merges: defaults → config file → env vars. A config file that exists
 * but is invalid is an error; a missing one is not.
 */
export async function resolveRuntimeConfig(
  env: Record<string, string | undefined> = process.env,
): Promise<RuntimeConfig> {
  const configPath = await findConfigFile(env);
  const fileConfig = configPath ? await loadConfigFile(configPath) : {};
  return mergeConfigs(fileConfig, parseRuntimeEnv(env));
}
