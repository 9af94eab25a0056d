// ---------------------------------------------------------------------------
// Strata — Configuration Loader
// ---------------------------------------------------------------------------
// Loads YAML config from disk, merges it over the defaults, applies
// environment variable overrides and validates the result.
// ---------------------------------------------------------------------------

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { StrataConfig } from '../types/config';
import { ConfigError } from '../../shared/errors';
import { ConfigValidator } from './ConfigValidator';

type RawConfig = Record<string, unknown>;

/** Default config values applied when keys are absent. */
const DEFAULTS = {
  system: {
    name: 'Strata',
    environment: 'development',
  },
  modules: {},
  storage: {
    root: './var',
    extension: 'db',
    journalMode: 'WAL',
    busyTimeout: 5000,
  },
  logging: {
    level: 'info',
    format: 'text',
    output: 'console',
  },
} satisfies StrataConfig;

/**
 * Environment overrides, e.g. `STRATA_STORAGE_ROOT=/srv/strata`.
 * Numeric settings are not overridable from the environment.
 */
const ENV_OVERRIDES: ReadonlyArray<[string, readonly [string, string]]> = [
  ['STRATA_SYSTEM_NAME', ['system', 'name']],
  ['STRATA_SYSTEM_ENVIRONMENT', ['system', 'environment']],
  ['STRATA_LOGGING_LEVEL', ['logging', 'level']],
  ['STRATA_STORAGE_ROOT', ['storage', 'root']],
];

function isRecord(value: unknown): value is RawConfig {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export class ConfigLoader {
  private readonly validator: ConfigValidator;

  constructor(validator: ConfigValidator = new ConfigValidator()) {
    this.validator = validator;
  }

  /**
   * Load configuration from a YAML file. A missing file is not an error:
   * the defaults (plus environment overrides) are used.
   *
   * @returns Merged configuration (defaults ← file ← env overrides).
   * @throws ConfigError if the file cannot be read, parsed or validated.
   */
  load(configPath: string): StrataConfig {
    const resolvedPath = path.resolve(configPath);
    const merged: RawConfig = structuredClone(DEFAULTS);

    if (fs.existsSync(resolvedPath)) {
      this.deepMerge(merged, this.readFile(resolvedPath));
    }
    this.applyEnvOverrides(merged);

    if (!this.validator.isValidRoot(merged)) {
      const { errors } = this.validator.validateRoot(merged);
      throw new ConfigError(`Invalid configuration in ${resolvedPath}:\n  ${errors.join('\n  ')}`);
    }
    return merged;
  }

  // ── Internal ───────────────────────────────────────────────────────────

  private readFile(resolvedPath: string): RawConfig {
    let raw: string;
    try {
      raw = fs.readFileSync(resolvedPath, 'utf-8');
    } catch (err) {
      throw new ConfigError(
        `Failed to read config file: ${resolvedPath}`,
        err instanceof Error ? err : undefined,
      );
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(raw);
    } catch (err) {
      throw new ConfigError(
        `Failed to parse YAML in config file: ${resolvedPath}`,
        err instanceof Error ? err : undefined,
      );
    }

    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file is empty or not an object: ${resolvedPath}`);
    }
    return parsed;
  }

  private applyEnvOverrides(config: RawConfig): void {
    for (const [variable, [section, key]] of ENV_OVERRIDES) {
      const value = process.env[variable];
      if (!value) continue;
      const target = config[section];
      if (isRecord(target)) {
        target[key] = value;
      } else {
        config[section] = { [key]: value };
      }
    }
  }

  /**
   * Recursively merge `source` into `target`, with `source` winning.
   * Arrays are replaced, not concatenated.
   */
  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    for (const key of Object.keys(source)) {
      const srcVal = source[key];
      const tgtVal = target[key];
      target[key] = isRecord(srcVal) && isRecord(tgtVal) ? this.deepMerge(tgtVal, srcVal) : srcVal;
    }
    return target;
  }
}
