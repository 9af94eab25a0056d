// ---------------------------------------------------------------------------
// Strata — Configuration Validator
// ---------------------------------------------------------------------------
// Validates the root config shape and per-module config sections using
// JSON Schema (via Ajv).
// ---------------------------------------------------------------------------

import Ajv, { ValidateFunction, ErrorObject } from 'ajv';
import { StrataConfig } from '../types/config';
import { ModuleManifest } from '../types/module';
import { ConfigError } from '../../shared/errors';

/** JSON Schema for the root StrataConfig object. */
const ROOT_SCHEMA = {
  type: 'object',
  required: ['system', 'modules', 'storage'],
  properties: {
    system: {
      type: 'object',
      required: ['name', 'environment'],
      properties: {
        name: { type: 'string', minLength: 1 },
        environment: { type: 'string', enum: ['development', 'staging', 'production'] },
      },
      additionalProperties: false,
    },
    modules: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['enabled'],
        properties: {
          enabled: { type: 'boolean' },
        },
      },
    },
    storage: {
      type: 'object',
      required: ['root', 'extension', 'journalMode', 'busyTimeout'],
      properties: {
        root: { type: 'string', minLength: 1 },
        extension: { type: 'string', pattern: '^[A-Za-z0-9]+$' },
        journalMode: { type: 'string', enum: ['WAL', 'DELETE', 'TRUNCATE', 'PERSIST', 'MEMORY'] },
        busyTimeout: { type: 'integer', minimum: 0 },
        resources: { type: 'string', minLength: 1 },
      },
      additionalProperties: false,
    },
    logging: {
      type: 'object',
      required: ['level', 'format', 'output'],
      properties: {
        level: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
        format: { type: 'string', enum: ['json', 'text'] },
        output: { type: 'string', enum: ['console', 'file'] },
        file: { type: 'string' },
        maxFileSize: { type: 'integer', minimum: 1024 },
        maxFiles: { type: 'integer', minimum: 1 },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export class ConfigValidator {
  private readonly ajv: Ajv;
  private readonly rootValidator: ValidateFunction<StrataConfig>;

  constructor() {
    this.ajv = new Ajv({ allErrors: true, strict: false });
    this.rootValidator = this.ajv.compile<StrataConfig>(ROOT_SCHEMA);
  }

  /** Type guard over the root configuration shape. */
  isValidRoot(config: unknown): config is StrataConfig {
    return this.rootValidator(config);
  }

  /**
   * Validate the root configuration shape.
   *
   * @returns A result with `valid: false` and human-readable errors if invalid.
   */
  validateRoot(config: unknown): ValidationResult {
    if (this.rootValidator(config)) {
      return { valid: true, errors: [] };
    }
    return {
      valid: false,
      errors: this.formatErrors(this.rootValidator.errors ?? []),
    };
  }

  /**
   * Validate a single module's config section against its declared JSON Schema.
   * Without a `configSchema`, validation always passes.
   *
   * @throws ConfigError only for schema compilation failures (programmer error).
   */
  validateModuleConfig(
    manifest: ModuleManifest,
    moduleConfig: Record<string, unknown>,
  ): ValidationResult {
    if (!manifest.configSchema) {
      return { valid: true, errors: [] };
    }

    let validate: ValidateFunction;
    try {
      validate = this.ajv.compile(manifest.configSchema);
    } catch (err) {
      throw new ConfigError(
        `Module "${manifest.id}" has an invalid config schema: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err : undefined,
      );
    }

    if (validate(moduleConfig)) {
      return { valid: true, errors: [] };
    }
    return {
      valid: false,
      errors: this.formatErrors(validate.errors ?? []).map((e) => `[${manifest.id}] ${e}`),
    };
  }

  // ── Internal ───────────────────────────────────────────────────────────

  private formatErrors(errors: ErrorObject[]): string[] {
    return errors.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'unknown error'}`);
  }
}
