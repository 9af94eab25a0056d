// ---------------------------------------------------------------------------
// Strata — Configuration Types
// ---------------------------------------------------------------------------

/**
 * Root configuration shape loaded from YAML.
 */
export interface StrataConfig {
  /** Top-level system settings. */
  system: SystemConfig;

  /** Per-module configuration keyed by module ID. */
  modules: Record<string, ModuleConfig>;

  /** Where and how domain databases are stored. */
  storage: StorageConfig;

  /** Logging preferences. */
  logging?: LoggingConfig;
}

export interface SystemConfig {
  /** Display name for this instance. */
  name: string;

  environment: 'development' | 'staging' | 'production';
}

/**
 * Every module config section must at minimum contain `enabled`.
 * Additional keys are module-specific and validated via JSON Schema.
 */
export interface ModuleConfig {
  enabled: boolean;
  [key: string]: unknown;
}

/** SQLite journal modes accepted by `PRAGMA journal_mode`. */
export type JournalMode = 'WAL' | 'DELETE' | 'TRUNCATE' | 'PERSIST' | 'MEMORY';

export interface StorageConfig {
  /** Directory holding one sub-directory per domain. */
  root: string;

  /** Database file extension, without the dot. */
  extension: string;

  journalMode: JournalMode;

  /** Milliseconds SQLite waits on a locked database before failing. */
  busyTimeout: number;

  /** Directory of shared, read-only resources (fonts, images, ...). */
  resources?: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggingConfig {
  /** Minimum severity to emit. */
  level: LogLevel;

  format: 'json' | 'text';

  output: 'console' | 'file';

  /** File path when `output` is `'file'`. */
  file?: string;

  /** Rotate the log file once it grows past this many bytes. */
  maxFileSize?: number;

  /** Rotated files kept on disk. */
  maxFiles?: number;
}
