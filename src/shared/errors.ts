// ---------------------------------------------------------------------------
// Strata — Shared Error Types
// ---------------------------------------------------------------------------
// Every failure raised by the broker itself is one of these. Errors coming
// from the SQLite driver are never wrapped: they reach the caller as-is.
// ---------------------------------------------------------------------------

/**
 * Base class for all Strata errors.
 * Preserves the original error chain via `cause`.
 */
export class StrataError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'StrataError';
  }
}

/** Thrown when configuration is invalid or missing. */
export class ConfigError extends StrataError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

/** Thrown when a module fails to load, initialize, or unload. */
export class ModuleError extends StrataError {
  constructor(
    message: string,
    public readonly moduleId: string,
    cause?: Error,
  ) {
    super(message, 'MODULE_ERROR', cause);
    this.name = 'ModuleError';
  }
}

/**
 * Thrown while building a table schema: the statement is not a
 * `CREATE TABLE`, the table name cannot be read, or default rows disagree
 * on their columns.
 */
export class SchemaDefinitionError extends StrataError {
  constructor(message: string) {
    super(message, 'SCHEMA_DEFINITION_ERROR');
    this.name = 'SchemaDefinitionError';
  }
}

/**
 * Thrown when a key/value helper targets a table that is missing or not
 * shaped `(key, value)`, or when two scopes would share one storage file.
 */
export class ContractViolationError extends StrataError {
  constructor(
    message: string,
    public readonly table?: string,
  ) {
    super(message, 'CONTRACT_VIOLATION');
    this.name = 'ContractViolationError';
  }
}

/** Thrown for a malformed scope, or a value that cannot be stored or cast. */
export class StorageTypeError extends StrataError {
  constructor(message: string, cause?: Error) {
    super(message, 'TYPE_ERROR', cause);
    this.name = 'StorageTypeError';
  }
}

/** Thrown by any operation on a scope connection after `close()`. */
export class ConnectionClosedError extends StrataError {
  constructor(public readonly scopeKey: string) {
    super(`Connection for scope "${scopeKey}" is closed`, 'CONNECTION_CLOSED');
    this.name = 'ConnectionClosedError';
  }
}

/** Thrown when a storage location (domain name, directory) is unusable. */
export class StorageError extends StrataError {
  constructor(message: string, cause?: Error) {
    super(message, 'STORAGE_ERROR', cause);
    this.name = 'StorageError';
  }
}
