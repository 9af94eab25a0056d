// ---------------------------------------------------------------------------
// Strata — Core Module Types
// ---------------------------------------------------------------------------
// The contract between the module host and every feature module. A module
// owns one storage domain, named after its ID, and receives it through
// `ModuleContext` at initialization time.
// ---------------------------------------------------------------------------

import type { DomainRegistry } from '../storage/DomainRegistry';

// ── Lifecycle State Machine ────────────────────────────────────────────────

/**
 * ```
 * Registered → Initializing → Initialized → Destroyed
 *                                  ↑             │
 *                                  └── reload ───┘
 *
 * Initializing may transition to → Error
 * ```
 */
export enum ModuleState {
  Registered = 'registered',
  Initializing = 'initializing',
  Initialized = 'initialized',
  Destroyed = 'destroyed',
  Error = 'error',
}

// ── Module Manifest ────────────────────────────────────────────────────────

export interface ModuleManifest {
  /** Unique identifier; also the name of the module's storage domain. */
  readonly id: string;

  /** Human-readable display name. */
  readonly name: string;

  /** Semver version string. */
  readonly version: string;

  readonly description?: string;

  /**
   * JSON Schema object that validates the module's config section.
   * If provided, `ConfigValidator` applies it before initialization.
   */
  readonly configSchema?: Record<string, unknown>;
}

// ── Logger Interface ───────────────────────────────────────────────────────

/**
 * Structured logger. Modules receive a child logger prefixed with their ID.
 */
export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  child(prefix: string): ILogger;
}

// ── Module Context ─────────────────────────────────────────────────────────

export interface ModuleContext {
  readonly moduleId: string;

  /** Module-specific configuration (already validated). */
  readonly config: Readonly<Record<string, unknown>>;

  /** The module's storage domain. Register schemas here during `initialize()`. */
  readonly data: DomainRegistry;

  /** Prefixed structured logger. */
  readonly logger: ILogger;
}

// ── Module Interface ───────────────────────────────────────────────────────

export interface IModule {
  readonly manifest: ModuleManifest;

  /** Register schemas and set up internal state. */
  initialize(context: ModuleContext): Promise<void>;

  /**
   * Release module resources. The host closes the module's scope
   * connections right after this resolves.
   */
  destroy(): Promise<void>;
}

export type ModuleFactory = () => IModule;
