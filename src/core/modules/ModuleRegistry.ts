// ---------------------------------------------------------------------------
// Strata — Module Registry & Lifecycle Manager
// ---------------------------------------------------------------------------
// Instantiates feature modules from their factories, hands each one the
// storage domain named after its ID, and unloads them again. Unloading
// closes the domain's connections; the DomainRegistry itself stays in the
// store, so a reloaded module picks up the very same instance.
// ---------------------------------------------------------------------------

import { IModule, ModuleContext, ModuleFactory, ModuleState, ILogger } from '../types/module';
import { StrataConfig } from '../types/config';
import { ConfigValidator } from '../config/ConfigValidator';
import { DomainStore } from '../storage/DomainStore';
import { ModuleError } from '../../shared/errors';

interface ModuleEntry {
  factory: ModuleFactory;
  module?: IModule;
  state: ModuleState;
  error?: Error;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class ModuleRegistry {
  private readonly entries = new Map<string, ModuleEntry>();
  private readonly store: DomainStore;
  private readonly logger: ILogger;
  private readonly configValidator = new ConfigValidator();
  private config: StrataConfig | undefined;

  constructor(store: DomainStore, logger: ILogger) {
    this.store = store;
    this.logger = logger.child('ModuleRegistry');
  }

  // ── Registration ─────────────────────────────────────────────────────────

  /** Register a factory. Nothing is instantiated until `initializeAll()`. */
  register(id: string, factory: ModuleFactory): void {
    if (this.entries.has(id)) {
      throw new ModuleError(`Module already registered: "${id}"`, id);
    }
    this.entries.set(id, { factory, state: ModuleState.Registered });
    this.logger.debug('Module registered', { moduleId: id });
  }

  // ── Lifecycle ────────────────────────────────────────────────────────────

  /**
   * Instantiate and initialize every registered module, in registration
   * order, skipping those whose config section says `enabled: false`.
   */
  async initializeAll(config: StrataConfig): Promise<void> {
    this.config = config;
    for (const id of this.entries.keys()) {
      if (config.modules[id]?.enabled === false) {
        this.logger.info('Module disabled by configuration', { moduleId: id });
        continue;
      }
      await this.load(id);
    }
  }

  /** Destroy the module and close every connection of its domain. */
  async unload(id: string): Promise<void> {
    const entry = this.getEntry(id);
    if (entry.state !== ModuleState.Initialized || !entry.module) return;

    try {
      await entry.module.destroy();
    } catch (err) {
      this.logger.error(`Module "${id}" failed to destroy cleanly`, toError(err));
    }
    this.store.domain(id).closeAll();
    entry.module = undefined;
    this.transitionState(id, ModuleState.Destroyed);
  }

  /** Unload, then build a fresh instance from the factory and initialize it. */
  async reload(id: string): Promise<void> {
    this.getEntry(id);
    if (!this.config) {
      throw new ModuleError(`Cannot reload "${id}" before initializeAll()`, id);
    }
    await this.unload(id);
    await this.load(id);
  }

  /** Unload every initialized module, most recently registered first. */
  async destroyAll(): Promise<void> {
    for (const id of [...this.entries.keys()].reverse()) {
      await this.unload(id);
    }
  }

  // ── Queries ──────────────────────────────────────────────────────────────

  getState(id: string): ModuleState | undefined {
    return this.entries.get(id)?.state;
  }

  getModule(id: string): IModule | undefined {
    return this.entries.get(id)?.module;
  }

  getError(id: string): Error | undefined {
    return this.entries.get(id)?.error;
  }

  getRegisteredIds(): string[] {
    return [...this.entries.keys()];
  }

  // ── Internal ─────────────────────────────────────────────────────────────

  private getEntry(id: string): ModuleEntry {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new ModuleError(`Module not registered: "${id}"`, id);
    }
    return entry;
  }

  private async load(id: string): Promise<void> {
    const entry = this.getEntry(id);
    const config = this.config;
    if (!config) {
      throw new ModuleError(`Cannot load "${id}" before initializeAll()`, id);
    }

    this.transitionState(id, ModuleState.Initializing);
    try {
      const module = entry.factory();
      if (module.manifest.id !== id) {
        throw new ModuleError(
          `Module factory for "${id}" produced a module with mismatched manifest ID "${module.manifest.id}"`,
          id,
        );
      }

      const { enabled: _enabled, ...moduleConfig } = config.modules[id] ?? { enabled: true };
      const validation = this.configValidator.validateModuleConfig(module.manifest, moduleConfig);
      if (!validation.valid) {
        throw new ModuleError(
          `Config validation failed for "${id}": ${validation.errors.join('; ')}`,
          id,
        );
      }

      const context: ModuleContext = {
        moduleId: id,
        config: moduleConfig,
        data: this.store.domain(id),
        logger: this.logger.child(id),
      };
      await module.initialize(context);

      entry.module = module;
      this.transitionState(id, ModuleState.Initialized);
      this.logger.info('Module loaded', { moduleId: id, version: module.manifest.version });
    } catch (err) {
      const error = toError(err);
      this.transitionState(id, ModuleState.Error, error);
      if (error instanceof ModuleError) throw error;
      throw new ModuleError(`Module "${id}" failed to initialize: ${error.message}`, id, error);
    }
  }

  private transitionState(id: string, newState: ModuleState, error?: Error): void {
    const entry = this.getEntry(id);
    const oldState = entry.state;
    entry.state = newState;
    entry.error = error;

    this.logger.debug('Module state transition', {
      moduleId: id,
      from: oldState,
      to: newState,
      ...(error ? { error: error.message } : {}),
    });
  }
}
