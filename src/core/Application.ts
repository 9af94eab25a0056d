// ---------------------------------------------------------------------------
// Strata — Application Bootstrap
// ---------------------------------------------------------------------------
// The Application class is the single composition root. It loads config,
// builds the logger and the DomainStore, and drives feature modules
// through their lifecycle. The store is owned here and passed down; there
// is no process-wide registry.
//
// Usage:
//   const app = new Application();
//   app.registerModule('settings', () => new SettingsModule());
//   await app.start('config/default.yaml');
//   // ... running ...
//   await app.stop();
// ---------------------------------------------------------------------------

import { StrataConfig } from './types/config';
import { ILogger, ModuleFactory } from './types/module';
import { ConfigLoader } from './config/ConfigLoader';
import { ModuleRegistry } from './modules/ModuleRegistry';
import { DomainStore } from './storage/DomainStore';
import { Logger } from '../shared/logger';
import { StrataError } from '../shared/errors';

export enum ApplicationState {
  Created = 'created',
  Starting = 'starting',
  Running = 'running',
  Stopping = 'stopping',
  Stopped = 'stopped',
  Error = 'error',
}

export interface ApplicationOptions {
  /** Install SIGINT / SIGTERM handlers that stop the app. Default: true. */
  handleSignals?: boolean;
}

interface Runtime {
  config: StrataConfig;
  logger: Logger;
  store: DomainStore;
  modules: ModuleRegistry;
}

export class Application {
  private state: ApplicationState = ApplicationState.Created;
  private runtime: Runtime | undefined;
  private readonly handleSignals: boolean;

  // Factories registered before start()
  private readonly pendingFactories: Array<{ id: string; factory: ModuleFactory }> = [];

  constructor(options: ApplicationOptions = {}) {
    this.handleSignals = options.handleSignals ?? true;
  }

  // ── Public API ───────────────────────────────────────────────────────────

  /** Register a module factory. Must be called before `start()`. */
  registerModule(id: string, factory: ModuleFactory): void {
    if (this.state !== ApplicationState.Created) {
      throw new StrataError(
        `Cannot register "${id}": application is in "${this.state}" state`,
        'LIFECYCLE_ERROR',
      );
    }
    this.pendingFactories.push({ id, factory });
  }

  /**
   * Boot the system:
   *   1. Load & validate config
   *   2. Build the logger and the domain store
   *   3. Initialize enabled modules in registration order
   *   4. Register shutdown hooks
   */
  async start(configPath: string = 'config/default.yaml'): Promise<void> {
    if (this.state !== ApplicationState.Created) {
      throw new StrataError(
        `Cannot start: application is in "${this.state}" state`,
        'LIFECYCLE_ERROR',
      );
    }

    this.state = ApplicationState.Starting;
    let logger: Logger | undefined;

    try {
      const config = new ConfigLoader().load(configPath);

      logger = new Logger({
        level: config.logging?.level ?? 'info',
        format: config.logging?.format ?? 'text',
        prefix: 'Strata',
        output: config.logging?.output ?? 'console',
        filePath: config.logging?.file,
        maxFileSize: config.logging?.maxFileSize,
        maxFiles: config.logging?.maxFiles,
      });

      logger.info('Starting Strata', {
        name: config.system.name,
        environment: config.system.environment,
      });

      const store = new DomainStore(config.storage, logger);
      logger.info('Domain store ready', { root: store.root });

      const modules = new ModuleRegistry(store, logger);
      for (const { id, factory } of this.pendingFactories) {
        modules.register(id, factory);
      }

      this.runtime = { config, logger, store, modules };

      await modules.initializeAll(config);

      if (this.handleSignals) this.registerShutdownHooks(logger);

      this.state = ApplicationState.Running;
      logger.info('Strata is running', { moduleCount: this.pendingFactories.length });
    } catch (err) {
      this.state = ApplicationState.Error;
      const error = err instanceof Error ? err : new Error(String(err));
      if (logger) {
        logger.error('Failed to start Strata', error);
      } else {
        console.error('Failed to start Strata:', error);
      }
      this.runtime?.store.closeAll();
      logger?.close();
      throw err;
    }
  }

  /**
   * Shut down: unload every module (closing its connections), close any
   * remaining connection of any domain, then close the log file.
   */
  async stop(): Promise<void> {
    const runtime = this.runtime;
    if (this.state !== ApplicationState.Running || !runtime) {
      this.runtime?.logger.warn('Stop called but application is not running', {
        state: this.state,
      });
      return;
    }

    this.state = ApplicationState.Stopping;
    runtime.logger.info('Shutting down Strata...');

    try {
      await runtime.modules.destroyAll();
      runtime.store.closeAll();
      this.state = ApplicationState.Stopped;
      runtime.logger.info('Strata shutdown complete');
      runtime.logger.close();
    } catch (err) {
      this.state = ApplicationState.Error;
      runtime.logger.error('Error during shutdown', err instanceof Error ? err : new Error(String(err)));
      throw err;
    }
  }

  // ── Accessors ────────────────────────────────────────────────────────────

  getState(): ApplicationState {
    return this.state;
  }

  getConfig(): StrataConfig {
    return this.requireRuntime().config;
  }

  getStore(): DomainStore {
    return this.requireRuntime().store;
  }

  getModuleRegistry(): ModuleRegistry {
    return this.requireRuntime().modules;
  }

  getLogger(): ILogger {
    return this.requireRuntime().logger;
  }

  // ── Internal ───────────────────────────────────────────────────────────

  private requireRuntime(): Runtime {
    if (!this.runtime) {
      throw new StrataError('Application has not been started', 'LIFECYCLE_ERROR');
    }
    return this.runtime;
  }

  private registerShutdownHooks(logger: ILogger): void {
    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, initiating graceful shutdown...`);
      try {
        await this.stop();
        process.exit(0);
      } catch {
        process.exit(1);
      }
    };

    process.once('SIGINT', () => void shutdown('SIGINT'));
    process.once('SIGTERM', () => void shutdown('SIGTERM'));
  }
}
