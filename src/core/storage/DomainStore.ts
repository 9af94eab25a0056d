// ---------------------------------------------------------------------------
// Strata — Domain Store
// ---------------------------------------------------------------------------
// Maps domain names to their DomainRegistry. Built once by the composition
// root and handed to whoever needs storage; a given name always resolves
// to the same registry until `reset()`.
// ---------------------------------------------------------------------------

import * as path from 'node:path';
import { JournalMode } from '../types/config';
import { ILogger } from '../types/module';
import { StorageError } from '../../shared/errors';
import { DomainRegistry } from './DomainRegistry';

const DOMAIN_NAME = /^[a-z0-9][a-z0-9_.-]*$/;

export interface DomainStoreOptions {
  /** Directory holding one sub-directory per domain. */
  root: string;
  /** Default: `db`. */
  extension?: string;
  /** Default: `WAL`. */
  journalMode?: JournalMode;
  /** Default: 5000 ms. */
  busyTimeout?: number;
  /** Shared resources directory. Default: `<root>/resources`. */
  resources?: string;
}

export class DomainStore {
  readonly root: string;

  private readonly options: Required<Omit<DomainStoreOptions, 'root'>>;
  private readonly logger: ILogger;
  private readonly domains = new Map<string, DomainRegistry>();

  constructor(options: DomainStoreOptions, logger: ILogger) {
    this.root = path.resolve(options.root);
    this.options = {
      extension: options.extension ?? 'db',
      journalMode: options.journalMode ?? 'WAL',
      busyTimeout: options.busyTimeout ?? 5000,
      resources: path.resolve(options.resources ?? path.join(this.root, 'resources')),
    };
    this.logger = logger.child('storage');
  }

  /**
   * Registry of the domain `name` (case-insensitive), created on first use.
   *
   * @throws StorageError if the name is not usable as a directory name.
   */
  domain(name: string): DomainRegistry {
    const normalized = name.toLowerCase();
    if (!DOMAIN_NAME.test(normalized)) {
      throw new StorageError(`Invalid domain name: ${JSON.stringify(name)}`);
    }

    let registry = this.domains.get(normalized);
    if (!registry) {
      registry = new DomainRegistry(normalized, {
        directory: path.join(this.root, normalized),
        extension: this.options.extension,
        journalMode: this.options.journalMode,
        busyTimeout: this.options.busyTimeout,
        logger: this.logger.child(normalized),
      });
      this.domains.set(normalized, registry);
    }
    return registry;
  }

  has(name: string): boolean {
    return this.domains.has(name.toLowerCase());
  }

  names(): string[] {
    return [...this.domains.keys()];
  }

  /** Path inside the shared resources directory. */
  resourcePath(...segments: string[]): string {
    return path.join(this.options.resources, ...segments);
  }

  /** Close every open connection of every domain. */
  closeAll(): void {
    for (const registry of this.domains.values()) {
      registry.closeAll();
    }
  }

  /** Close everything and forget all domains. */
  reset(): void {
    this.closeAll();
    this.domains.clear();
  }
}
