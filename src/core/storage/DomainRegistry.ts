// ---------------------------------------------------------------------------
// Strata — Domain Registry
// ---------------------------------------------------------------------------
// One per logical module. Holds the schemas registered per scope-type and
// caches one ScopeConnection per scope. Databases live under
// `<directory>/data/<scope key>.<extension>`.
// ---------------------------------------------------------------------------

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ConnectionSettings, Scope, ScopeType } from '../types/storage';
import { ILogger } from '../types/module';
import { ContractViolationError } from '../../shared/errors';
import { ScopeConnection } from './ScopeConnection';
import { TableSchema } from './TableSchema';
import { describeScope, scopeKey, scopeTypeKey, scopeTypeOf, typedKeyKind } from './Scope';

export interface DomainRegistryOptions extends ConnectionSettings {
  /** The domain's own directory. */
  directory: string;
  /** Database file extension, without the dot. */
  extension: string;
  logger: ILogger;
}

/** Suffixes SQLite may leave next to a database file. */
const SIDE_FILES = ['', '-wal', '-shm', '-journal'];

export class DomainRegistry {
  readonly name: string;
  readonly directory: string;

  private readonly extension: string;
  private readonly settings: ConnectionSettings;
  private readonly logger: ILogger;
  private readonly connections = new Map<string, ScopeConnection>();
  private readonly schemas = new Map<string, readonly TableSchema[]>();

  constructor(name: string, options: DomainRegistryOptions) {
    this.name = name;
    this.directory = options.directory;
    this.extension = options.extension;
    this.settings = { journalMode: options.journalMode, busyTimeout: options.busyTimeout };
    this.logger = options.logger;
  }

  // ── Locations ──────────────────────────────────────────────────────────

  get dataDirectory(): string {
    return path.join(this.directory, 'data');
  }

  get assetsPath(): string {
    return this.subfolder('assets');
  }

  /** Path of a sub-directory of the domain, created on request. */
  subfolder(name: string, options: { create?: boolean } = {}): string {
    const folder = path.join(this.directory, name);
    if (options.create) fs.mkdirSync(folder, { recursive: true });
    return folder;
  }

  /** Database file that `scope` resolves to. */
  storagePath(scope: Scope): string {
    return path.join(this.dataDirectory, `${this.resolveKey(scope)}.${this.extension}`);
  }

  // ── Schemas ────────────────────────────────────────────────────────────

  /**
   * Set the schemas bootstrapped into every scope of `scopeType`,
   * replacing any earlier registration. Connections already open are
   * not affected until they are reopened.
   */
  registerSchemas(scopeType: ScopeType, ...schemas: TableSchema[]): void {
    if (scopeType.type === 'named') this.resolveKey(scopeType);
    this.schemas.set(scopeTypeKey(scopeType), Object.freeze([...schemas]));
  }

  schemasFor(scopeType: ScopeType): readonly TableSchema[] {
    return this.schemas.get(scopeTypeKey(scopeType)) ?? [];
  }

  // ── Connections ────────────────────────────────────────────────────────

  /**
   * The connection of `scope`, opened and bootstrapped on first use.
   * A connection closed behind the registry's back is replaced.
   */
  get(scope: Scope): ScopeConnection {
    const key = this.resolveKey(scope);
    const cached = this.connections.get(key);
    if (cached?.isOpen) return cached;

    fs.mkdirSync(this.dataDirectory, { recursive: true });
    const connection = new ScopeConnection(
      scope,
      path.join(this.dataDirectory, `${key}.${this.extension}`),
      {
        ...this.settings,
        schemas: this.schemasFor(scopeTypeOf(scope)),
        logger: this.logger,
      },
    );
    this.connections.set(key, connection);
    this.logger.debug('Connection opened', { scope: key, tables: connection.schemas.length });
    return connection;
  }

  isOpen(scope: Scope): boolean {
    return this.connections.get(this.resolveKey(scope))?.isOpen ?? false;
  }

  openConnections(): ScopeConnection[] {
    return [...this.connections.values()].filter((c) => c.isOpen);
  }

  close(scope: Scope): void {
    const key = this.resolveKey(scope);
    const connection = this.connections.get(key);
    if (!connection) return;
    connection.close();
    this.connections.delete(key);
  }

  closeAll(): void {
    for (const connection of this.connections.values()) {
      connection.close();
    }
    this.connections.clear();
  }

  /** Close `scope` and remove its database file. */
  delete(scope: Scope): void {
    this.close(scope);
    const file = this.storagePath(scope);
    for (const suffix of SIDE_FILES) {
      fs.rmSync(`${file}${suffix}`, { force: true });
    }
    this.logger.info('Scope deleted', { scope: describeScope(scope) });
  }

  /** Close every scope and remove every database file of the domain. */
  deleteAll(): void {
    this.closeAll();
    if (!fs.existsSync(this.dataDirectory)) return;

    const ext = `.${this.extension}`;
    let removed = 0;
    for (const entry of fs.readdirSync(this.dataDirectory)) {
      if (!entry.endsWith(ext)) continue;
      const file = path.join(this.dataDirectory, entry);
      for (const suffix of SIDE_FILES) {
        fs.rmSync(`${file}${suffix}`, { force: true });
      }
      removed++;
    }
    this.logger.info('All scopes deleted', { removed });
  }

  toString(): string {
    return `DomainRegistry(${this.name})`;
  }

  // ── Internal ───────────────────────────────────────────────────────────

  /**
   * Storage key of `scope`. Every `<kind>_<digits>` key belongs to typed
   * scopes, whether or not the kind has been seen, so a named scope may
   * never take one.
   */
  private resolveKey(scope: Scope): string {
    const key = scopeKey(scope);
    if (scope.type === 'named') {
      const kind = typedKeyKind(key);
      if (kind !== undefined) {
        throw new ContractViolationError(
          `Named scope "${scope.name}" collides with the storage key of a "${kind}" scope in domain "${this.name}"`,
        );
      }
    }
    return key;
  }
}
