// ---------------------------------------------------------------------------
// Strata — Scope Connection
// ---------------------------------------------------------------------------
// Owns the SQLite handle of one (domain, scope) pair. Opening it creates
// the missing registered tables and seeds their defaults; afterwards it
// exposes raw statement helpers plus typed key/value accessors.
//
// better-sqlite3 is synchronous and so is every method here. Pending
// writes follow a single explicit transaction: `commit: false` opens it,
// `commit()` flushes it, `close()` discards it.
// ---------------------------------------------------------------------------

import Database from 'better-sqlite3';
import {
  BindValue,
  CastTypes,
  ConnectionSettings,
  EvaluateOptions,
  ExecuteOptions,
  ReseedPolicy,
  Row,
  Scope,
  StorableValue,
  ValueCast,
} from '../types/storage';
import { ILogger } from '../types/module';
import { ConnectionClosedError, ContractViolationError, StorageTypeError } from '../../shared/errors';
import { KeyValueTableSchema, TableSchema, quoteIdentifier } from './TableSchema';
import { castStoredText, toStoredText } from './values';
import { describeScope, scopeKey } from './Scope';

export interface ScopeConnectionOptions extends ConnectionSettings {
  /** Schemas bootstrapped into the database on open. */
  schemas: readonly TableSchema[];
  logger: ILogger;
}

/** True when a table has exactly the columns `key` and `value`. */
export function hasKeyValueShape(columns: readonly string[]): boolean {
  const names = columns.map((c) => c.toLowerCase()).sort();
  return names.length === 2 && names[0] === 'key' && names[1] === 'value';
}

export class ScopeConnection {
  readonly scope: Scope;
  /** Storage key of the scope, also the database file's base name. */
  readonly key: string;
  readonly path: string;
  readonly schemas: readonly TableSchema[];

  private readonly db: Database.Database;
  private readonly logger: ILogger;
  /** Lower-cased names of tables already checked to be `(key, value)`. */
  private readonly keyValueTables = new Set<string>();
  private closed = false;

  /**
   * Open (or create) the database at `path` and bootstrap `schemas`.
   * The parent directory must exist.
   */
  constructor(scope: Scope, path: string, options: ScopeConnectionOptions) {
    this.scope = scope;
    this.key = scopeKey(scope);
    this.path = path;
    this.schemas = options.schemas;
    this.logger = options.logger;

    this.db = new Database(path, { timeout: options.busyTimeout });
    try {
      this.db.pragma(`journal_mode = ${options.journalMode}`);
      this.bootstrap();
    } catch (err) {
      this.db.close();
      throw err;
    }
  }

  // ── State ──────────────────────────────────────────────────────────────

  get isOpen(): boolean {
    return !this.closed && this.db.open;
  }

  /** Whether writes made with `commit: false` are waiting for `commit()`. */
  get hasPendingWrites(): boolean {
    return this.isOpen && this.db.inTransaction;
  }

  /** Names of the user tables currently in the database. */
  get tables(): string[] {
    this.ensureOpen();
    return this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      )
      .all()
      .map((row) => row.name);
  }

  /** Column names of `table`, in declaration order; empty if it does not exist. */
  columnNames(table: string): string[] {
    this.ensureOpen();
    return this.db
      .prepare<[string], { name: string }>('SELECT name FROM pragma_table_info(?)')
      .all(table)
      .map((row) => row.name);
  }

  // ── Statements ─────────────────────────────────────────────────────────

  execute(sql: string, params: readonly BindValue[] = [], options: ExecuteOptions = {}): void {
    const stmt = this.prepare<Row>(sql);
    this.write(options.commit ?? true, () => {
      if (stmt.reader) {
        stmt.all(...params);
      } else {
        stmt.run(...params);
      }
    });
  }

  /** Run one statement per parameter tuple, inside a single transaction. */
  executeMany(
    sql: string,
    rows: Iterable<readonly BindValue[]>,
    options: ExecuteOptions = {},
  ): void {
    const stmt = this.prepare<Row>(sql);
    const runAll = this.db.transaction((batch: Iterable<readonly BindValue[]>) => {
      for (const params of batch) stmt.run(...params);
    });
    this.write(options.commit ?? true, () => runAll(rows));
  }

  /** First row produced by `sql`, or `undefined`. */
  fetch<T extends Row = Row>(sql: string, params: readonly BindValue[] = []): T | undefined {
    return this.prepare<T>(sql).get(...params);
  }

  /** Every row produced by `sql`, in the order the statement defines. */
  fetchAll<T extends Row = Row>(sql: string, params: readonly BindValue[] = []): T[] {
    return this.prepare<T>(sql).all(...params);
  }

  /**
   * Run a statement that may both write and return data, such as
   * `INSERT ... RETURNING id`. Returns its first row unless
   * `fetch: false` is passed.
   */
  evaluate<T extends Row = Row>(
    sql: string,
    params: readonly BindValue[] = [],
    options: EvaluateOptions = {},
  ): T | undefined {
    const stmt = this.prepare<T>(sql);
    const fetch = options.fetch ?? true;
    return this.write(options.commit ?? true, () => {
      if (!stmt.reader) {
        stmt.run(...params);
        return undefined;
      }
      const row = stmt.get(...params);
      return fetch ? row : undefined;
    });
  }

  /** Flush writes made with `commit: false`. */
  commit(): void {
    this.ensureOpen();
    if (this.db.inTransaction) this.db.exec('COMMIT');
  }

  /** Discard writes made with `commit: false`. */
  rollback(): void {
    this.ensureOpen();
    if (this.db.inTransaction) this.db.exec('ROLLBACK');
  }

  /** Release the handle. Uncommitted writes are discarded. Idempotent. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
    this.logger.debug('Connection closed', { scope: this.key });
  }

  // ── Key/value tables ───────────────────────────────────────────────────

  /** Text stored under `key`, or `undefined` when the key is absent. */
  getValue(table: string, key: string): string | undefined;
  /** Value stored under `key` cast with a built-in cast. */
  getValue<C extends ValueCast>(table: string, key: string, as: C): CastTypes[C] | undefined;
  /** Value stored under `key` parsed by `parse`. */
  getValue<T>(table: string, key: string, parse: (text: string) => T): T | undefined;
  getValue(
    table: string,
    key: string,
    as: ValueCast | ((text: string) => unknown) = 'string',
  ): unknown {
    const quoted = this.keyValueTable(table);
    const row = this.fetch<{ value: unknown }>(`SELECT value FROM ${quoted} WHERE key = ?`, [key]);
    if (row === undefined || row.value === null) return undefined;
    const text = String(row.value);
    return typeof as === 'function' ? as(text) : castStoredText(text, as);
  }

  /** Every key of a key/value table mapped to its stored text. */
  getAllValues(table: string): Record<string, string> {
    const quoted = this.keyValueTable(table);
    const rows = this.fetchAll<{ key: unknown; value: unknown }>(`SELECT key, value FROM ${quoted}`);
    return Object.fromEntries(
      rows.filter((row) => row.value !== null).map((row) => [String(row.key), String(row.value)]),
    );
  }

  /**
   * Insert or replace the value of `key`. Booleans are stored as "1" / "0".
   *
   * @throws StorageTypeError when `value` cannot be rendered as text.
   */
  setValue(table: string, key: string, value: StorableValue, options: ExecuteOptions = {}): void {
    const quoted = this.keyValueTable(table);
    const text = toStoredText(value);
    this.execute(
      `INSERT OR REPLACE INTO ${quoted} (key, value) VALUES (?, ?)`,
      [this.checkKey(key), text],
      options,
    );
  }

  /** Remove `key`. Returns whether a row was deleted. */
  deleteValue(table: string, key: string, options: ExecuteOptions = {}): boolean {
    const quoted = this.keyValueTable(table);
    const stmt = this.prepare(`DELETE FROM ${quoted} WHERE key = ?`);
    return this.write(options.commit ?? true, () => stmt.run(this.checkKey(key)).changes > 0);
  }

  toString(): string {
    return `ScopeConnection(${describeScope(this.scope)})`;
  }

  // ── Internal ───────────────────────────────────────────────────────────

  /**
   * Create missing tables, seed new tables, and re-apply defaults of
   * `Always` schemas to tables that already existed. One transaction.
   */
  private bootstrap(): void {
    const existing = new Set(this.tables.map((t) => t.toLowerCase()));
    const pending = this.schemas.filter(
      (s) => !existing.has(s.tableName.toLowerCase()) || (s.reseed === ReseedPolicy.Always && s.hasDefaults),
    );

    if (pending.length > 0) {
      const created: string[] = [];
      const apply = this.db.transaction(() => {
        for (const schema of pending) {
          const id = schema.tableName.toLowerCase();
          if (!existing.has(id)) {
            this.db.exec(schema.statement);
            existing.add(id);
            created.push(schema.tableName);
          }
          this.seed(schema);
        }
      });
      apply();

      for (const table of created) {
        this.logger.info('Table created', { scope: this.key, table });
      }
    }

    for (const schema of this.schemas) {
      if (schema instanceof KeyValueTableSchema && hasKeyValueShape(this.columnNames(schema.tableName))) {
        this.keyValueTables.add(schema.tableName.toLowerCase());
      }
    }
  }

  private seed(schema: TableSchema): void {
    const sql = schema.seedStatement;
    if (sql === undefined) return;
    const stmt = this.db.prepare(sql);
    for (const values of schema.seedValues()) stmt.run(...values);
  }

  /** Validate that `table` is a `(key, value)` table; returns its quoted name. */
  private keyValueTable(table: string): string {
    this.ensureOpen();
    const id = table.toLowerCase();
    if (!this.keyValueTables.has(id)) {
      const columns = this.columnNames(table);
      if (columns.length === 0) {
        throw new ContractViolationError(`Table "${table}" does not exist in scope "${this.key}"`, table);
      }
      if (!hasKeyValueShape(columns)) {
        throw new ContractViolationError(
          `Table "${table}" is not a key/value table: expected columns (key, value), found (${columns.join(', ')})`,
          table,
        );
      }
      this.keyValueTables.add(id);
    }
    return quoteIdentifier(table);
  }

  private checkKey(key: string): string {
    const candidate: unknown = key;
    if (typeof candidate !== 'string') {
      throw new StorageTypeError(`Key must be a string, got ${typeof candidate}`);
    }
    return candidate;
  }

  private prepare<T = unknown>(sql: string): Database.Statement<BindValue[], T> {
    this.ensureOpen();
    return this.db.prepare<BindValue[], T>(sql);
  }

  /**
   * Run `work` under the pending-write model. An auto-committed write with
   * no transaction open runs in SQLite's own autocommit mode.
   */
  private write<T>(commit: boolean, work: () => T): T {
    if (commit && !this.db.inTransaction) return work();
    if (!this.db.inTransaction) this.db.exec('BEGIN');
    const result = work();
    if (commit) this.db.exec('COMMIT');
    return result;
  }

  private ensureOpen(): void {
    if (!this.isOpen) throw new ConnectionClosedError(this.key);
  }
}
