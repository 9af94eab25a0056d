// ---------------------------------------------------------------------------
// Strata — Table Schemas
// ---------------------------------------------------------------------------
// Immutable descriptions of one table: its CREATE TABLE statement, the
// default rows seeded into it and when they are (re)applied. Construction
// fails fast; nothing here touches a database.
// ---------------------------------------------------------------------------

import { BindValue, ReseedPolicy, StorableValue } from '../types/storage';
import { SchemaDefinitionError } from '../../shared/errors';
import { toStoredText } from './values';

const CREATE_TABLE = /^\s*CREATE\s+TABLE\s+(?:IF\s+NOT\s+EXISTS\s+)?/i;

/** Table name right after the clause: bare, "quoted", `back-quoted` or [bracketed]. */
const TABLE_NAME = /^(?:"((?:[^"]|"")+)"|`([^`]+)`|\[([^\]]+)\]|([A-Za-z_][A-Za-z0-9_$]*))\s*\(/;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Quote an identifier for interpolation into SQL. */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/** A default row: column name to value. */
export type DefaultRow = Readonly<Record<string, BindValue | boolean>>;

export interface TableSchemaOptions {
  /** Rows inserted (conflicts ignored) when the table is seeded. */
  defaults?: readonly DefaultRow[];
  /** Default: `ReseedPolicy.Once`. */
  reseed?: ReseedPolicy;
}

function extractTableName(statement: string): string {
  const clause = CREATE_TABLE.exec(statement);
  if (!clause) {
    throw new SchemaDefinitionError(
      `Table schema must start with "CREATE TABLE": ${statement.trim().slice(0, 60)}`,
    );
  }
  const match = TABLE_NAME.exec(statement.slice(clause[0].length));
  const name = match?.[1]?.replace(/""/g, '"') ?? match?.[2] ?? match?.[3] ?? match?.[4];
  if (name === undefined) {
    throw new SchemaDefinitionError(
      `Cannot find the table name in: ${statement.trim().slice(0, 60)}`,
    );
  }
  return name;
}

function normalizeCell(value: BindValue | boolean): BindValue {
  return typeof value === 'boolean' ? (value ? 1 : 0) : value;
}

export class TableSchema {
  readonly statement: string;
  readonly tableName: string;
  readonly reseed: ReseedPolicy;
  readonly defaults: readonly DefaultRow[];
  /** Columns shared by every default row, in first-row order. */
  readonly columns: readonly string[];

  private readonly seedRows: readonly (readonly BindValue[])[];

  /**
   * @param statement  `CREATE TABLE [IF NOT EXISTS] name (...)`. Further
   *                   statements (indexes, triggers) may follow it.
   * @throws SchemaDefinitionError
   */
  constructor(statement: string, options: TableSchemaOptions = {}) {
    this.statement = statement;
    this.tableName = extractTableName(statement);
    this.reseed = options.reseed ?? ReseedPolicy.Once;

    const defaults = options.defaults ?? [];
    const columns = defaults.length > 0 ? Object.keys(defaults[0]) : [];
    if (defaults.length > 0 && columns.length === 0) {
      throw new SchemaDefinitionError(`Default rows of "${this.tableName}" have no columns`);
    }
    for (const row of defaults) {
      const keys = Object.keys(row);
      if (keys.length !== columns.length || !keys.every((k) => columns.includes(k))) {
        throw new SchemaDefinitionError(
          `Default rows of "${this.tableName}" must all have the columns: ${columns.join(', ')}`,
        );
      }
    }

    this.columns = Object.freeze(columns);
    this.defaults = Object.freeze(defaults.map((row) => Object.freeze({ ...row })));
    this.seedRows = Object.freeze(
      defaults.map((row) => Object.freeze(columns.map((c) => normalizeCell(row[c])))),
    );
  }

  get hasDefaults(): boolean {
    return this.seedRows.length > 0;
  }

  /** `INSERT OR IGNORE` statement matching `seedValues()`; undefined without defaults. */
  get seedStatement(): string | undefined {
    if (!this.hasDefaults) return undefined;
    const cols = this.columns.map(quoteIdentifier).join(', ');
    const params = this.columns.map(() => '?').join(', ');
    return `INSERT OR IGNORE INTO ${quoteIdentifier(this.tableName)} (${cols}) VALUES (${params})`;
  }

  /** Default rows as bind tuples, booleans already turned into 1 / 0. */
  seedValues(): readonly (readonly BindValue[])[] {
    return this.seedRows;
  }

  toString(): string {
    return `TableSchema(${this.tableName}, reseed=${this.reseed})`;
  }
}

function defaultText(table: string, key: string, value: StorableValue): string {
  try {
    return toStoredText(value);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SchemaDefinitionError(`Default "${key}" of "${table}": ${reason}`);
  }
}

export interface KeyValueTableSchemaOptions {
  /** Default: `ReseedPolicy.Always`, so new keys reach existing databases. */
  reseed?: ReseedPolicy;
}

/**
 * A two-column `(key TEXT PRIMARY KEY, value TEXT)` table, read and written
 * through the key/value helpers of `ScopeConnection`.
 */
export class KeyValueTableSchema extends TableSchema {
  constructor(
    name: string,
    defaults: Readonly<Record<string, StorableValue>> = {},
    options: KeyValueTableSchemaOptions = {},
  ) {
    if (!IDENTIFIER.test(name)) {
      throw new SchemaDefinitionError(`Invalid key/value table name: ${JSON.stringify(name)}`);
    }
    if (typeof defaults !== 'object' || defaults === null || Array.isArray(defaults)) {
      throw new SchemaDefinitionError(`Defaults of "${name}" must be a key/value mapping`);
    }
    super(`CREATE TABLE IF NOT EXISTS ${name} (key TEXT PRIMARY KEY, value TEXT)`, {
      defaults: Object.entries(defaults).map(([key, value]) => ({
        key,
        value: defaultText(name, key, value),
      })),
      reseed: options.reseed ?? ReseedPolicy.Always,
    });
  }

  toString(): string {
    return `KeyValueTableSchema(${this.tableName}, reseed=${this.reseed})`;
  }
}
