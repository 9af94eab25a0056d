// ---------------------------------------------------------------------------
// Strata — Storage Types
// ---------------------------------------------------------------------------
// Shared vocabulary of the storage broker: scopes, bound values, rows and
// the options accepted by scope connection operations.
// ---------------------------------------------------------------------------

import type { JournalMode } from './config';

// ── Scopes ─────────────────────────────────────────────────────────────────

/** A `(kind, id)` identity such as guild #123. */
export interface TypedScope {
  readonly type: 'typed';
  /** Lower-case kind, e.g. `guild`. */
  readonly kind: string;
  readonly id: number | bigint;
}

/** A free-form scope such as `global`. */
export interface NamedScope {
  readonly type: 'named';
  readonly name: string;
}

/** The unit of storage isolation: one scope, one database file. */
export type Scope = TypedScope | NamedScope;

/** Stands for every typed scope of one kind when registering schemas. */
export interface ScopeKind {
  readonly type: 'kind';
  readonly kind: string;
}

/** What schemas are registered against: a kind, or one named scope. */
export type ScopeType = ScopeKind | NamedScope;

// ── Values & rows ──────────────────────────────────────────────────────────

/** Values the SQLite driver can bind to a `?` placeholder. */
export type BindValue = string | number | bigint | Buffer | null;

/** A result row keyed by column name. */
export type Row = Record<string, unknown>;

/** Values the key/value helpers accept and store as text. */
export type StorableValue = string | number | bigint | boolean;

/** Built-in casts for reading key/value text back. */
export interface CastTypes {
  string: string;
  number: number;
  integer: number;
  boolean: boolean;
  bigint: bigint;
}

export type ValueCast = keyof CastTypes;

// ── Schemas ────────────────────────────────────────────────────────────────

/** When a table's default rows are inserted. */
export enum ReseedPolicy {
  /** Only when the table is created. */
  Once = 'once',
  /** On every open, inserting rows whose key is absent. */
  Always = 'always',
}

// ── Operation options ──────────────────────────────────────────────────────

export interface ExecuteOptions {
  /** Commit right after the statement. Default: `true`. */
  commit?: boolean;
}

export interface EvaluateOptions extends ExecuteOptions {
  /** Return the first row the statement produces. Default: `true`. */
  fetch?: boolean;
}

/** Per-handle settings shared by every connection of a store. */
export interface ConnectionSettings {
  journalMode: JournalMode;
  busyTimeout: number;
}
