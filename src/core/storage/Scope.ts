// ---------------------------------------------------------------------------
// Strata — Scope Identity
// ---------------------------------------------------------------------------
// Builders for the two scope variants and the one function that turns a
// scope into its storage key. Typed scopes map to `<kind>_<id>`; named
// scopes are lower-cased with everything outside [a-z0-9_] replaced by `_`.
// ---------------------------------------------------------------------------

import { NamedScope, Scope, ScopeKind, ScopeType, TypedScope } from '../types/storage';
import { StorageTypeError } from '../../shared/errors';

const KIND_PATTERN = /^[a-z][a-z0-9_]*$/;

/** Matches keys that a typed scope could produce: `<kind>_<digits>`. */
const TYPED_KEY_PATTERN = /^([a-z][a-z0-9_]*)_(\d+)$/;

function normalizeKind(kind: string): string {
  const normalized = typeof kind === 'string' ? kind.toLowerCase() : '';
  if (!KIND_PATTERN.test(normalized)) {
    throw new StorageTypeError(
      `Invalid scope kind ${JSON.stringify(kind)}: expected letters, digits and underscores, starting with a letter`,
    );
  }
  return normalized;
}

/** Scope of one entity, e.g. `typedScope('guild', 123n)`. */
export function typedScope(kind: string, id: number | bigint): TypedScope {
  const validId =
    typeof id === 'bigint' ? id >= 0n : Number.isSafeInteger(id) && id >= 0;
  if (!validId) {
    throw new StorageTypeError(
      `Invalid scope id ${String(id)}: expected a non-negative integer`,
    );
  }
  return { type: 'typed', kind: normalizeKind(kind), id };
}

/** Scope with a free-form name, e.g. `namedScope('global')`. */
export function namedScope(name: string): NamedScope {
  if (typeof name !== 'string' || name.length === 0) {
    throw new StorageTypeError('Scope name must be a non-empty string');
  }
  return { type: 'named', name };
}

/** Every typed scope of `kind`, used when registering schemas. */
export function scopeKind(kind: string): ScopeKind {
  return { type: 'kind', kind: normalizeKind(kind) };
}

export const GLOBAL_SCOPE: NamedScope = namedScope('global');

/** Sanitize a free-form name into a storage key. */
export function sanitizeName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9_]/g, '_');
}

/**
 * Deterministic, filesystem-safe storage key of a scope.
 *
 * @throws StorageTypeError when `scope` is not a `Scope`.
 */
export function scopeKey(scope: Scope): string {
  const candidate: unknown = scope;
  if (typeof candidate !== 'object' || candidate === null || !('type' in candidate)) {
    throw new StorageTypeError(`Invalid scope: ${String(candidate)}`);
  }
  switch (scope.type) {
    case 'typed':
      return `${scope.kind}_${scope.id.toString()}`.toLowerCase();
    case 'named':
      return sanitizeName(scope.name);
    default:
      throw new StorageTypeError(`Invalid scope type: ${JSON.stringify(candidate.type)}`);
  }
}

/** The scope-type a scope falls under. */
export function scopeTypeOf(scope: Scope): ScopeType {
  return scope.type === 'typed' ? { type: 'kind', kind: scope.kind } : scope;
}

/**
 * Key under which schemas are registered for a scope-type. Kinds and
 * named scopes live in separate key spaces.
 */
export function scopeTypeKey(scopeType: ScopeType): string {
  switch (scopeType.type) {
    case 'kind':
      return `kind:${scopeType.kind}`;
    case 'named':
      return `named:${sanitizeName(scopeType.name)}`;
    default:
      throw new StorageTypeError(`Invalid scope type: ${String(scopeType)}`);
  }
}

/**
 * The kind a storage key would belong to if a typed scope produced it,
 * or `undefined` if no typed scope can produce it.
 */
export function typedKeyKind(key: string): string | undefined {
  return TYPED_KEY_PATTERN.exec(key)?.[1];
}

/** Human-readable form for logs and error messages. */
export function describeScope(scope: Scope): string {
  return scope.type === 'typed' ? `${scope.kind}#${scope.id.toString()}` : scope.name;
}
