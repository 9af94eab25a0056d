export { TableSchema, KeyValueTableSchema, quoteIdentifier } from './TableSchema';
export type { DefaultRow, TableSchemaOptions, KeyValueTableSchemaOptions } from './TableSchema';
export { ScopeConnection, hasKeyValueShape } from './ScopeConnection';
export type { ScopeConnectionOptions } from './ScopeConnection';
export { DomainRegistry } from './DomainRegistry';
export type { DomainRegistryOptions } from './DomainRegistry';
export { DomainStore } from './DomainStore';
export type { DomainStoreOptions } from './DomainStore';
export {
  typedScope,
  namedScope,
  scopeKind,
  scopeKey,
  scopeTypeOf,
  scopeTypeKey,
  sanitizeName,
  describeScope,
  GLOBAL_SCOPE,
} from './Scope';
export { toStoredText, castStoredText } from './values';
