export * from './core';
export { Logger, LogFile } from './shared/logger';
export type { LoggerOptions } from './shared/logger';
export {
  StrataError,
  ConfigError,
  ModuleError,
  SchemaDefinitionError,
  ContractViolationError,
  StorageTypeError,
  ConnectionClosedError,
  StorageError,
} from './shared/errors';
