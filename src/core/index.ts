// ---------------------------------------------------------------------------
// Strata — Core Public API
// ---------------------------------------------------------------------------
// Everything a module author or integrator needs.
// ---------------------------------------------------------------------------

// Types
export * from './types';

// Application
export { Application, ApplicationState } from './Application';
export type { ApplicationOptions } from './Application';

// Configuration
export { ConfigLoader, ConfigValidator } from './config';
export type { ValidationResult } from './config';

// Modules
export { ModuleRegistry } from './modules';

// Storage
export * from './storage';
