// ---------------------------------------------------------------------------
// Strata — Core Type Barrel
// ---------------------------------------------------------------------------

export * from './module';
export * from './config';
export * from './storage';
