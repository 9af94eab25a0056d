// ---------------------------------------------------------------------------
// Strata — Test Helpers
// ---------------------------------------------------------------------------
// Shared utilities for unit and integration tests.
// ---------------------------------------------------------------------------

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ILogger } from '../src/core/types/module';
import { DomainStore } from '../src/core/storage/DomainStore';
import { DomainRegistry } from '../src/core/storage/DomainRegistry';

/** A silent logger that swallows all output. */
export function createSilentLogger(): ILogger {
  const noop = () => {};
  const logger: ILogger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}

export interface CapturedEntry {
  level: string;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
}

/** A logger that records all calls for assertions. Children share the record. */
export function createCapturingLogger(): ILogger & { entries: CapturedEntry[] } {
  const entries: CapturedEntry[] = [];
  const logger = {
    entries,
    debug(msg: string, ctx?: Record<string, unknown>) { entries.push({ level: 'debug', message: msg, context: ctx }); },
    info(msg: string, ctx?: Record<string, unknown>) { entries.push({ level: 'info', message: msg, context: ctx }); },
    warn(msg: string, ctx?: Record<string, unknown>) { entries.push({ level: 'warn', message: msg, context: ctx }); },
    error(msg: string, err?: Error, ctx?: Record<string, unknown>) { entries.push({ level: 'error', message: msg, context: ctx, error: err }); },
    child(): ILogger { return logger; },
  };
  return logger;
}

export function createTmpDir(prefix = 'strata-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** A store rooted in `root`, with DELETE journaling so only the .db file is left behind. */
export function createTestStore(root: string, logger: ILogger = createSilentLogger()): DomainStore {
  return new DomainStore({ root, journalMode: 'DELETE', busyTimeout: 1000 }, logger);
}

/** A lone domain registry under `root`. */
export function createTestDomain(
  root: string,
  name = 'testing',
  logger: ILogger = createSilentLogger(),
): DomainRegistry {
  return new DomainRegistry(name, {
    directory: path.join(root, name),
    extension: 'db',
    journalMode: 'DELETE',
    busyTimeout: 1000,
    logger,
  });
}
