// ---------------------------------------------------------------------------
// Strata — Application Integration Test
// ---------------------------------------------------------------------------
// End-to-end: YAML config → Application.start → module registers schemas →
// domain data read and written through scope connections → stop → restart.
// ---------------------------------------------------------------------------

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { Application, ApplicationState } from '../src/core/Application';
import { run } from '../src/main';
import { DomainRegistry } from '../src/core/storage/DomainRegistry';
import { KeyValueTableSchema, TableSchema } from '../src/core/storage/TableSchema';
import { GLOBAL_SCOPE, scopeKind, typedScope } from '../src/core/storage/Scope';
import { IModule, ModuleContext, ModuleState } from '../src/core/types/module';
import { ConfigError, ModuleError, StrataError } from '../src/shared/errors';
import { cleanupDir, createTmpDir } from './helpers';

// ── Example module ─────────────────────────────────────────────────────────

/** Per-guild prefixes and quotes, with a global default prefix. */
class GuildSettingsModule implements IModule {
  readonly manifest = {
    id: 'settings',
    name: 'Guild Settings',
    version: '1.0.0',
    configSchema: {
      type: 'object',
      properties: { prefix: { type: 'string', minLength: 1 } },
    },
  };

  private data: DomainRegistry | undefined;

  async initialize(context: ModuleContext): Promise<void> {
    const prefix = typeof context.config.prefix === 'string' ? context.config.prefix : '!';
    this.data = context.data;
    this.data.registerSchemas(GLOBAL_SCOPE, new KeyValueTableSchema('settings', { prefix }));
    this.data.registerSchemas(
      scopeKind('guild'),
      new KeyValueTableSchema('settings', { prefix, announce: true }),
      new TableSchema('CREATE TABLE IF NOT EXISTS quotes (id INTEGER PRIMARY KEY, author TEXT, text TEXT)'),
    );
  }

  async destroy(): Promise<void> {
    this.data = undefined;
  }

  prefixFor(guildId: bigint): string | undefined {
    return this.requireData().get(typedScope('guild', guildId)).getValue('settings', 'prefix');
  }

  addQuote(guildId: bigint, author: string, text: string): number | undefined {
    const row = this.requireData()
      .get(typedScope('guild', guildId))
      .evaluate<{ id: number }>('INSERT INTO quotes (author, text) VALUES (?, ?) RETURNING id', [author, text]);
    return row?.id;
  }

  private requireData(): DomainRegistry {
    if (!this.data) throw new Error('settings module is not initialized');
    return this.data;
  }
}

function writeConfig(dir: string, modules: string): string {
  const file = path.join(dir, 'strata.yaml');
  fs.writeFileSync(
    file,
    [
      'system:',
      '  name: Strata-Integration',
      '  environment: development',
      'storage:',
      `  root: ${JSON.stringify(path.join(dir, 'var'))}`,
      '  journalMode: DELETE',
      'logging:',
      '  level: debug',
      '  format: json',
      '  output: file',
      `  file: ${JSON.stringify(path.join(dir, 'strata.log'))}`,
      'modules:',
      modules,
    ].join('\n'),
  );
  return file;
}

const MODULES = ['  settings:', '    enabled: true', '    prefix: "?"', '  quotes:', '    enabled: false'].join('\n');

// ── Tests ──────────────────────────────────────────────────────────────────

describe('Application', () => {
  let tmpDir: string;
  let app: Application;

  beforeEach(() => {
    tmpDir = createTmpDir('strata-app-test-');
    app = new Application({ handleSignals: false });
  });

  afterEach(async () => {
    if (app.getState() === ApplicationState.Running) await app.stop();
    cleanupDir(tmpDir);
  });

  it('should start, serve module data and stop', async () => {
    const settings = new GuildSettingsModule();
    let quotesBuilt = false;
    app.registerModule('settings', () => settings);
    app.registerModule('quotes', () => {
      quotesBuilt = true;
      return new GuildSettingsModule();
    });

    await app.start(writeConfig(tmpDir, MODULES));
    assert.equal(app.getState(), ApplicationState.Running);
    assert.equal(app.getConfig().system.name, 'Strata-Integration');
    assert.equal(app.getModuleRegistry().getState('settings'), ModuleState.Initialized);
    assert.equal(app.getModuleRegistry().getState('quotes'), ModuleState.Registered);
    assert.equal(quotesBuilt, false);

    const guild = 987654321098765432n;
    assert.equal(settings.prefixFor(guild), '?');
    assert.equal(settings.addQuote(guild, 'ada', 'hello'), 1);
    assert.equal(settings.addQuote(guild, 'bob', 'world'), 2);

    const store = app.getStore();
    const conn = store.domain('settings').get(typedScope('guild', guild));
    assert.equal(conn.getValue('settings', 'announce', 'boolean'), true);
    assert.equal(
      conn.path,
      path.join(tmpDir, 'var', 'settings', 'data', 'guild_987654321098765432.db'),
    );

    await app.stop();
    assert.equal(app.getState(), ApplicationState.Stopped);
    assert.equal(conn.isOpen, false);
    assert.equal(app.getModuleRegistry().getState('settings'), ModuleState.Destroyed);
  });

  it('should keep data across restarts', async () => {
    const config = writeConfig(tmpDir, MODULES);
    const first = new GuildSettingsModule();
    app.registerModule('settings', () => first);
    await app.start(config);
    first.addQuote(1n, 'ada', 'persisted');
    app.getStore().domain('settings').get(typedScope('guild', 1n)).setValue('settings', 'prefix', '>>');
    await app.stop();

    app = new Application({ handleSignals: false });
    const second = new GuildSettingsModule();
    app.registerModule('settings', () => second);
    await app.start(config);

    assert.equal(second.prefixFor(1n), '>>');
    const quotes = app.getStore().domain('settings').get(typedScope('guild', 1n)).fetchAll('SELECT text FROM quotes');
    assert.deepEqual(quotes, [{ text: 'persisted' }]);
  });

  it('should write its log to the configured file', async () => {
    app.registerModule('settings', () => new GuildSettingsModule());
    await app.start(writeConfig(tmpDir, MODULES));
    await app.stop();

    const entries = fs
      .readFileSync(path.join(tmpDir, 'strata.log'), 'utf-8')
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line));
    assert.equal(entries[0].message, 'Starting Strata');
    assert.equal(entries[0].module, 'Strata');
    assert.ok(entries.some((e) => e.message === 'Module loaded' && e.module === 'Strata:ModuleRegistry'));
    assert.equal(entries[entries.length - 1].message, 'Strata shutdown complete');
  });

  it('should report the storage settings and shut down when run standalone', async () => {
    const ran = await run(writeConfig(tmpDir, '  {}'));
    assert.equal(ran.getState(), ApplicationState.Stopped);

    const entries = fs
      .readFileSync(path.join(tmpDir, 'strata.log'), 'utf-8')
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line));
    const report = entries.find((e) => e.message === 'Storage settings');
    assert.equal(report?.context?.root, path.join(tmpDir, 'var'));
    assert.equal(report?.context?.journalMode, 'DELETE');
    assert.equal(entries[entries.length - 1].message, 'Strata shutdown complete');
  });

  it('should fail to start on invalid configuration', async () => {
    const file = path.join(tmpDir, 'bad.yaml');
    fs.writeFileSync(file, 'storage:\n  journalMode: FAST\n');
    const cap = captureErrors();
    try {
      await assert.rejects(app.start(file), ConfigError);
    } finally {
      cap.restore();
    }
    assert.equal(app.getState(), ApplicationState.Error);
    assert.equal(cap.lines.length, 1);
    assert.throws(() => app.getStore(), StrataError);
  });

  it('should fail to start when a module fails and close its connections', async () => {
    let opened: DomainRegistry | undefined;
    app.registerModule('settings', () => ({
      manifest: { id: 'settings', name: 'Broken', version: '0.0.1' },
      async initialize(context: ModuleContext) {
        opened = context.data;
        context.data.get(GLOBAL_SCOPE);
        throw new Error('no luck');
      },
      async destroy() {},
    }));

    await assert.rejects(app.start(writeConfig(tmpDir, MODULES)), ModuleError);
    assert.equal(app.getState(), ApplicationState.Error);
    assert.deepEqual(opened?.openConnections(), []);
  });

  it('should refuse lifecycle calls out of order', async () => {
    app.registerModule('settings', () => new GuildSettingsModule());
    assert.throws(() => app.getConfig(), /has not been started/);

    await app.start(writeConfig(tmpDir, MODULES));
    await assert.rejects(app.start(writeConfig(tmpDir, MODULES)), StrataError);
    assert.throws(() => app.registerModule('late', () => new GuildSettingsModule()), StrataError);

    await app.stop();
    await app.stop();
    assert.equal(app.getState(), ApplicationState.Stopped);
  });
});

function captureErrors(): { lines: string[]; restore: () => void } {
  const lines: string[] = [];
  const original = console.error;
  console.error = (...args: unknown[]) => { lines.push(args.map(String).join(' ')); };
  return { lines, restore: () => { console.error = original; } };
}
