// ---------------------------------------------------------------------------
// Strata — ModuleRegistry Lifecycle Tests
// ---------------------------------------------------------------------------

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { ModuleRegistry } from '../src/core/modules/ModuleRegistry';
import { DomainStore } from '../src/core/storage/DomainStore';
import { KeyValueTableSchema } from '../src/core/storage/TableSchema';
import { GLOBAL_SCOPE } from '../src/core/storage/Scope';
import { IModule, ModuleContext, ModuleManifest, ModuleState } from '../src/core/types/module';
import { ModuleConfig, StrataConfig } from '../src/core/types/config';
import { ModuleError } from '../src/shared/errors';
import { cleanupDir, createCapturingLogger, createSilentLogger, createTestStore, createTmpDir } from './helpers';

// ── Stub Module ────────────────────────────────────────────────────────────

interface StubOptions {
  manifestId?: string;
  configSchema?: Record<string, unknown>;
  onInit?: (ctx: ModuleContext) => Promise<void> | void;
  onDestroy?: () => Promise<void> | void;
}

interface StubModule extends IModule {
  context: ModuleContext | undefined;
}

function createStubModule(id: string, opts: StubOptions = {}): StubModule {
  const manifest: ModuleManifest = {
    id: opts.manifestId ?? id,
    name: `Test Module ${id}`,
    version: '1.0.0',
    configSchema: opts.configSchema,
  };

  const stub: StubModule = {
    manifest,
    context: undefined,
    async initialize(context: ModuleContext) {
      stub.context = context;
      if (opts.onInit) await opts.onInit(context);
    },
    async destroy() {
      if (opts.onDestroy) await opts.onDestroy();
    },
  };
  return stub;
}

/** Registers a global key/value table seeded with the configured prefix. */
function registerSettings(ctx: ModuleContext): void {
  const prefix = typeof ctx.config.prefix === 'string' ? ctx.config.prefix : '!';
  ctx.data.registerSchemas(GLOBAL_SCOPE, new KeyValueTableSchema('settings', { prefix }));
}

function makeConfig(root: string, modules: Record<string, ModuleConfig> = {}): StrataConfig {
  return {
    system: { name: 'Test', environment: 'development' },
    modules,
    storage: { root, extension: 'db', journalMode: 'DELETE', busyTimeout: 1000 },
  };
}

// ── Tests ──────────────────────────────────────────────────────────────────

describe('ModuleRegistry', () => {
  let tmpDir: string;
  let store: DomainStore;
  let registry: ModuleRegistry;

  beforeEach(() => {
    tmpDir = createTmpDir('strata-modules-test-');
    store = createTestStore(tmpDir);
    registry = new ModuleRegistry(store, createSilentLogger());
  });

  afterEach(() => {
    store.reset();
    cleanupDir(tmpDir);
  });

  describe('registration', () => {
    it('should list registered modules in order', () => {
      registry.register('b', () => createStubModule('b'));
      registry.register('a', () => createStubModule('a'));
      assert.deepEqual(registry.getRegisteredIds(), ['b', 'a']);
      assert.equal(registry.getState('a'), ModuleState.Registered);
      assert.equal(registry.getModule('a'), undefined);
    });

    it('should reject duplicate IDs', () => {
      registry.register('a', () => createStubModule('a'));
      assert.throws(() => registry.register('a', () => createStubModule('a')), ModuleError);
    });

    it('should report unknown modules', () => {
      assert.equal(registry.getState('nope'), undefined);
    });
  });

  describe('initializeAll', () => {
    it('should hand each module its own domain and config', async () => {
      const stub = createStubModule('settings');
      registry.register('settings', () => stub);
      await registry.initializeAll(makeConfig(tmpDir, { settings: { enabled: true, prefix: '?' } }));

      assert.equal(registry.getState('settings'), ModuleState.Initialized);
      assert.equal(registry.getModule('settings'), stub);
      assert.equal(stub.context?.moduleId, 'settings');
      assert.deepEqual(stub.context?.config, { prefix: '?' });
      assert.equal(stub.context?.data, store.domain('settings'));
    });

    it('should initialize modules in registration order', async () => {
      const order: string[] = [];
      for (const id of ['c', 'a', 'b']) {
        registry.register(id, () => createStubModule(id, { onInit: () => { order.push(id); } }));
      }
      await registry.initializeAll(makeConfig(tmpDir));
      assert.deepEqual(order, ['c', 'a', 'b']);
    });

    it('should skip modules disabled by configuration', async () => {
      let built = false;
      registry.register('quotes', () => {
        built = true;
        return createStubModule('quotes');
      });
      await registry.initializeAll(makeConfig(tmpDir, { quotes: { enabled: false } }));
      assert.equal(built, false);
      assert.equal(registry.getState('quotes'), ModuleState.Registered);
    });

    it('should validate the module config section', async () => {
      registry.register('settings', () =>
        createStubModule('settings', {
          configSchema: { type: 'object', properties: { prefix: { type: 'string' } } },
        }),
      );
      await assert.rejects(
        registry.initializeAll(makeConfig(tmpDir, { settings: { enabled: true, prefix: 5 } })),
        (err: unknown) =>
          err instanceof ModuleError &&
          err.moduleId === 'settings' &&
          err.message === 'Config validation failed for "settings": [settings] /prefix: must be string',
      );
      assert.equal(registry.getState('settings'), ModuleState.Error);
    });

    it('should reject a manifest ID that differs from the registered ID', async () => {
      registry.register('settings', () => createStubModule('settings', { manifestId: 'other' }));
      await assert.rejects(
        registry.initializeAll(makeConfig(tmpDir)),
        /mismatched manifest ID "other"/,
      );
    });

    it('should wrap initialization failures', async () => {
      const boom = new Error('boom');
      registry.register('settings', () => createStubModule('settings', { onInit: () => { throw boom; } }));
      await assert.rejects(
        registry.initializeAll(makeConfig(tmpDir)),
        (err: unknown) =>
          err instanceof ModuleError &&
          err.message === 'Module "settings" failed to initialize: boom' &&
          err.cause === boom,
      );
      assert.equal(registry.getState('settings'), ModuleState.Error);
      assert.equal(registry.getError('settings'), boom);
      assert.equal(registry.getModule('settings'), undefined);
    });
  });

  describe('unload & reload', () => {
    it('should destroy the module and close its connections', async () => {
      let destroyed = 0;
      registry.register('settings', () =>
        createStubModule('settings', { onInit: registerSettings, onDestroy: () => { destroyed++; } }),
      );
      await registry.initializeAll(makeConfig(tmpDir));
      const domain = store.domain('settings');
      const conn = domain.get(GLOBAL_SCOPE);

      await registry.unload('settings');
      assert.equal(destroyed, 1);
      assert.equal(conn.isOpen, false);
      assert.equal(registry.getState('settings'), ModuleState.Destroyed);
      assert.equal(registry.getModule('settings'), undefined);
      assert.equal(store.domain('settings'), domain);
    });

    it('should ignore unloading a module that is not initialized', async () => {
      registry.register('settings', () => createStubModule('settings'));
      await registry.unload('settings');
      assert.equal(registry.getState('settings'), ModuleState.Registered);
    });

    it('should reject unloading an unknown module', async () => {
      await assert.rejects(registry.unload('nope'), ModuleError);
    });

    it('should log and continue when destroy fails', async () => {
      const logger = createCapturingLogger();
      const logged = new ModuleRegistry(store, logger);
      logged.register('settings', () =>
        createStubModule('settings', { onDestroy: () => { throw new Error('stuck'); } }),
      );
      await logged.initializeAll(makeConfig(tmpDir));
      await logged.unload('settings');

      assert.equal(logged.getState('settings'), ModuleState.Destroyed);
      const errors = logger.entries.filter((e) => e.level === 'error');
      assert.equal(errors.length, 1);
      assert.equal(errors[0].message, 'Module "settings" failed to destroy cleanly');
      assert.equal(errors[0].error?.message, 'stuck');
    });

    it('should rebuild the module on the same domain with its data intact', async () => {
      const instances: StubModule[] = [];
      registry.register('settings', () => {
        const stub = createStubModule('settings', { onInit: registerSettings });
        instances.push(stub);
        return stub;
      });
      await registry.initializeAll(makeConfig(tmpDir));
      store.domain('settings').get(GLOBAL_SCOPE).setValue('settings', 'prefix', '$');

      await registry.reload('settings');
      assert.equal(instances.length, 2);
      assert.equal(registry.getModule('settings'), instances[1]);
      assert.equal(instances[1].context?.data, instances[0].context?.data);
      assert.equal(store.domain('settings').get(GLOBAL_SCOPE).getValue('settings', 'prefix'), '$');
    });

    it('should reject reload before initializeAll', async () => {
      registry.register('settings', () => createStubModule('settings'));
      await assert.rejects(registry.reload('settings'), /before initializeAll/);
    });

    it('should destroy modules in reverse registration order', async () => {
      const order: string[] = [];
      for (const id of ['a', 'b', 'c']) {
        registry.register(id, () => createStubModule(id, { onDestroy: () => { order.push(id); } }));
      }
      await registry.initializeAll(makeConfig(tmpDir));
      await registry.destroyAll();
      assert.deepEqual(order, ['c', 'b', 'a']);
      for (const id of ['a', 'b', 'c']) {
        assert.equal(registry.getState(id), ModuleState.Destroyed);
      }
    });
  });
});
