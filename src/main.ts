// ---------------------------------------------------------------------------
// Strata — Main Entry Point
// ---------------------------------------------------------------------------
// Boots the application with the default (or CLI-specified) config file.
// Feature modules are registered by the embedding program; run standalone,
// this prepares the storage root, reports the effective settings and shuts
// down again.
// ---------------------------------------------------------------------------

import { Application } from './core/Application';

export async function run(
  configPath: string,
  app: Application = new Application({ handleSignals: false }),
): Promise<Application> {
  await app.start(configPath);

  const { storage } = app.getConfig();
  app.getLogger().info('Storage settings', {
    root: app.getStore().root,
    extension: storage.extension,
    journalMode: storage.journalMode,
  });

  await app.stop();
  return app;
}

if (require.main === module) {
  run(process.argv[2] ?? 'config/default.yaml').catch((err) => {
    console.error('Strata failed to start:', err);
    process.exit(1);
  });
}
