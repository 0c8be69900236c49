import { loadConfig } from './config';
import { createApp } from './app';
import { applySchema, seedDefaultGradeKey } from './db/migrate';
import { checkConnection, createPool } from './db/pool';
import { errorMessage } from './errors';
import { logger } from './logger';
import type { ServiceContext } from './services/context';
import { ImportLockRegistry } from './services/importLock';
import { createMemoryStore } from './store/memoryStore';
import { PgGradingStore } from './store/pgStore';

async function main(): Promise<void> {
  const config = loadConfig();
  logger.level = config.logLevel;

  const locks = new ImportLockRegistry();
  let ctx: ServiceContext;

  if (config.store === 'memory') {
    ctx = { store: createMemoryStore(), logger, locks };
    logger.warn({ module: 'index', store: 'memory' }, 'Using in-memory store; data is lost on exit');
  } else {
    const pool = createPool(config.databaseUrl, config.dbPoolSize, logger);
    await checkConnection(pool, config.databaseUrl, logger);
    ctx = { store: new PgGradingStore(pool), logger, locks };
    await applySchema(pool, ctx);
  }
  await seedDefaultGradeKey(ctx);

  const app = createApp(ctx, config);
  app.listen(config.port, () => {
    logger.info({
      module: 'index',
      port: config.port,
      store: config.store,
      node_version: process.version,
    }, 'API server started');
  });
}

main().catch((err) => {
  logger.fatal({
    module: 'index',
    error_detail: errorMessage(err),
  }, 'Startup fail');
  process.exit(1);
});
