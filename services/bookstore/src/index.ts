import 'dotenv/config';
import { ConfigStore, LOG_LEVEL, buildDatabaseUrl, resolveSettings } from './config';
import { PoolExecutor, createPool } from './db/client';
import { createLogger } from './logger';
import { buildApp } from './server';
import { PgBookStorage } from './storage/pgBookStorage';
import { PgHealthCheck } from './storage/pgHealthCheck';
import { bootstrapSecrets } from './vault/bootstrap';

/**
 * Main entrypoint for the bookstore service.
 * Pulls secrets from Vault, opens the Postgres pool, registers health + book
 * routes and listens on the configured host/port.
 */
async function main() {
  const envStore = ConfigStore.fromEnv(process.env);
  const logger = createLogger(envStore.get(LOG_LEVEL) || 'info');

  // --- Configuration + secrets ---
  let store: ConfigStore;
  try {
    store = await bootstrapSecrets(envStore, { logger });
  } catch (err) {
    logger.fatal({ err }, 'Secret bootstrap failed');
    process.exit(1);
  }
  const settings = resolveSettings(store);
  logger.level = settings.logLevel;

  // --- Database ---
  const pool = createPool(buildDatabaseUrl(settings.db), logger);
  const db = new PoolExecutor(pool);

  const app = await buildApp({
    books: new PgBookStorage(db),
    health: new PgHealthCheck(db),
    logger,
  });
  app.addHook('onClose', async () => {
    await pool.end();
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'Shutting down');
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }

  // --- Start server ---
  try {
    await app.listen({ port: settings.port, host: settings.host });
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    await pool.end();
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting bookstore:', err);
  process.exit(1);
});
