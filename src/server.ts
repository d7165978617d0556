// =============================================================================
// STOCKROOM — Main Server
// Inventory & Employee Management API
// =============================================================================

import { config, assertJwtConfig } from './config';
import { createApp } from './app';
import { createPool } from './db/pool';
import { createLogger } from './logging';
import { PgRoleLookup } from './services/role-lookup';
import { TokenCodec } from './services/token-codec';
import { PgUserDirectory } from './services/user-directory';

const log = createLogger('Server');

function main(): void {
  assertJwtConfig(config.jwt, config.nodeEnv);

  const pool = createPool();
  const codec = new TokenCodec({
    accessSecret: config.jwt.accessSecret,
    refreshSecret: config.jwt.refreshSecret,
    accessTtlSeconds: config.jwt.accessTtlSeconds,
    refreshTtlSeconds: config.jwt.refreshTtlSeconds,
  });

  const app = createApp({
    codec,
    roleLookup: new PgRoleLookup(pool),
    users: new PgUserDirectory(pool),
    headers: {
      access: config.auth.accessHeader,
      refresh: config.auth.refreshHeader,
    },
    roleLookupTimeoutMs: config.auth.roleLookupTimeoutMs,
    loginRateLimit: config.rateLimit.authMax,
    nodeEnv: config.nodeEnv,
    pingDatabase: async () => {
      await pool.query('SELECT 1');
    },
  });

  const server = app.listen(config.port, () => {
    log.info(`Stockroom API listening on port ${config.port} (${config.nodeEnv})`);
    log.info(`Credential headers: ${config.auth.accessHeader}, ${config.auth.refreshHeader}`);
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    server.close((err) => {
      if (err) log.error('HTTP server close failed:', err.message);
      pool.end().then(
        () => process.exit(err ? 1 : 0),
        (poolErr: Error) => {
          log.error('Pool shutdown failed:', poolErr.message);
          process.exit(1);
        }
      );
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

try {
  main();
} catch (err) {
  log.error('Startup failed:', err instanceof Error ? err.message : err);
  process.exit(1);
}
