#!/usr/bin/env node
import 'dotenv/config';
import type { Server } from 'http';
import { ConfigManager } from './config/manager.js';
import { createCoreContext } from './context.js';
import { createApp, startHTTPServer } from './http/app.js';
import {
  createPool,
  PostgresAccountRepository,
  PostgresVideoRepository,
} from './persistence/index.js';

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Start the API server.
 *
 * Configuration comes from CONFIG_PATH (default ./config/reelhub.json);
 * secrets from SECRETS_PATH files or the environment.
 */
async function main(): Promise<void> {
  const manager = new ConfigManager();
  const config = await manager.loadConfig();

  const pool = createPool(config.database);
  const context = createCoreContext(config, {
    repositories: {
      accounts: new PostgresAccountRepository(pool),
      videos: new PostgresVideoRepository(pool),
    },
  });

  const app = createApp(context);
  const port = manager.getEnvironment().SERVER_PORT ?? config.server.port;

  console.log('Starting reelhub API...');
  console.log(`Port: ${port}`);
  console.log(`Public URL: ${config.server.publicUrl}`);

  const server = await startHTTPServer(app, port);

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    console.log(`\n[HTTP Server] ${signal} received, shutting down...`);
    await closeServer(server);
    await context.federation.whenIdle();
    await pool.end();
    console.log('[HTTP Server] Stopped');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('Shutdown failed:', error);
          process.exit(1);
        }
      );
    });
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
