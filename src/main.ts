#!/usr/bin/env node
/**
 * Command line entry point: configuration from the environment (and `.env`)
 */

import { loadEnvConfig } from './config';
import { realtimeEmulator } from './index';
import { getLogger } from './logger';

async function main(): Promise<void> {
  const logger = getLogger();
  const server = await realtimeEmulator.startServer(loadEnvConfig());

  const shutdown = (signal: string): void => {
    logger.info('server', `${signal} received, shutting down`);
    realtimeEmulator.stopServer().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error(
          'error',
          `Shutdown failed: ${error instanceof Error ? error.message : String(error)}`,
        );
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  logger.info('setup', `Serving on ${server.getUrl()}`);
}

main().catch((error: unknown) => {
  getLogger().error(
    'error',
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
