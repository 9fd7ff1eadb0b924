/**
 * Main entry point for the realtime database emulator
 */

import { Configuration, config } from './config';
import { RealtimeDatabase, RealtimeServer } from './realtime';
import { createStore } from './storage';

let lastServer: RealtimeServer | null = null;

/**
 * Main realtimeEmulator object with factory methods
 */
export const realtimeEmulator = {
  /**
   * Merge settings into the shared configuration
   */
  addConfig: (patch?: Configuration): void => {
    config.addConfig(patch);
  },

  /**
   * Open a database over the configured store (in memory unless
   * `storage.driver` is "mongodb")
   */
  createDatabase: async (patch?: Configuration): Promise<RealtimeDatabase> => {
    config.addConfig(patch);
    const store = await createStore(config.getStorageConfig());
    return new RealtimeDatabase(store);
  },

  /**
   * Start the REST server over a new database
   * @param patch - Optional configuration, merged before the server starts
   * @returns The started server (database.close() and stop() to shut down)
   */
  startServer: async (patch?: Configuration): Promise<RealtimeServer> => {
    const database = await realtimeEmulator.createDatabase(patch);
    const server = new RealtimeServer(database, config.getServerConfig());
    await server.start();
    lastServer = server;
    return server;
  },

  /**
   * Stop the last started server and close its store
   */
  stopServer: async (): Promise<void> => {
    if (lastServer) {
      const server = lastServer;
      lastServer = null;
      await server.stop();
      await server.database.close();
    }
  },
};

export * from './realtime';
export {
  MemoryDocumentStore,
  MongoDocumentStore,
  createStore,
} from './storage';
export type { DocumentStore, StoreOperation } from './storage';
export { config, loadEnvConfig } from './config';
export type { Configuration } from './config';
export * from './types';
