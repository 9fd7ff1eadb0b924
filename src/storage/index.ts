/**
 * Document stores the tree is mapped onto
 */

import { StorageConfig } from '../config';
import { MemoryDocumentStore } from './memory';
import { MongoDocumentStore } from './mongo';
import { DocumentStore } from './types';

export { MemoryDocumentStore } from './memory';
export type { MemoryStoreOptions } from './memory';
export {
  DeferredDropWriter,
  MongoDocumentStore,
  isTransientMongoError,
} from './mongo';
export type { MongoStoreOptions } from './mongo';
export { withRetry } from './retry';
export type { RetryOptions } from './retry';
export type { DocumentStore, StoreOperation, StoreWriter } from './types';

/**
 * Create the store selected by the storage configuration
 */
export async function createStore(
  storage: StorageConfig,
): Promise<DocumentStore> {
  if (storage.driver === 'mongodb') {
    return MongoDocumentStore.connect(storage.uri, {
      databaseName: storage.databaseName,
      useTransactions: storage.useTransactions,
      retryBackoffMs: storage.retryBackoffMs,
    });
  }
  return new MemoryDocumentStore();
}
