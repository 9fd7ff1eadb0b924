/**
 * MongoDB document store: one MongoDB collection per tree collection, one
 * MongoDB document per record, keyed by `_id`.
 */

import {
  ClientSession,
  Collection,
  Db,
  MongoClient,
  MongoNetworkError,
  MongoServerSelectionError,
} from 'mongodb';
import { getLogger } from '../logger';
import { StoreRecord } from '../types';
import { withRetry } from './retry';
import { StoreUnavailableError } from '../realtime/errors';
import {
  DocumentStore,
  StoreOperation,
  StoreWriter,
  describeOperation,
} from './types';

export interface MongoStoreOptions {
  databaseName: string;
  useTransactions: boolean;
  retryBackoffMs: number;
}

/**
 * Connection loss and server selection timeouts are worth one more attempt
 */
export function isTransientMongoError(error: unknown): boolean {
  return (
    error instanceof MongoNetworkError ||
    error instanceof MongoServerSelectionError
  );
}

/**
 * Writer used inside a transaction. MongoDB cannot drop a collection in a
 * transaction, so a drop empties it there and is remembered; the collections
 * still pending once the work is done are dropped after commit.
 */
export class DeferredDropWriter implements StoreWriter {
  private readonly inner: StoreWriter;
  private readonly pending = new Set<string>();

  constructor(inner: StoreWriter) {
    this.inner = inner;
  }

  async apply(operation: StoreOperation): Promise<void> {
    if (operation.type === 'drop') {
      await this.inner.apply({ type: 'clear', collection: operation.collection });
      this.pending.add(operation.collection);
      return;
    }
    // a later write keeps the collection
    if (operation.type === 'put' || operation.type === 'create') {
      this.pending.delete(operation.collection);
    }
    await this.inner.apply(operation);
  }

  pendingDrops(): string[] {
    return [...this.pending];
  }
}

export class MongoDocumentStore implements DocumentStore {
  readonly supportsTransactions: boolean;
  private readonly client: MongoClient;
  private readonly db: Db;
  private readonly options: MongoStoreOptions;
  private readonly logger = getLogger();

  constructor(client: MongoClient, options: MongoStoreOptions) {
    this.client = client;
    this.options = options;
    this.db = client.db(options.databaseName);
    this.supportsTransactions = options.useTransactions;
  }

  /**
   * Connect a new client and wrap it
   */
  static async connect(
    uri: string,
    options: MongoStoreOptions,
  ): Promise<MongoDocumentStore> {
    const client = new MongoClient(uri);
    await client.connect();
    getLogger().info(
      'setup',
      `Connected to MongoDB database "${options.databaseName}"`,
    );
    return new MongoDocumentStore(client, options);
  }

  private collection(name: string): Collection<StoreRecord> {
    return this.db.collection<StoreRecord>(name);
  }

  private retry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(operation, fn, {
      backoffMs: this.options.retryBackoffMs,
      isTransient: isTransientMongoError,
      onRetry: (error) => {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          'store',
          `mongodb: ${operation} failed transiently (${reason}), retrying once`,
        );
      },
    });
  }

  async listCollections(): Promise<string[]> {
    return this.retry('listCollections', async () => {
      const infos = await this.db
        .listCollections({}, { nameOnly: true })
        .toArray();
      return infos.map((info) => info.name);
    });
  }

  async collectionExists(collection: string): Promise<boolean> {
    return this.retry(`collectionExists ${collection}`, async () => {
      const infos = await this.db
        .listCollections({ name: collection }, { nameOnly: true })
        .toArray();
      return infos.length > 0;
    });
  }

  async findAll(collection: string): Promise<StoreRecord[]> {
    return this.retry(`find ${collection}`, () =>
      this.collection(collection).find({}).toArray(),
    );
  }

  async findByKey(collection: string, key: string): Promise<StoreRecord | null> {
    return this.retry(`findOne ${collection}/${key}`, () =>
      this.collection(collection).findOne({ _id: key }),
    );
  }

  async countRecords(collection: string): Promise<number> {
    return this.retry(`count ${collection}`, () =>
      this.collection(collection).countDocuments({}),
    );
  }

  async ensureIndex(collection: string, childPath: string): Promise<void> {
    // createIndex would create the collection, which is then visible as data
    if (!(await this.collectionExists(collection))) {
      this.logger.log('store', `mongodb: no index on missing ${collection}`);
      return;
    }
    const field = childPath
      ? `_fm_val.${childPath.split('/').join('.')}`
      : '_fm_val';
    await this.retry(`createIndex ${collection}.${field}`, () =>
      this.collection(collection).createIndex({ [field]: 1 }),
    );
    this.logger.log('store', `mongodb: index ${collection}.${field} ensured`);
  }

  async apply(operation: StoreOperation): Promise<void> {
    await this.retry(describeOperation(operation), () =>
      this.applyInSession(operation),
    );
  }

  private async applyInSession(
    operation: StoreOperation,
    session?: ClientSession,
  ): Promise<void> {
    this.logger.log('store', `mongodb: ${describeOperation(operation)}`);
    switch (operation.type) {
      case 'put': {
        const { _id, ...body } = operation.record;
        await this.collection(operation.collection).replaceOne(
          { _id },
          body,
          { upsert: true, session },
        );
        return;
      }
      case 'delete':
        await this.collection(operation.collection).deleteOne(
          { _id: operation.key },
          { session },
        );
        return;
      case 'clear':
        await this.collection(operation.collection).deleteMany({}, { session });
        return;
      case 'drop':
        if (await this.collectionExists(operation.collection)) {
          await this.db.dropCollection(operation.collection, { session });
        }
        return;
      case 'create':
        if (!(await this.collectionExists(operation.collection))) {
          await this.db.createCollection(operation.collection, { session });
        }
        return;
    }
  }

  /**
   * Run `work` in a MongoDB transaction. Operations inside are not retried
   * individually; withTransaction already retries transient transaction errors.
   * Dropped collections are emptied in the transaction and dropped after commit.
   */
  async transaction(work: (writer: StoreWriter) => Promise<void>): Promise<void> {
    if (!this.supportsTransactions) {
      throw new Error('Transactions are disabled for this MongoDB store');
    }
    const session = this.client.startSession();
    let drops: string[] = [];
    try {
      await session.withTransaction(async () => {
        // withTransaction may run this again, so start each attempt afresh
        const writer = new DeferredDropWriter({
          apply: (operation) => this.applyInSession(operation, session),
        });
        await work(writer);
        drops = writer.pendingDrops();
      });
    } catch (error: unknown) {
      if (isTransientMongoError(error)) {
        throw new StoreUnavailableError('transaction', error);
      }
      throw error;
    } finally {
      await session.endSession();
    }
    for (const collection of drops) {
      // a concurrent writer may have filled it again since the commit
      if ((await this.countRecords(collection)) === 0) {
        await this.apply({ type: 'drop', collection });
      }
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
