/**
 * In-memory document store
 */

import { getLogger } from '../logger';
import { StoreRecord } from '../types';
import {
  DocumentStore,
  StoreOperation,
  StoreWriter,
  describeOperation,
} from './types';

type MemoryCollection = Map<string, StoreRecord>;

export interface MemoryStoreOptions {
  /**
   * When false, transaction() is refused and multi-step plans run step by step
   * (the same shape as a MongoDB deployment without replica set).
   */
  transactions?: boolean;
}

export class MemoryDocumentStore implements DocumentStore {
  readonly supportsTransactions: boolean;
  private collections = new Map<string, MemoryCollection>();
  private readonly indexes = new Map<string, Set<string>>();
  private readonly logger = getLogger();

  constructor(options: MemoryStoreOptions = {}) {
    this.supportsTransactions = options.transactions ?? true;
  }

  /**
   * Get an existing collection
   */
  private getCollection(collection: string): MemoryCollection | undefined {
    return this.collections.get(collection);
  }

  /**
   * Get or create a collection
   */
  private ensureCollection(collection: string): MemoryCollection {
    let records = this.collections.get(collection);
    if (!records) {
      records = new Map();
      this.collections.set(collection, records);
    }
    return records;
  }

  async listCollections(): Promise<string[]> {
    return Array.from(this.collections.keys());
  }

  async collectionExists(collection: string): Promise<boolean> {
    return this.collections.has(collection);
  }

  async findAll(collection: string): Promise<StoreRecord[]> {
    const records = this.getCollection(collection);
    return records
      ? Array.from(records.values(), (record) => structuredClone(record))
      : [];
  }

  async findByKey(collection: string, key: string): Promise<StoreRecord | null> {
    const record = this.getCollection(collection)?.get(key);
    return record ? structuredClone(record) : null;
  }

  async countRecords(collection: string): Promise<number> {
    return this.getCollection(collection)?.size ?? 0;
  }

  async ensureIndex(collection: string, childPath: string): Promise<void> {
    let paths = this.indexes.get(collection);
    if (!paths) {
      paths = new Set();
      this.indexes.set(collection, paths);
    }
    paths.add(childPath);
  }

  /**
   * Child paths indexed through ensureIndex (kept across drops, like rules)
   */
  listIndexes(collection: string): string[] {
    return Array.from(this.indexes.get(collection) ?? []);
  }

  async apply(operation: StoreOperation): Promise<void> {
    this.logger.log('store', `memory: ${describeOperation(operation)}`);
    switch (operation.type) {
      case 'put':
        this.ensureCollection(operation.collection).set(
          operation.record._id,
          structuredClone(operation.record),
        );
        return;
      case 'delete':
        this.getCollection(operation.collection)?.delete(operation.key);
        return;
      case 'clear':
        this.getCollection(operation.collection)?.clear();
        return;
      case 'drop':
        this.collections.delete(operation.collection);
        return;
      case 'create':
        this.ensureCollection(operation.collection);
        return;
    }
  }

  /**
   * Run `work` against this store and restore the previous contents if it
   * fails. Writes of concurrent callers made during the work are not isolated.
   */
  async transaction(work: (writer: StoreWriter) => Promise<void>): Promise<void> {
    if (!this.supportsTransactions) {
      throw new Error('Transactions are disabled for this memory store');
    }
    const snapshot = structuredClone(this.collections);
    try {
      await work(this);
    } catch (error: unknown) {
      this.collections = snapshot;
      throw error;
    }
  }

  async close(): Promise<void> {
    this.clear();
  }

  /**
   * Clear all data (useful for testing)
   */
  clear(): void {
    this.collections.clear();
  }
}
