/**
 * Contract of the flat, collection-oriented document store the tree is mapped onto
 */

import { StoreRecord } from '../types';

/**
 * Primitive, idempotent store mutations. Multi-document operations are
 * expressed as an ordered list of these.
 */
export type StoreOperation =
  | { type: 'put'; collection: string; record: StoreRecord }
  | { type: 'delete'; collection: string; key: string }
  | { type: 'clear'; collection: string }
  | { type: 'drop'; collection: string }
  | { type: 'create'; collection: string };

export interface StoreWriter {
  apply(operation: StoreOperation): Promise<void>;
}

export interface DocumentStore extends StoreWriter {
  /** Whether transaction() applies its work atomically */
  readonly supportsTransactions: boolean;

  listCollections(): Promise<string[]>;
  collectionExists(collection: string): Promise<boolean>;
  findAll(collection: string): Promise<StoreRecord[]>;
  findByKey(collection: string, key: string): Promise<StoreRecord | null>;
  countRecords(collection: string): Promise<number>;

  /** Create a secondary index on a child path of `_fm_val` */
  ensureIndex(collection: string, childPath: string): Promise<void>;

  transaction(work: (writer: StoreWriter) => Promise<void>): Promise<void>;
  close(): Promise<void>;
}

export function describeOperation(operation: StoreOperation): string {
  switch (operation.type) {
    case 'put':
      return `put ${operation.collection}/${operation.record._id}`;
    case 'delete':
      return `delete ${operation.collection}/${operation.key}`;
    default:
      return `${operation.type} ${operation.collection}`;
  }
}
