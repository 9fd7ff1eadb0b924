/**
 * Realtime database: a JSON tree served over REST and stored as flat
 * collections of documents.
 */

export { RealtimeDatabase } from './database';
export type { RealtimeDatabaseOptions, WriteOptions } from './database';
export { RealtimeServer } from './server';
export type { RealtimeServerConfig } from './server';
export { QueryResult } from './query';
export type { QueryEntry, QueryOptions } from './query';
export type { IndexSpec } from './rules';
export * from './errors';
