/**
 * Type definitions for the JSON tree and its flat document representation
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/** Reserved names (single source of truth for runtime checks). */
export const ROOT_COLLECTION = '__root__';
export const RULES_COLLECTION = '__fm_rules__';
export const ROOT_SENTINEL = '__fm_root__';

export const RESERVED_COLLECTIONS = [ROOT_COLLECTION, RULES_COLLECTION] as const;

/**
 * Any record held by the store. `_id` is always the record key.
 */
export type StoreRecord = {
  _id: string;
  [field: string]: JsonValue;
};

/**
 * One entry of a keyed collection: `_fm_val` stored under `_fm_id`
 */
export type StoredDocument = {
  _id: string;
  _fm_id: string;
  _fm_val: JsonValue;
};

/**
 * Non-object value written directly at a collection (or at the database root)
 */
export type RootDocument = {
  _id: typeof ROOT_SENTINEL;
  __fm_root__: JsonValue;
};

export type WriteMode = 'replace' | 'merge';

export interface ServerConfig {
  port: number;
  host: string;
  bodyLimit?: string;
}
