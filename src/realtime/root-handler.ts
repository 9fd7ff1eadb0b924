/**
 * Root handler: non-object values written directly at a collection (the
 * `__fm_root__` record) or at the database root (the `__root__` collection),
 * and the exclusion rules between those and ordinary documents.
 */

import { getLogger } from '../logger';
import { DocumentStore, StoreOperation } from '../storage/types';
import {
  JsonValue,
  RESERVED_COLLECTIONS,
  ROOT_COLLECTION,
  ROOT_SENTINEL,
  RootDocument,
  StoreRecord,
  WriteMode,
} from '../types';
import { isJsonObject, stripNulls } from '../utils';
import { toEntries, toStoredDocument } from './document-mapper';
import { RootConflictError } from './errors';
import { StorePlan, applyPlan } from './plan';

/**
 * What a collection currently holds, checked before every write
 */
export type CollectionState =
  | { kind: 'absent' }
  | { kind: 'root'; value: JsonValue }
  | { kind: 'keyed'; count: number };

/**
 * Full contents of a collection, as read
 */
export type CollectionContents =
  | { kind: 'absent' }
  | { kind: 'root'; value: JsonValue }
  | { kind: 'keyed'; entries: [string, JsonValue][] };

export interface CollectionWriteOptions {
  mode: WriteMode;
  /** Allow a non-object value to replace the documents of a keyed collection */
  promote?: boolean;
}

export function isRootForm(record: StoreRecord): record is RootDocument {
  return record._id === ROOT_SENTINEL && ROOT_SENTINEL in record;
}

export function unwrapRoot(record: RootDocument): JsonValue {
  return record.__fm_root__;
}

export function toRootDocument(value: JsonValue): RootDocument {
  return { _id: ROOT_SENTINEL, __fm_root__: value };
}

/**
 * Collections that hold tree data (everything but the reserved ones)
 */
function isDataCollection(name: string): boolean {
  return !RESERVED_COLLECTIONS.some((reserved) => reserved === name);
}

/**
 * JSON value of collection contents; undefined when absent
 */
export function contentsToValue(
  contents: CollectionContents,
): JsonValue | undefined {
  switch (contents.kind) {
    case 'absent':
      return undefined;
    case 'root':
      return contents.value;
    case 'keyed':
      return Object.fromEntries(contents.entries);
  }
}

export class RootHandler {
  private readonly store: DocumentStore;
  private readonly logger = getLogger();

  constructor(store: DocumentStore) {
    this.store = store;
  }

  async collectionState(collection: string): Promise<CollectionState> {
    if (!(await this.store.collectionExists(collection))) {
      return { kind: 'absent' };
    }
    const root = await this.store.findByKey(collection, ROOT_SENTINEL);
    if (root && isRootForm(root)) {
      return { kind: 'root', value: unwrapRoot(root) };
    }
    return { kind: 'keyed', count: await this.store.countRecords(collection) };
  }

  async readCollection(collection: string): Promise<CollectionContents> {
    if (!(await this.store.collectionExists(collection))) {
      return { kind: 'absent' };
    }
    const records = await this.store.findAll(collection);
    const root = records.find(isRootForm);
    if (root) {
      return { kind: 'root', value: unwrapRoot(root) };
    }
    return { kind: 'keyed', entries: toEntries(records) };
  }

  async hasDatabaseRoot(): Promise<boolean> {
    return this.store.collectionExists(ROOT_COLLECTION);
  }

  async listDataCollections(): Promise<string[]> {
    const names = await this.store.listCollections();
    return names.filter(isDataCollection).sort();
  }

  /**
   * Contents of the whole database: the `__root__` value when present,
   * otherwise one entry per data collection.
   */
  async readDatabase(): Promise<CollectionContents> {
    if (await this.hasDatabaseRoot()) {
      return this.readCollection(ROOT_COLLECTION);
    }
    const entries: [string, JsonValue][] = [];
    for (const name of await this.listDataCollections()) {
      const value = contentsToValue(await this.readCollection(name));
      if (value !== undefined) {
        entries.push([name, value]);
      }
    }
    return entries.length > 0 ? { kind: 'keyed', entries } : { kind: 'absent' };
  }

  private async dropDatabaseRootStep(): Promise<StorePlan> {
    return (await this.hasDatabaseRoot())
      ? [{ type: 'drop', collection: ROOT_COLLECTION }]
      : [];
  }

  /**
   * Steps that must precede an ordinary document write into `collection`:
   * drop `__root__`, and drop the collection's own root value.
   */
  async prepareOrdinaryWrite(collection: string): Promise<StorePlan> {
    const plan = await this.dropDatabaseRootStep();
    const state = await this.collectionState(collection);
    if (state.kind === 'root') {
      plan.push({ type: 'delete', collection, key: ROOT_SENTINEL });
    }
    return plan;
  }

  /**
   * Plan a write of `value` at the root of `collection`.
   * An object is a map of id to value and always wins over a root value;
   * anything else becomes the collection's root value, which requires
   * `promote` when the collection holds documents.
   */
  async planCollectionWrite(
    collection: string,
    value: JsonValue,
    options: CollectionWriteOptions,
  ): Promise<StorePlan> {
    const plan = await this.dropDatabaseRootStep();
    const state = await this.collectionState(collection);

    if (value === null) {
      if (state.kind !== 'absent') {
        plan.push({ type: 'drop', collection });
      }
      return plan;
    }

    if (isJsonObject(value)) {
      if (options.mode === 'replace') {
        plan.push({ type: 'clear', collection });
      } else if (state.kind === 'root') {
        plan.push({ type: 'delete', collection, key: ROOT_SENTINEL });
      }
      plan.push({ type: 'create', collection });
      for (const [id, child] of Object.entries(value)) {
        const stripped = stripNulls(child);
        if (stripped !== undefined) {
          plan.push({
            type: 'put',
            collection,
            record: toStoredDocument(id, stripped),
          });
        } else if (options.mode === 'merge') {
          plan.push({ type: 'delete', collection, key: id });
        }
      }
      return plan;
    }

    if (state.kind === 'keyed' && state.count > 0) {
      if (!options.promote) {
        throw new RootConflictError(collection);
      }
      this.logger.warn(
        'server',
        `Promoting "${collection}" to a root value: deleting ${state.count} documents`,
      );
      plan.push({ type: 'clear', collection });
    }
    plan.push({ type: 'put', collection, record: toRootDocument(value) });
    return plan;
  }

  async writeAtCollectionRoot(
    collection: string,
    value: JsonValue,
    options: CollectionWriteOptions,
  ): Promise<void> {
    await applyPlan(
      this.store,
      await this.planCollectionWrite(collection, value, options),
    );
  }

  /**
   * Plan a write at the database root: every data collection is dropped, then
   * the value goes into `__root__` (pairs of an object as documents, anything
   * else as its root value). Rules are kept.
   */
  async planDatabaseWrite(value: JsonValue, mode: WriteMode): Promise<StorePlan> {
    const plan: StorePlan = (await this.listDataCollections()).map(
      (collection): StoreOperation => ({ type: 'drop', collection }),
    );

    if (value === null) {
      plan.push(...(await this.dropDatabaseRootStep()));
      return plan;
    }

    if (isJsonObject(value)) {
      if (mode === 'replace') {
        plan.push({ type: 'clear', collection: ROOT_COLLECTION });
      } else {
        plan.push({
          type: 'delete',
          collection: ROOT_COLLECTION,
          key: ROOT_SENTINEL,
        });
      }
      plan.push({ type: 'create', collection: ROOT_COLLECTION });
      for (const [key, child] of Object.entries(value)) {
        const stripped = stripNulls(child);
        if (stripped !== undefined) {
          plan.push({
            type: 'put',
            collection: ROOT_COLLECTION,
            record: toStoredDocument(key, stripped),
          });
        } else if (mode === 'merge') {
          plan.push({ type: 'delete', collection: ROOT_COLLECTION, key });
        }
      }
      return plan;
    }

    plan.push(
      { type: 'clear', collection: ROOT_COLLECTION },
      { type: 'put', collection: ROOT_COLLECTION, record: toRootDocument(value) },
    );
    return plan;
  }

  async writeAtDatabaseRoot(value: JsonValue, mode: WriteMode): Promise<void> {
    await applyPlan(this.store, await this.planDatabaseWrite(value, mode));
  }

  /**
   * Plan the removal of everything but the rules
   */
  async planDatabaseRemove(): Promise<StorePlan> {
    const plan: StorePlan = (await this.listDataCollections()).map(
      (collection): StoreOperation => ({ type: 'drop', collection }),
    );
    plan.push(...(await this.dropDatabaseRootStep()));
    return plan;
  }
}
