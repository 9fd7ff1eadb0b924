/**
 * Document mapper: a JSON value addressed by (collection, id, nested keys)
 * lives in one flat record `{ _id, _fm_id, _fm_val }`. Nested addressing is
 * done in-process on `_fm_val`, which is then written back whole.
 */

import { getLogger } from '../logger';
import { DocumentStore } from '../storage/types';
import { JsonValue, StoreRecord, StoredDocument, WriteMode } from '../types';
import { getIn, removeIn, setIn } from '../utils';
import { StorePlan, applyPlan } from './plan';

export function isStoredDocument(record: StoreRecord): record is StoredDocument {
  return typeof record._fm_id === 'string' && '_fm_val' in record;
}

export function toStoredDocument(id: string, value: JsonValue): StoredDocument {
  return { _id: id, _fm_id: id, _fm_val: value };
}

/**
 * (id, value) pairs of the ordinary documents among `records`
 */
export function toEntries(records: StoreRecord[]): [string, JsonValue][] {
  return records
    .filter(isStoredDocument)
    .map((record): [string, JsonValue] => [record._fm_id, record._fm_val]);
}

export class DocumentMapper {
  private readonly store: DocumentStore;
  private readonly logger = getLogger();

  constructor(store: DocumentStore) {
    this.store = store;
  }

  async load(
    collection: string,
    id: string,
  ): Promise<StoredDocument | undefined> {
    const record = await this.store.findByKey(collection, id);
    return record && isStoredDocument(record) ? record : undefined;
  }

  /**
   * Read the value at `nestedKeys` inside document `id`.
   * @returns The value, or undefined when the document or a key is missing
   */
  async read(
    collection: string,
    id: string,
    nestedKeys: readonly string[] = [],
  ): Promise<JsonValue | undefined> {
    const document = await this.load(collection, id);
    if (!document) {
      return undefined;
    }
    return getIn(document._fm_val, nestedKeys);
  }

  /**
   * Plan the write of `value` at `nestedKeys` inside document `id`.
   * `replace` discards siblings at the target; `merge` keeps keys of the
   * current object that the value does not mention.
   */
  async planWrite(
    collection: string,
    id: string,
    nestedKeys: readonly string[],
    value: JsonValue,
    mode: WriteMode,
  ): Promise<StorePlan> {
    const current = await this.load(collection, id);
    const next = setIn(current?._fm_val, nestedKeys, value, mode);
    this.logger.log(
      'store',
      `${mode} ${collection}/${id}${nestedKeys.length ? `:${nestedKeys.join('.')}` : ''}`,
    );
    if (next === undefined) {
      return current ? [{ type: 'delete', collection, key: id }] : [];
    }
    return [{ type: 'put', collection, record: toStoredDocument(id, next) }];
  }

  async write(
    collection: string,
    id: string,
    nestedKeys: readonly string[],
    value: JsonValue,
    mode: WriteMode,
  ): Promise<void> {
    await applyPlan(
      this.store,
      await this.planWrite(collection, id, nestedKeys, value, mode),
    );
  }

  /**
   * Plan the removal of the value at `nestedKeys` (the whole document when
   * empty). Removing an absent value plans nothing.
   */
  async planRemove(
    collection: string,
    id: string,
    nestedKeys: readonly string[],
  ): Promise<StorePlan> {
    const current = await this.load(collection, id);
    if (!current) {
      return [];
    }
    if (nestedKeys.length === 0) {
      return [{ type: 'delete', collection, key: id }];
    }
    const { value, removed } = removeIn(current._fm_val, nestedKeys);
    if (!removed || value === undefined) {
      return [];
    }
    return [{ type: 'put', collection, record: toStoredDocument(id, value) }];
  }

  async remove(
    collection: string,
    id: string,
    nestedKeys: readonly string[],
  ): Promise<void> {
    await applyPlan(this.store, await this.planRemove(collection, id, nestedKeys));
  }
}
