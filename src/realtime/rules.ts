/**
 * Rules/index manager: `.indexOn` declarations kept in the reserved
 * `__fm_rules__` collection, one record per rules path.
 */

import { getLogger } from '../logger';
import { DocumentStore } from '../storage/types';
import {
  JsonObject,
  JsonValue,
  ROOT_COLLECTION,
  RULES_COLLECTION,
  StoreRecord,
} from '../types';
import { isJsonObject } from '../utils';
import { InvalidIndexError } from './errors';

/**
 * Either the child fields queries may order by, or ordering by the value itself
 */
export type IndexSpec = { fieldNames: string[] } | { byValue: true };

export const INDEX_ON = '.indexOn';
export const VALUE_INDEX = '.value';

const FORBIDDEN_FIELD_CHARS = /[.$#[\]\u0000-\u001f\u007f]/;

export type RulesRecord = {
  _id: string;
  path: string;
  indexOn: IndexSpec;
};

function validateFieldName(field: JsonValue): string {
  if (typeof field !== 'string' || field.length === 0) {
    throw new InvalidIndexError(
      `Index fields must be non-empty strings, got ${JSON.stringify(field)}`,
    );
  }
  const segments = field.split('/');
  if (segments.some((s) => s === '' || FORBIDDEN_FIELD_CHARS.test(s))) {
    throw new InvalidIndexError(`Invalid index field "${field}"`);
  }
  return field;
}

function fromFieldList(fields: JsonValue[]): IndexSpec {
  if (fields.length === 0) {
    throw new InvalidIndexError(`${INDEX_ON} must name at least one field`);
  }
  if (fields.includes(VALUE_INDEX)) {
    if (fields.length > 1) {
      throw new InvalidIndexError(
        `${INDEX_ON} cannot combine "${VALUE_INDEX}" with child fields`,
      );
    }
    return { byValue: true };
  }
  // Ordered set: keep the first occurrence of every field
  return { fieldNames: Array.from(new Set(fields.map(validateFieldName))) };
}

/**
 * Validate an index spec given either as `{ fieldNames: [...] }` /
 * `{ byValue: true }` or in rules form `{ ".indexOn": "height" | [...] | ".value" }`.
 * @throws InvalidIndexError when the index spec is malformed
 * @example
 * parseIndexSpec({ '.indexOn': ['height', 'weight'] }) // { fieldNames: ['height', 'weight'] }
 * parseIndexSpec({ '.indexOn': '.value' }) // { byValue: true }
 */
export function parseIndexSpec(body: JsonValue | undefined): IndexSpec {
  if (!isJsonObject(body)) {
    throw new InvalidIndexError('Index rules must be a JSON object');
  }
  const keys = Object.keys(body);

  if (keys.length === 1 && keys[0] === 'byValue') {
    if (body.byValue !== true) {
      throw new InvalidIndexError('byValue must be true');
    }
    return { byValue: true };
  }
  if (keys.length === 1 && keys[0] === 'fieldNames') {
    const fieldNames = body.fieldNames;
    if (!Array.isArray(fieldNames)) {
      throw new InvalidIndexError('fieldNames must be an array');
    }
    if (fieldNames.includes(VALUE_INDEX)) {
      throw new InvalidIndexError(`"${VALUE_INDEX}" is not a field name`);
    }
    return fromFieldList(fieldNames);
  }
  if (keys.length === 1 && keys[0] === INDEX_ON) {
    const indexOn = body[INDEX_ON];
    if (typeof indexOn === 'string') {
      return fromFieldList([indexOn]);
    }
    if (Array.isArray(indexOn)) {
      return fromFieldList(indexOn);
    }
    throw new InvalidIndexError(
      `${INDEX_ON} must be a field name, a list of field names or "${VALUE_INDEX}"`,
    );
  }

  throw new InvalidIndexError(
    `Unsupported rules ${JSON.stringify(keys)}: only "${INDEX_ON}" is supported`,
  );
}

/**
 * Rules form of an index spec, as served back to clients
 */
export function toRulesBody(spec: IndexSpec): JsonObject {
  return {
    [INDEX_ON]: 'byValue' in spec ? VALUE_INDEX : [...spec.fieldNames],
  };
}

function toIndexSpec(record: StoreRecord): IndexSpec | undefined {
  try {
    return parseIndexSpec(record.indexOn);
  } catch {
    return undefined;
  }
}

export class RulesManager {
  private readonly store: DocumentStore;
  private readonly logger = getLogger();

  constructor(store: DocumentStore) {
    this.store = store;
  }

  /**
   * Declare the index of a rules path (a collection name, a deeper
   * slash-joined path, or `__root__` for the database root).
   */
  async setRules(path: string, spec: IndexSpec): Promise<IndexSpec> {
    const validated = parseIndexSpec(spec);
    const record: RulesRecord = { _id: path, path, indexOn: validated };
    await this.store.apply({ type: 'put', collection: RULES_COLLECTION, record });
    this.logger.info('rules', `Set ${INDEX_ON} for "${path}": ${JSON.stringify(toRulesBody(validated))}`);

    // Only a collection's direct children are records the store can index
    if (!path.includes('/') && path !== ROOT_COLLECTION) {
      const childPaths = 'byValue' in validated ? [''] : validated.fieldNames;
      for (const childPath of childPaths) {
        await this.store.ensureIndex(path, childPath);
      }
    }
    return validated;
  }

  async getIndexFor(path: string): Promise<IndexSpec | undefined> {
    const record = await this.store.findByKey(RULES_COLLECTION, path);
    if (!record) {
      return undefined;
    }
    const spec = toIndexSpec(record);
    if (!spec) {
      this.logger.warn('rules', `Ignoring malformed rules record for "${path}"`);
    }
    return spec;
  }

  async deleteRules(path: string): Promise<boolean> {
    const record = await this.store.findByKey(RULES_COLLECTION, path);
    if (!record) {
      return false;
    }
    await this.store.apply({ type: 'delete', collection: RULES_COLLECTION, key: path });
    this.logger.info('rules', `Deleted ${INDEX_ON} for "${path}"`);
    return true;
  }

  async listRules(): Promise<[string, IndexSpec][]> {
    const rules: [string, IndexSpec][] = [];
    for (const record of await this.store.findAll(RULES_COLLECTION)) {
      const spec = toIndexSpec(record);
      if (spec) {
        rules.push([record._id, spec]);
      }
    }
    return rules.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }
}
