/**
 * CRUD orchestrator: resolves a path, picks the Root Handler or the Document
 * Mapper for it, and runs queries over the result.
 */

import { getLogger } from '../logger';
import { DocumentStore } from '../storage/types';
import {
  JsonObject,
  JsonValue,
  ROOT_COLLECTION,
  ROOT_SENTINEL,
  WriteMode,
} from '../types';
import { generatePushId, getIn, isJsonObject } from '../utils';
import { DocumentMapper } from './document-mapper';
import { InvalidPayloadError, ReservedNameError } from './errors';
import {
  ResolvedPath,
  assertStorableValue,
  childPath,
  resolvePath,
  rulesPathOf,
} from './path';
import { StorePlan, applyPlan } from './plan';
import {
  QueryEngine,
  QueryEntry,
  QueryOptions,
  QueryResult,
  hasQuery,
} from './query';
import { RootHandler, contentsToValue } from './root-handler';
import { RulesManager, parseIndexSpec, toRulesBody } from './rules';

export interface WriteOptions {
  /** Let a non-object value displace the documents of a collection */
  promote?: boolean;
}

export interface RealtimeDatabaseOptions {
  /** Overrides the `rules.strictIndexes` setting */
  strictIndexes?: boolean;
}

function childEntries(value: JsonValue | undefined): QueryEntry[] {
  if (Array.isArray(value)) {
    return value.map((item, i): QueryEntry => [String(i), item]);
  }
  return isJsonObject(value) ? Object.entries(value) : [];
}

function describePath(resolved: ResolvedPath): string {
  return `/${resolved.segments.join('/')}`;
}

export class RealtimeDatabase {
  readonly store: DocumentStore;
  private readonly mapper: DocumentMapper;
  private readonly roots: RootHandler;
  private readonly rules: RulesManager;
  private readonly queries: QueryEngine;
  private readonly logger = getLogger();

  constructor(store: DocumentStore, options: RealtimeDatabaseOptions = {}) {
    this.store = store;
    this.mapper = new DocumentMapper(store);
    this.roots = new RootHandler(store);
    this.rules = new RulesManager(store);
    this.queries = new QueryEngine(this.rules, {
      strictIndexes: options.strictIndexes,
    });
  }

  private async read(resolved: ResolvedPath): Promise<JsonValue | undefined> {
    // While the database root holds a value, every path is read inside it
    if (await this.roots.hasDatabaseRoot()) {
      const root = contentsToValue(
        await this.roots.readCollection(ROOT_COLLECTION),
      );
      return getIn(root, resolved.segments);
    }
    switch (resolved.kind) {
      case 'database-root':
        return contentsToValue(await this.roots.readDatabase());
      case 'collection-root':
        return contentsToValue(
          await this.roots.readCollection(resolved.collection),
        );
      default:
        return this.mapper.read(
          resolved.collection,
          resolved.documentId,
          resolved.nestedKeys,
        );
    }
  }

  /**
   * Read the value at `path`, ordered, filtered and limited when query
   * parameters are given.
   * @returns The value, or undefined when nothing is stored there
   */
  async get(
    path: string,
    options: QueryOptions = {},
  ): Promise<JsonValue | undefined> {
    const resolved = resolvePath(path);
    if (!hasQuery(options)) {
      return this.read(resolved);
    }

    const value = await this.read(resolved);
    const result = await this.queries.queryEntries(
      rulesPathOf(resolved),
      async () => childEntries(value),
      options,
    );
    // A value without children is answered as is
    if (!isJsonObject(value) && !Array.isArray(value)) {
      return value;
    }
    return result.toObject();
  }

  /**
   * Lazy query over the children of `path`; each iteration reads the store again
   */
  async query(path: string, options: QueryOptions): Promise<QueryResult> {
    const resolved = resolvePath(path);
    const scan = async (): Promise<QueryEntry[]> =>
      childEntries(await this.read(resolved));
    if (resolved.kind === 'collection-root') {
      return this.queries.query(resolved.collection, scan, options);
    }
    return this.queries.queryEntries(rulesPathOf(resolved), scan, options);
  }

  private async planWrite(
    resolved: ResolvedPath,
    value: JsonValue,
    mode: WriteMode,
    options: WriteOptions,
  ): Promise<StorePlan> {
    assertStorableValue(value);
    switch (resolved.kind) {
      case 'database-root':
        if (isJsonObject(value) && ROOT_SENTINEL in value) {
          throw new ReservedNameError(ROOT_SENTINEL);
        }
        return this.roots.planDatabaseWrite(value, mode);
      case 'collection-root':
        if (isJsonObject(value) && ROOT_SENTINEL in value) {
          throw new ReservedNameError(ROOT_SENTINEL);
        }
        return this.roots.planCollectionWrite(resolved.collection, value, {
          mode,
          promote: options.promote,
        });
      default: {
        const documentPlan = await this.mapper.planWrite(
          resolved.collection,
          resolved.documentId,
          resolved.nestedKeys,
          value,
          mode,
        );
        if (documentPlan.length === 0) {
          return documentPlan;
        }
        return [
          ...(await this.roots.prepareOrdinaryWrite(resolved.collection)),
          ...documentPlan,
        ];
      }
    }
  }

  private async write(
    path: string,
    value: JsonValue,
    mode: WriteMode,
    options: WriteOptions,
  ): Promise<void> {
    const resolved = resolvePath(path);
    const plan = await this.planWrite(resolved, value, mode, options);
    this.logger.debug(
      'server',
      `${mode} ${describePath(resolved)} (${plan.length} store operations)`,
    );
    await applyPlan(this.store, plan);
  }

  /**
   * Replace the value at `path`; null removes it
   */
  async set(
    path: string,
    value: JsonValue,
    options: WriteOptions = {},
  ): Promise<void> {
    await this.write(path, value, 'replace', options);
  }

  /**
   * Merge-patch the object `value` into the value at `path`
   */
  async update(
    path: string,
    value: JsonValue,
    options: WriteOptions = {},
  ): Promise<void> {
    if (!isJsonObject(value)) {
      throw new InvalidPayloadError('A merge patch must be a JSON object');
    }
    await this.write(path, value, 'merge', options);
  }

  /**
   * Store `value` under a new generated key below `path`
   * @returns The generated key
   */
  async push(
    path: string,
    value: JsonValue,
    options: WriteOptions = {},
  ): Promise<string> {
    const name = generatePushId();
    const resolved = childPath(resolvePath(path), name);
    const plan = await this.planWrite(resolved, value, 'replace', options);
    this.logger.debug('server', `push ${describePath(resolved)}`);
    await applyPlan(this.store, plan);
    return name;
  }

  private async planRemove(resolved: ResolvedPath): Promise<StorePlan> {
    if (resolved.kind === 'database-root') {
      return this.roots.planDatabaseRemove();
    }
    // Paths below a database root value are keys inside `__root__`
    if (await this.roots.hasDatabaseRoot()) {
      const [key, ...nestedKeys] = resolved.segments;
      return this.mapper.planRemove(ROOT_COLLECTION, key, nestedKeys);
    }
    if (resolved.kind === 'collection-root') {
      return (await this.store.collectionExists(resolved.collection))
        ? [{ type: 'drop', collection: resolved.collection }]
        : [];
    }
    return this.mapper.planRemove(
      resolved.collection,
      resolved.documentId,
      resolved.nestedKeys,
    );
  }

  /**
   * Remove the value at `path`. Removing an absent value succeeds.
   */
  async remove(path: string): Promise<void> {
    const resolved = resolvePath(path);
    const plan = await this.planRemove(resolved);
    this.logger.debug(
      'server',
      `remove ${describePath(resolved)} (${plan.length} store operations)`,
    );
    await applyPlan(this.store, plan);
  }

  /**
   * Rules of `rulesPath` in rules form, or undefined when none are declared
   */
  async getRules(rulesPath: string): Promise<JsonObject | undefined> {
    const spec = await this.rules.getIndexFor(rulesPath);
    return spec && toRulesBody(spec);
  }

  /**
   * Every declared rule, keyed by rules path
   */
  async listRules(): Promise<JsonObject> {
    const rules = await this.rules.listRules();
    return Object.fromEntries(
      rules.map(([path, spec]): [string, JsonValue] => [path, toRulesBody(spec)]),
    );
  }

  async setRules(rulesPath: string, body: JsonValue): Promise<JsonObject> {
    const spec = await this.rules.setRules(rulesPath, parseIndexSpec(body));
    return toRulesBody(spec);
  }

  async deleteRules(rulesPath: string): Promise<boolean> {
    return this.rules.deleteRules(rulesPath);
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}
