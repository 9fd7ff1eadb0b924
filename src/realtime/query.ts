/**
 * Query/filter engine: ordering, range filters and limits over the direct
 * children of a collection or of a nested value.
 */

import { config } from '../config';
import { getLogger } from '../logger';
import { JsonObject, JsonValue } from '../types';
import { getIn } from '../utils';
import { InvalidQueryError } from './errors';
import { INDEX_ON, IndexSpec, RulesManager, VALUE_INDEX } from './rules';

export const ORDER_BY_KEY = '$key';
export const ORDER_BY_VALUE = '$value';

export interface QueryOptions {
  orderBy?: string;
  startAt?: JsonValue;
  endAt?: JsonValue;
  equalTo?: JsonValue;
  limitToFirst?: number;
  limitToLast?: number;
}

export type OrderBy =
  | { kind: 'key' }
  | { kind: 'value' }
  | { kind: 'child'; path: string; keys: string[] };

export type QueryEntry = [string, JsonValue];

/**
 * A validated query: `equalTo` is folded into both bounds
 */
export interface ValidatedQuery {
  orderBy: OrderBy;
  startAt?: JsonValue;
  endAt?: JsonValue;
  limitToFirst?: number;
  limitToLast?: number;
}

export function hasQuery(options: QueryOptions): boolean {
  return (
    options.orderBy !== undefined ||
    options.startAt !== undefined ||
    options.endAt !== undefined ||
    options.equalTo !== undefined ||
    options.limitToFirst !== undefined ||
    options.limitToLast !== undefined
  );
}

function parseOrderBy(orderBy: string): OrderBy {
  if (orderBy === ORDER_BY_KEY) {
    return { kind: 'key' };
  }
  if (orderBy === ORDER_BY_VALUE) {
    return { kind: 'value' };
  }
  const keys = orderBy.split('/');
  if (keys.some((key) => key === '' || /[.$#[\]]/.test(key))) {
    throw new InvalidQueryError(`Invalid orderBy "${orderBy}"`);
  }
  return { kind: 'child', path: orderBy, keys };
}

function validateLimit(name: string, limit: number | undefined): void {
  if (limit !== undefined && !(Number.isInteger(limit) && limit > 0)) {
    throw new InvalidQueryError(`${name} must be a positive integer`);
  }
}

function validateBound(
  name: string,
  bound: JsonValue | undefined,
  orderBy: OrderBy,
): void {
  if (bound === undefined) {
    return;
  }
  if (typeof bound === 'object' && bound !== null) {
    throw new InvalidQueryError(`${name} must be a string, number, boolean or null`);
  }
  if (orderBy.kind === 'key' && typeof bound !== 'string') {
    throw new InvalidQueryError(`${name} must be a string when ordering by ${ORDER_BY_KEY}`);
  }
}

/**
 * Check the combination of query parameters
 * @throws InvalidQueryError
 */
export function validateQuery(options: QueryOptions): ValidatedQuery {
  if (options.orderBy === undefined) {
    throw new InvalidQueryError(
      'orderBy must be defined when other query parameters are defined',
    );
  }
  if (
    options.equalTo !== undefined &&
    (options.startAt !== undefined || options.endAt !== undefined)
  ) {
    throw new InvalidQueryError('equalTo cannot be combined with startAt or endAt');
  }
  if (options.limitToFirst !== undefined && options.limitToLast !== undefined) {
    throw new InvalidQueryError('limitToFirst and limitToLast cannot both be defined');
  }
  validateLimit('limitToFirst', options.limitToFirst);
  validateLimit('limitToLast', options.limitToLast);

  const orderBy = parseOrderBy(options.orderBy);
  // equalTo may be null, which is a bound of its own
  const startAt = options.equalTo !== undefined ? options.equalTo : options.startAt;
  const endAt = options.equalTo !== undefined ? options.equalTo : options.endAt;
  validateBound(options.equalTo !== undefined ? 'equalTo' : 'startAt', startAt, orderBy);
  validateBound(options.equalTo !== undefined ? 'equalTo' : 'endAt', endAt, orderBy);

  return {
    orderBy,
    startAt,
    endAt,
    limitToFirst: options.limitToFirst,
    limitToLast: options.limitToLast,
  };
}

/**
 * Compare strings by Unicode code point (not UTF-16 code unit)
 */
export function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }
  return Math.sign(left.length - right.length);
}

const INTEGER_KEY = /^(0|-?[1-9]\d*)$/;
const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

function keyAsInteger(key: string): number | undefined {
  if (!INTEGER_KEY.test(key)) {
    return undefined;
  }
  const n = Number(key);
  return n >= INT32_MIN && n <= INT32_MAX ? n : undefined;
}

/**
 * Key order: 32-bit integer keys numerically, then every other key by code point
 */
export function compareKeys(a: string, b: string): number {
  const left = keyAsInteger(a);
  const right = keyAsInteger(b);
  if (left !== undefined && right !== undefined) {
    return Math.sign(left - right);
  }
  if (left !== undefined) {
    return -1;
  }
  if (right !== undefined) {
    return 1;
  }
  return compareCodePoints(a, b);
}

function typeRank(value: JsonValue | undefined): number {
  if (value === undefined || value === null) {
    return 0;
  }
  switch (typeof value) {
    case 'boolean':
      return 1;
    case 'number':
      return 2;
    case 'string':
      return 3;
    default:
      return 4;
  }
}

/**
 * Total order over JSON values: absent and null, then false, true, numbers,
 * strings, and finally objects and arrays (which compare equal).
 */
export function compareValues(
  a: JsonValue | undefined,
  b: JsonValue | undefined,
): number {
  const rank = typeRank(a) - typeRank(b);
  if (rank !== 0) {
    return Math.sign(rank);
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return a === b ? 0 : a ? 1 : -1;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return Math.sign(a - b);
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return compareCodePoints(a, b);
  }
  return 0;
}

function orderValue(
  [key, value]: QueryEntry,
  orderBy: OrderBy,
): JsonValue | undefined {
  switch (orderBy.kind) {
    case 'key':
      return key;
    case 'value':
      return value;
    case 'child':
      return getIn(value, orderBy.keys);
  }
}

function withinBounds(entry: QueryEntry, query: ValidatedQuery): boolean {
  const { orderBy, startAt, endAt } = query;
  if (orderBy.kind === 'key') {
    const key = entry[0];
    return (
      (typeof startAt !== 'string' || compareKeys(key, startAt) >= 0) &&
      (typeof endAt !== 'string' || compareKeys(key, endAt) <= 0)
    );
  }
  const value = orderValue(entry, orderBy);
  if (value === undefined && (startAt !== undefined || endAt !== undefined)) {
    return false;
  }
  return (
    (startAt === undefined || compareValues(value, startAt) >= 0) &&
    (endAt === undefined || compareValues(value, endAt) <= 0)
  );
}

/**
 * Order, filter and limit entries
 */
export function applyQuery(
  entries: readonly QueryEntry[],
  query: ValidatedQuery,
): QueryEntry[] {
  const { orderBy } = query;
  const sorted = entries
    .filter((entry) => withinBounds(entry, query))
    .sort((a, b) => {
      if (orderBy.kind !== 'key') {
        const byValue = compareValues(orderValue(a, orderBy), orderValue(b, orderBy));
        if (byValue !== 0) {
          return byValue;
        }
      }
      return compareKeys(a[0], b[0]);
    });

  if (query.limitToFirst !== undefined) {
    return sorted.slice(0, query.limitToFirst);
  }
  if (query.limitToLast !== undefined) {
    return sorted.slice(-query.limitToLast);
  }
  return sorted;
}

/**
 * Lazy query result: every iteration runs the scan again
 */
export class QueryResult implements AsyncIterable<QueryEntry> {
  private readonly scan: () => Promise<QueryEntry[]>;
  readonly query: ValidatedQuery;

  constructor(scan: () => Promise<QueryEntry[]>, query: ValidatedQuery) {
    this.scan = scan;
    this.query = query;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<QueryEntry> {
    yield* applyQuery(await this.scan(), this.query);
  }

  async toArray(): Promise<QueryEntry[]> {
    const entries: QueryEntry[] = [];
    for await (const entry of this) {
      entries.push(entry);
    }
    return entries;
  }

  /**
   * Entries as an object. Property order of the serialized object follows
   * JavaScript rules, not the query order.
   */
  async toObject(): Promise<JsonObject> {
    return Object.fromEntries(await this.toArray());
  }
}

function isIndexed(spec: IndexSpec | undefined, orderBy: OrderBy): boolean {
  switch (orderBy.kind) {
    case 'key':
      return true;
    case 'value':
      return spec !== undefined && 'byValue' in spec;
    case 'child':
      return spec !== undefined && 'fieldNames' in spec && spec.fieldNames.includes(orderBy.path);
  }
}

export interface QueryEngineOptions {
  /** Reject unindexed queries; defaults to the `rules.strictIndexes` setting */
  strictIndexes?: boolean;
}

export class QueryEngine {
  private readonly rules: RulesManager;
  private readonly strictIndexes: boolean | undefined;
  private readonly logger = getLogger();

  constructor(rules: RulesManager, options: QueryEngineOptions = {}) {
    this.rules = rules;
    this.strictIndexes = options.strictIndexes;
  }

  private async checkIndex(rulesPath: string, orderBy: OrderBy): Promise<void> {
    if (isIndexed(await this.rules.getIndexFor(rulesPath), orderBy)) {
      return;
    }
    const field = orderBy.kind === 'child' ? orderBy.path : VALUE_INDEX;
    const message =
      `Index not defined, add "${INDEX_ON}": "${field}", ` +
      `for path "/${rulesPath}", to the rules`;
    if (this.strictIndexes ?? config.getBoolean('rules.strictIndexes')) {
      throw new InvalidQueryError(message);
    }
    this.logger.warn('query', `Using an unindexed query. ${message}`);
  }

  /**
   * Query the children of the value at `rulesPath`, as returned by `scan`
   */
  async queryEntries(
    rulesPath: string,
    scan: () => Promise<QueryEntry[]>,
    options: QueryOptions,
  ): Promise<QueryResult> {
    const query = validateQuery(options);
    await this.checkIndex(rulesPath, query.orderBy);
    this.logger.debug('query', `query "/${rulesPath}": ${JSON.stringify(options)}`);
    return new QueryResult(scan, query);
  }

  /**
   * Query the documents of `collection`
   */
  async query(
    collection: string,
    scan: () => Promise<QueryEntry[]>,
    options: QueryOptions,
  ): Promise<QueryResult> {
    return this.queryEntries(collection, scan, options);
  }
}
