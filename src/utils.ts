/**
 * Utility functions for addressing and editing values inside a JSON tree
 */

import { JsonObject, JsonValue, WriteMode } from './types';

/**
 * Check whether a value is a proper JSON object (not an array, not null)
 */
export function isJsonObject(
  value: JsonValue | undefined,
): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow an unknown (e.g. the output of JSON.parse) to a JsonValue
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) {
    return true;
  }
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Parse JSON text into a JsonValue, or undefined when the text is not JSON
 */
export function parseJson(text: string): JsonValue | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  return isJsonValue(parsed) ? parsed : undefined;
}

function isArrayIndex(key: string, length: number): boolean {
  return /^(0|[1-9]\d*)$/.test(key) && Number(key) < length;
}

/**
 * Arrays are addressed like objects keyed by their indexes
 */
function toEntries(value: JsonObject | JsonValue[]): Map<string, JsonValue> {
  if (Array.isArray(value)) {
    return new Map(
      value.map((item, i): [string, JsonValue] => [String(i), item]),
    );
  }
  return new Map(Object.entries(value));
}

/**
 * Read the value at `keys` below `value`.
 * @returns The addressed value, or undefined when a key is missing or a
 * scalar is in the way
 * @example
 * getIn({ a: { b: 1 } }, ['a', 'b']) // returns 1
 * getIn({ a: 5 }, ['a', 'b']) // returns undefined
 */
export function getIn(
  value: JsonValue | undefined,
  keys: readonly string[],
): JsonValue | undefined {
  let current = value;
  for (const key of keys) {
    if (isJsonObject(current)) {
      if (!Object.prototype.hasOwnProperty.call(current, key)) {
        return undefined;
      }
      current = current[key];
    } else if (Array.isArray(current) && isArrayIndex(key, current.length)) {
      current = current[Number(key)];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Drop null members from objects (null means "absent" in the tree).
 * A bare null becomes undefined.
 */
export function stripNulls(value: JsonValue): JsonValue | undefined {
  if (value === null) {
    return undefined;
  }
  if (Array.isArray(value)) {
    return value.map((item) => (isJsonObject(item) ? stripObject(item) : item));
  }
  if (isJsonObject(value)) {
    return stripObject(value);
  }
  return value;
}

function stripObject(value: JsonObject): JsonObject {
  const entries: [string, JsonValue][] = [];
  for (const [key, child] of Object.entries(value)) {
    const stripped = stripNulls(child);
    if (stripped !== undefined) {
      entries.push([key, stripped]);
    }
  }
  return Object.fromEntries(entries);
}

/**
 * Merge-patch `patch` into `target`: each top-level key of an object patch
 * replaces the same key of the target, null removes it, unmentioned keys stay.
 * A non-object patch replaces the target.
 */
export function mergeValue(
  target: JsonValue | undefined,
  patch: JsonValue,
): JsonValue | undefined {
  if (!isJsonObject(patch)) {
    return stripNulls(patch);
  }
  const merged = isJsonObject(target)
    ? toEntries(target)
    : new Map<string, JsonValue>();
  for (const [key, child] of Object.entries(patch)) {
    const stripped = stripNulls(child);
    if (stripped === undefined) {
      merged.delete(key);
    } else {
      merged.set(key, stripped);
    }
  }
  return Object.fromEntries(merged);
}

/**
 * Write `value` at `keys` below `target`, creating intermediate objects.
 * A scalar in the way is replaced by an object holding only the new key.
 * @returns The new target, or undefined when the write removed it entirely
 * @example
 * setIn({ a: 1 }, ['b', 'c'], 2, 'replace') // returns { a: 1, b: { c: 2 } }
 * setIn({ a: 1 }, ['a', 'c'], 2, 'replace') // returns { a: { c: 2 } }
 */
export function setIn(
  target: JsonValue | undefined,
  keys: readonly string[],
  value: JsonValue,
  mode: WriteMode,
): JsonValue | undefined {
  if (keys.length === 0) {
    return mode === 'merge' ? mergeValue(target, value) : stripNulls(value);
  }
  const [head, ...rest] = keys;
  const entries =
    isJsonObject(target) || Array.isArray(target)
      ? toEntries(target)
      : new Map<string, JsonValue>();
  const child = setIn(entries.get(head), rest, value, mode);
  if (child === undefined) {
    entries.delete(head);
  } else {
    entries.set(head, child);
  }
  return Object.fromEntries(entries);
}

/**
 * Remove the value at `keys` below `target`.
 * @returns The new target and whether anything was removed
 */
export function removeIn(
  target: JsonValue | undefined,
  keys: readonly string[],
): { value: JsonValue | undefined; removed: boolean } {
  if (keys.length === 0) {
    return { value: undefined, removed: target !== undefined };
  }
  if (getIn(target, keys) === undefined) {
    return { value: target, removed: false };
  }
  return { value: removeExisting(target, keys), removed: true };
}

function removeExisting(
  target: JsonValue | undefined,
  keys: readonly string[],
): JsonValue | undefined {
  if (keys.length === 0) {
    return undefined;
  }
  if (!isJsonObject(target) && !Array.isArray(target)) {
    return undefined;
  }
  const [head, ...rest] = keys;
  const entries = toEntries(target);
  const child = removeExisting(entries.get(head), rest);
  if (child === undefined) {
    entries.delete(head);
  } else {
    entries.set(head, child);
  }
  return Object.fromEntries(entries);
}

// Modeled on Firebase push ids: 8 timestamp characters then 12 random ones,
// so that ids sort in creation order
const PUSH_CHARS =
  '-0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ_abcdefghijklmnopqrstuvwxyz';

let lastPushTime = 0;
let lastRandChars: number[] = [];

/**
 * Generate a 20 character, time-ordered identifier
 */
export function generatePushId(now: number = Date.now()): string {
  const duplicateTime = now === lastPushTime;
  lastPushTime = now;

  const timeStampChars: string[] = new Array<string>(8);
  let remaining = now;
  for (let i = 7; i >= 0; i--) {
    timeStampChars[i] = PUSH_CHARS.charAt(remaining % 64);
    remaining = Math.floor(remaining / 64);
  }

  if (!duplicateTime) {
    lastRandChars = [];
    for (let i = 0; i < 12; i++) {
      lastRandChars.push(Math.floor(Math.random() * 64));
    }
  } else {
    // Same millisecond: increment the random part so ids stay ordered
    let i = 11;
    while (i >= 0 && lastRandChars[i] === 63) {
      lastRandChars[i] = 0;
      i--;
    }
    if (i >= 0) {
      lastRandChars[i]++;
    }
  }

  return (
    timeStampChars.join('') +
    lastRandChars.map((c) => PUSH_CHARS.charAt(c)).join('')
  );
}
