/**
 * Path resolution: REST paths to (collection, document id, nested keys)
 */

import {
  JsonValue,
  RESERVED_COLLECTIONS,
  ROOT_COLLECTION,
  ROOT_SENTINEL,
  RULES_COLLECTION,
} from '../types';
import { isJsonObject } from '../utils';
import {
  InvalidPayloadError,
  MalformedPathError,
  ReservedNameError,
} from './errors';

export type PathKind =
  | 'database-root'
  | 'collection-root'
  | 'document-root'
  | 'nested-path';

export interface DatabaseRootPath {
  kind: 'database-root';
  segments: string[];
}

export interface CollectionRootPath {
  kind: 'collection-root';
  segments: string[];
  collection: string;
}

export interface DocumentPath {
  kind: 'document-root' | 'nested-path';
  segments: string[];
  collection: string;
  documentId: string;
  /** Keys below the document, in order (empty for document-root) */
  nestedKeys: string[];
  /** nestedKeys joined with "." */
  nestedKeyPath: string;
}

export type ResolvedPath = DatabaseRootPath | CollectionRootPath | DocumentPath;

// Keys that can be neither dot-joined nor stored as document field names
const FORBIDDEN_KEY_CHARS = /[.$#[\]\/\u0000-\u001f\u007f]/;

function isReservedCollection(name: string): boolean {
  return RESERVED_COLLECTIONS.some((reserved) => reserved === name);
}

/**
 * Split a slash-delimited path into decoded segments.
 * One leading and one trailing slash are ignored; empty segments are rejected.
 */
export function splitPath(path: string): string[] {
  let trimmed = path.startsWith('/') ? path.slice(1) : path;
  if (trimmed.endsWith('/')) {
    trimmed = trimmed.slice(0, -1);
  }
  if (trimmed === '') {
    return [];
  }

  return trimmed.split('/').map((raw) => {
    if (raw === '') {
      throw new MalformedPathError(path, 'empty path segment');
    }
    let segment: string;
    try {
      segment = decodeURIComponent(raw);
    } catch {
      throw new MalformedPathError(path, `cannot decode segment "${raw}"`);
    }
    if (FORBIDDEN_KEY_CHARS.test(segment)) {
      throw new MalformedPathError(
        path,
        `segment "${segment}" contains one of . $ # [ ] / or a control character`,
      );
    }
    return segment;
  });
}

/**
 * Resolve a data path and classify it by depth.
 * @example
 * resolvePath('/') // { kind: 'database-root', segments: [] }
 * resolvePath('/dinosaurs/t-rex/dimensions/height')
 * // { kind: 'nested-path', collection: 'dinosaurs', documentId: 't-rex',
 * //   nestedKeys: ['dimensions', 'height'], nestedKeyPath: 'dimensions.height', ... }
 */
export function resolvePath(path: string): ResolvedPath {
  const segments = splitPath(path);
  if (segments.length === 0) {
    return { kind: 'database-root', segments };
  }

  const [collection, documentId, ...nestedKeys] = segments;
  if (isReservedCollection(collection)) {
    throw new ReservedNameError(collection);
  }
  if (segments.length === 1) {
    return { kind: 'collection-root', segments, collection };
  }
  if (documentId === ROOT_SENTINEL) {
    throw new ReservedNameError(documentId);
  }

  return {
    kind: nestedKeys.length > 0 ? 'nested-path' : 'document-root',
    segments,
    collection,
    documentId,
    nestedKeys,
    nestedKeyPath: nestedKeys.join('.'),
  };
}

/**
 * Rules path of a path addressed below the rules collection, or undefined
 * when the path addresses data.
 * @example
 * toRulesPath('/__fm_rules__/dinosaurs') // 'dinosaurs'
 * toRulesPath('/__fm_rules__') // '__root__'
 * toRulesPath('/dinosaurs') // undefined
 */
export function toRulesPath(path: string): string | undefined {
  const segments = splitPath(path);
  if (segments[0] !== RULES_COLLECTION) {
    return undefined;
  }
  const rest = segments.slice(1);
  if (rest.length > 0 && isReservedCollection(rest[0])) {
    throw new ReservedNameError(rest[0]);
  }
  return rest.length > 0 ? rest.join('/') : ROOT_COLLECTION;
}

/**
 * Rules path that governs queries on the children of a resolved path
 */
export function rulesPathOf(resolved: ResolvedPath): string {
  return resolved.kind === 'database-root'
    ? ROOT_COLLECTION
    : resolved.segments.join('/');
}

/**
 * Path of a new child `key` below a resolved path
 */
export function childPath(parent: ResolvedPath, key: string): ResolvedPath {
  switch (parent.kind) {
    case 'database-root':
      return { kind: 'collection-root', segments: [key], collection: key };
    case 'collection-root':
      return {
        kind: 'document-root',
        segments: [...parent.segments, key],
        collection: parent.collection,
        documentId: key,
        nestedKeys: [],
        nestedKeyPath: '',
      };
    default: {
      const nestedKeys = [...parent.nestedKeys, key];
      return {
        ...parent,
        kind: 'nested-path',
        segments: [...parent.segments, key],
        nestedKeys,
        nestedKeyPath: nestedKeys.join('.'),
      };
    }
  }
}

/**
 * Reject object keys that could not be addressed by a path
 * @throws InvalidPayloadError
 */
export function assertStorableValue(value: JsonValue, at = ''): void {
  if (Array.isArray(value)) {
    value.forEach((item, i) => assertStorableValue(item, `${at}/${i}`));
    return;
  }
  if (!isJsonObject(value)) {
    return;
  }
  for (const [key, child] of Object.entries(value)) {
    if (key === '' || FORBIDDEN_KEY_CHARS.test(key)) {
      throw new InvalidPayloadError(
        `Invalid key ${JSON.stringify(key)} at "${at || '/'}": keys must be non-empty ` +
          'and cannot contain . $ # [ ] / or control characters',
      );
    }
    assertStorableValue(child, `${at}/${key}`);
  }
}
