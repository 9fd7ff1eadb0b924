/**
 * Calls handled by the REST handlers, and parsing of their parameters
 */

import { JsonValue } from '../../types';
import { parseJson } from '../../utils';
import {
  InvalidPayloadError,
  InvalidQueryError,
  PartialApplicationError,
  RealtimeError,
} from '../errors';
import { QueryOptions } from '../query';
import type { WriteOptions } from '../database';

export interface RealtimeCall {
  /** Request path without the `.json` suffix, still URI-encoded */
  path: string;
  /** Single-valued query string parameters */
  params: Record<string, string>;
  /** Raw request body ('' when none) */
  body: string;
}

export interface RealtimeReply {
  status: number;
  /** undefined answers with a JSON null */
  value?: JsonValue;
}

export type ReplyCallback = (error: unknown, reply?: RealtimeReply) => void;

/**
 * Query string value: JSON when it parses, the bare string otherwise
 * @example
 * parseParam('"height"') // 'height'
 * parseParam('4') // 4
 * parseParam('null') // null
 * parseParam('height') // 'height'
 */
export function parseParam(raw: string): JsonValue {
  const parsed = parseJson(raw);
  return parsed === undefined ? raw : parsed;
}

function parseLimit(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = parseParam(raw);
  if (typeof value !== 'number') {
    throw new InvalidQueryError(`${name} must be a number`);
  }
  return value;
}

export function parseQueryOptions(call: RealtimeCall): QueryOptions {
  const { params } = call;
  const options: QueryOptions = {};
  if (params.orderBy !== undefined) {
    const orderBy = parseParam(params.orderBy);
    if (typeof orderBy !== 'string') {
      throw new InvalidQueryError('orderBy must be a string');
    }
    options.orderBy = orderBy;
  }
  if (params.startAt !== undefined) {
    options.startAt = parseParam(params.startAt);
  }
  if (params.endAt !== undefined) {
    options.endAt = parseParam(params.endAt);
  }
  if (params.equalTo !== undefined) {
    options.equalTo = parseParam(params.equalTo);
  }
  options.limitToFirst = parseLimit('limitToFirst', params.limitToFirst);
  options.limitToLast = parseLimit('limitToLast', params.limitToLast);
  return options;
}

export function parseWriteOptions(call: RealtimeCall): WriteOptions {
  return { promote: call.params.promote === 'true' };
}

/**
 * @throws InvalidPayloadError when the body is missing or not JSON
 */
export function parseBody(call: RealtimeCall): JsonValue {
  if (call.body.trim() === '') {
    throw new InvalidPayloadError('Missing JSON body');
  }
  const value = parseJson(call.body);
  if (value === undefined) {
    throw new InvalidPayloadError('Invalid data; couldn\'t parse JSON object, array, or value');
  }
  return value;
}

/**
 * Status and `{ error: { message, code } }` body of a failed call
 */
export function toErrorReply(error: unknown): RealtimeReply {
  if (error instanceof PartialApplicationError) {
    return {
      status: error.status,
      value: {
        error: { message: error.message, code: error.code },
        partial: true,
        completedSteps: error.completedSteps,
        totalSteps: error.totalSteps,
      },
    };
  }
  if (error instanceof RealtimeError) {
    return {
      status: error.status,
      value: { error: { message: error.message, code: error.code } },
    };
  }
  return {
    status: 500,
    value: {
      error: {
        message: error instanceof Error ? error.message : String(error),
        code: 'INTERNAL',
      },
    },
  };
}
