/**
 * Error taxonomy for the realtime database core. Every error carries the HTTP
 * status the REST surface answers with.
 */

export type RealtimeErrorCode =
  | 'MALFORMED_PATH'
  | 'RESERVED_NAME'
  | 'INVALID_PAYLOAD'
  | 'INVALID_INDEX'
  | 'INVALID_QUERY'
  | 'ROOT_CONFLICT'
  | 'PARTIAL_APPLICATION'
  | 'STORE_UNAVAILABLE';

export class RealtimeError extends Error {
  readonly status: number;
  readonly code: RealtimeErrorCode;

  constructor(
    code: RealtimeErrorCode,
    status: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class MalformedPathError extends RealtimeError {
  constructor(path: string, reason: string) {
    super('MALFORMED_PATH', 400, `Invalid path "${path}": ${reason}`);
  }
}

export class ReservedNameError extends RealtimeError {
  constructor(name: string) {
    super('RESERVED_NAME', 400, `"${name}" is a reserved name`);
  }
}

export class InvalidPayloadError extends RealtimeError {
  constructor(message: string) {
    super('INVALID_PAYLOAD', 400, message);
  }
}

export class InvalidIndexError extends RealtimeError {
  constructor(message: string) {
    super('INVALID_INDEX', 400, message);
  }
}

export class InvalidQueryError extends RealtimeError {
  constructor(message: string) {
    super('INVALID_QUERY', 400, message);
  }
}

export class RootConflictError extends RealtimeError {
  constructor(collection: string) {
    super(
      'ROOT_CONFLICT',
      409,
      `Collection "${collection}" holds documents; writing a non-object value ` +
        `at its root requires promote=true, which deletes them`,
    );
  }
}

/**
 * A multi-step store plan failed after some of its steps were applied.
 */
export class PartialApplicationError extends RealtimeError {
  readonly completedSteps: number;
  readonly totalSteps: number;

  constructor(completedSteps: number, totalSteps: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      'PARTIAL_APPLICATION',
      500,
      `Partial application: ${completedSteps} of ${totalSteps} store operations applied before failure (${reason})`,
      { cause },
    );
    this.completedSteps = completedSteps;
    this.totalSteps = totalSteps;
  }
}

export class StoreUnavailableError extends RealtimeError {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      'STORE_UNAVAILABLE',
      503,
      `Store unavailable during ${operation}: ${reason}`,
      { cause },
    );
  }
}
