export type EduhubErrorCode =
  | 'CONNECTIVITY'
  | 'SCHEMA_APPLICATION'
  | 'INDEX_CONFLICT'
  | 'VALIDATION'
  | 'UNIQUE_CONSTRAINT'
  | 'AGGREGATION'
  | 'NOT_FOUND';

export abstract class EduhubError extends Error {
  abstract readonly code: EduhubErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The MongoDB deployment could not be reached. */
export class ConnectivityError extends EduhubError {
  readonly code = 'CONNECTIVITY';
}

/** MongoDB refused to create a collection or apply its validator. */
export class SchemaApplicationError extends EduhubError {
  readonly code = 'SCHEMA_APPLICATION';

  constructor(
    readonly collection: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Existing data or an existing index prevents an index from being built. */
export class IndexConflictError extends EduhubError {
  readonly code = 'INDEX_CONFLICT';

  constructor(
    readonly collection: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * A write was rejected by the collection validator, or a value could not be
 * cast to the stored type (including malformed identifiers).
 */
export class ValidationError extends EduhubError {
  readonly code = 'VALIDATION';
}

/** A write collided with a unique index. */
export class UniqueConstraintError extends EduhubError {
  readonly code = 'UNIQUE_CONSTRAINT';

  constructor(
    readonly collection: string,
    readonly keyPattern: Record<string, unknown>,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class AggregationError extends EduhubError {
  readonly code = 'AGGREGATION';
}

export class NotFoundError extends EduhubError {
  readonly code = 'NOT_FOUND';

  constructor(
    readonly collection: string,
    readonly id: string,
  ) {
    super(`${collection} record ${id} not found`);
  }
}
