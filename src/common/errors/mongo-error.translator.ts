import { Error as MongooseError, mongo } from 'mongoose';
import {
  AggregationError,
  ConnectivityError,
  EduhubError,
  IndexConflictError,
  SchemaApplicationError,
  UniqueConstraintError,
  ValidationError,
} from './eduhub.errors';

export type MongoOperation = 'read' | 'write' | 'schema' | 'index' | 'aggregate';

// https://www.mongodb.com/docs/manual/reference/error-codes/
export const DOCUMENT_VALIDATION_FAILURE = 121;
export const DUPLICATE_KEY = 11000;
export const INDEX_OPTIONS_CONFLICT = 85;
export const INDEX_KEY_SPECS_CONFLICT = 86;
export const NAMESPACE_EXISTS = 48;

const BUFFERING_TIMEOUT = /buffering timed out/;

// Mongoose reports a missing server with its own classes: a selection error
// that does not extend the driver's, and a plain MongooseError once a
// buffered operation gives up waiting for the connection.
function isUnreachable(error: unknown): error is Error {
  return (
    error instanceof mongo.MongoNetworkError ||
    error instanceof mongo.MongoServerSelectionError ||
    error instanceof mongo.MongoNotConnectedError ||
    error instanceof mongo.MongoTopologyClosedError ||
    error instanceof MongooseError.MongooseServerSelectionError ||
    (error instanceof MongooseError && BUFFERING_TIMEOUT.test(error.message))
  );
}

/**
 * Maps driver and mongoose failures onto the EduhubError family. Errors
 * with no mapping for the given operation are returned untouched.
 */
export function translateMongoError(error: unknown, operation: MongoOperation, target: string): Error {
  if (error instanceof EduhubError) return error;

  if (isUnreachable(error)) {
    return new ConnectivityError(`MongoDB unreachable during ${operation} on ${target}: ${error.message}`, {
      cause: error,
    });
  }

  if (error instanceof MongooseError.ValidationError || error instanceof MongooseError.CastError) {
    return new ValidationError(`Invalid ${target} document: ${error.message}`, { cause: error });
  }

  if (error instanceof mongo.MongoServerError) {
    if (error.code === DOCUMENT_VALIDATION_FAILURE) {
      return new ValidationError(`Document failed ${target} validation`, { cause: error });
    }

    if (operation === 'index') {
      if (
        error.code === DUPLICATE_KEY ||
        error.code === INDEX_OPTIONS_CONFLICT ||
        error.code === INDEX_KEY_SPECS_CONFLICT
      ) {
        return new IndexConflictError(target, `Cannot build index on ${target}: ${error.message}`, {
          cause: error,
        });
      }
      return error;
    }

    if (error.code === DUPLICATE_KEY) {
      const keyPattern: Record<string, unknown> = error.keyPattern ?? {};
      const keys = Object.keys(keyPattern).join(', ');
      return new UniqueConstraintError(target, keyPattern, `Duplicate ${target} key (${keys})`, {
        cause: error,
      });
    }

    if (operation === 'schema') {
      return new SchemaApplicationError(target, `Validator rejected for ${target}: ${error.message}`, {
        cause: error,
      });
    }

    if (operation === 'aggregate') {
      return new AggregationError(`Aggregation on ${target} failed: ${error.message}`, { cause: error });
    }
  }

  return error instanceof Error ? error : new Error(String(error));
}
