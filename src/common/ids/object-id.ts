import { isObjectIdOrHexString, Types } from 'mongoose';
import { ValidationError } from '../errors/eduhub.errors';

/**
 * Identifiers are engine generated ObjectIds. Callers hand them around as
 * 24-char hex strings; anything else is refused before reaching MongoDB.
 */
export function toObjectId(id: string, field = '_id'): Types.ObjectId {
  if (!isObjectIdOrHexString(id)) {
    throw new ValidationError(`${field} must be a 24 character hex ObjectId, got "${id}"`);
  }
  return new Types.ObjectId(id);
}
