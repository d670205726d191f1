import { Types } from 'mongoose';
import { ValidationError } from '../errors/eduhub.errors';
import { toObjectId } from './object-id';

describe('toObjectId', () => {
  it('converts a hex string', () => {
    const id = toObjectId('65f0a1b2c3d4e5f601234567');
    expect(id).toBeInstanceOf(Types.ObjectId);
    expect(id.toHexString()).toBe('65f0a1b2c3d4e5f601234567');
  });

  it('rejects caller supplied strings that are not ObjectIds', () => {
    expect(() => toObjectId('x', 'instructorId')).toThrow(ValidationError);
    expect(() => toObjectId('x', 'instructorId')).toThrow(
      'instructorId must be a 24 character hex ObjectId, got "x"',
    );
  });

  it('rejects 12 character strings that Types.ObjectId would otherwise accept', () => {
    expect(() => toObjectId('abcdefghijkl')).toThrow(ValidationError);
  });

  it('rejects hex strings of the wrong length', () => {
    expect(() => toObjectId('65f0a1b2c3d4e5f60123456')).toThrow(ValidationError);
  });
});
