import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model, Types, UpdateQuery } from 'mongoose';
import { translateMongoError } from '../../../common/errors/mongo-error.translator';
import { COLLECTIONS } from '../../schema/validators/collection-schemas';
import { User, UserRecord } from '../schemas/user.schema';

@Injectable()
export class UserRepo {
  constructor(@InjectModel(User.name) private readonly model: Model<User>) {}

  async create(data: User): Promise<Types.ObjectId> {
    try {
      const doc = await this.model.create(data);
      return doc._id;
    } catch (error) {
      throw translateMongoError(error, 'write', COLLECTIONS.users);
    }
  }

  async findById(id: Types.ObjectId): Promise<UserRecord | null> {
    try {
      return await this.model.findById(id).lean<UserRecord>().exec();
    } catch (error) {
      throw translateMongoError(error, 'read', COLLECTIONS.users);
    }
  }

  async findOne(filter: FilterQuery<User>): Promise<UserRecord | null> {
    try {
      return await this.model.findOne(filter).lean<UserRecord>().exec();
    } catch (error) {
      throw translateMongoError(error, 'read', COLLECTIONS.users);
    }
  }

  async list(filter: FilterQuery<User>, limit = 50, skip = 0): Promise<UserRecord[]> {
    try {
      return await this.model
        .find(filter)
        .sort({ dateJoined: -1 })
        .limit(limit)
        .skip(skip)
        .lean<UserRecord[]>()
        .exec();
    } catch (error) {
      throw translateMongoError(error, 'read', COLLECTIONS.users);
    }
  }

  async updateById(id: Types.ObjectId, update: UpdateQuery<User>) {
    try {
      const { matchedCount, modifiedCount } = await this.model.updateOne({ _id: id }, update).exec();
      return { matchedCount, modifiedCount };
    } catch (error) {
      throw translateMongoError(error, 'write', COLLECTIONS.users);
    }
  }
}
