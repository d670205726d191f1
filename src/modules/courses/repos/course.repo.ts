import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model, Types, UpdateQuery } from 'mongoose';
import { translateMongoError } from '../../../common/errors/mongo-error.translator';
import { COLLECTIONS } from '../../schema/validators/collection-schemas';
import { Course, CourseRecord } from '../schemas/course.schema';

@Injectable()
export class CourseRepo {
  constructor(@InjectModel(Course.name) private readonly model: Model<Course>) {}

  async create(data: Course): Promise<Types.ObjectId> {
    try {
      const doc = await this.model.create(data);
      return doc._id;
    } catch (error) {
      throw translateMongoError(error, 'write', COLLECTIONS.courses);
    }
  }

  async findById(id: Types.ObjectId): Promise<CourseRecord | null> {
    try {
      return await this.model.findById(id).lean<CourseRecord>().exec();
    } catch (error) {
      throw translateMongoError(error, 'read', COLLECTIONS.courses);
    }
  }

  async exists(id: Types.ObjectId): Promise<boolean> {
    try {
      return (await this.model.exists({ _id: id }).exec()) !== null;
    } catch (error) {
      throw translateMongoError(error, 'read', COLLECTIONS.courses);
    }
  }

  async list(filter: FilterQuery<Course>, limit = 50, skip = 0): Promise<CourseRecord[]> {
    try {
      return await this.model
        .find(filter)
        .sort({ createdAt: -1 })
        .limit(limit)
        .skip(skip)
        .lean<CourseRecord[]>()
        .exec();
    } catch (error) {
      throw translateMongoError(error, 'read', COLLECTIONS.courses);
    }
  }

  async updateOne(filter: FilterQuery<Course>, update: UpdateQuery<Course>) {
    try {
      const { matchedCount, modifiedCount } = await this.model.updateOne(filter, update).exec();
      return { matchedCount, modifiedCount };
    } catch (error) {
      throw translateMongoError(error, 'write', COLLECTIONS.courses);
    }
  }
}
