import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model, Types, UpdateQuery } from 'mongoose';
import { translateMongoError } from '../../../common/errors/mongo-error.translator';
import { COLLECTIONS } from '../../schema/validators/collection-schemas';
import { Enrollment, EnrollmentRecord } from '../schemas/enrollment.schema';

@Injectable()
export class EnrollmentRepo {
  constructor(@InjectModel(Enrollment.name) private readonly model: Model<Enrollment>) {}

  // a second enrollment for the same student/course pair fails on the unique index
  async create(data: Enrollment): Promise<Types.ObjectId> {
    try {
      const doc = await this.model.create(data);
      return doc._id;
    } catch (error) {
      throw translateMongoError(error, 'write', COLLECTIONS.enrollments);
    }
  }

  async list(filter: FilterQuery<Enrollment>, limit = 50, skip = 0): Promise<EnrollmentRecord[]> {
    try {
      return await this.model
        .find(filter)
        .sort({ enrollmentDate: -1 })
        .limit(limit)
        .skip(skip)
        .lean<EnrollmentRecord[]>()
        .exec();
    } catch (error) {
      throw translateMongoError(error, 'read', COLLECTIONS.enrollments);
    }
  }

  async updateById(id: Types.ObjectId, update: UpdateQuery<Enrollment>) {
    try {
      const { matchedCount, modifiedCount } = await this.model.updateOne({ _id: id }, update).exec();
      return { matchedCount, modifiedCount };
    } catch (error) {
      throw translateMongoError(error, 'write', COLLECTIONS.enrollments);
    }
  }
}
