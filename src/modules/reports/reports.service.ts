import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { translateMongoError } from '../../common/errors/mongo-error.translator';
import { Enrollment } from '../enrollments/schemas/enrollment.schema';
import { COLLECTIONS } from '../schema/validators/collection-schemas';
import {
  buildEnrollmentStatsPipeline,
  EnrollmentStatsAggregate,
  EnrollmentStatsRow,
} from './enrollment-stats.pipeline';

@Injectable()
export class ReportsService {
  private readonly logger = new Logger(ReportsService.name);

  constructor(@InjectModel(Enrollment.name) private readonly enrollments: Model<Enrollment>) {}

  /**
   * One row per course that has enrollments, in whatever order the server
   * groups them. Courses without enrollments are absent.
   */
  async computeEnrollmentStats(): Promise<EnrollmentStatsRow[]> {
    let rows: EnrollmentStatsAggregate[];
    try {
      rows = await this.enrollments.aggregate<EnrollmentStatsAggregate>(buildEnrollmentStatsPipeline()).exec();
    } catch (error) {
      throw translateMongoError(error, 'aggregate', COLLECTIONS.enrollments);
    }

    this.logger.log(`Enrollment stats computed for ${rows.length} course(s)`);
    return rows.map((row) => ({
      courseId: row.courseId.toHexString(),
      courseTitle: row.courseTitle,
      totalEnrollments: row.totalEnrollments,
      activeStudents: row.activeStudents,
      enrollmentRate: row.enrollmentRate,
    }));
  }
}
