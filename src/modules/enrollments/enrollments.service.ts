import { Injectable, Logger } from '@nestjs/common';
import { NotFoundError } from '../../common/errors/eduhub.errors';
import { toObjectId } from '../../common/ids/object-id';
import { COLLECTIONS } from '../schema/validators/collection-schemas';
import { EnrollmentRepo } from './repos/enrollment.repo';
import { EnrollmentRecord, EnrollmentStatus } from './schemas/enrollment.schema';

type Page = { limit?: number; skip?: number };

@Injectable()
export class EnrollmentsService {
  private readonly logger = new Logger(EnrollmentsService.name);

  constructor(private readonly repo: EnrollmentRepo) {}

  async enroll(studentId: string, courseId: string): Promise<string> {
    const id = await this.repo.create({
      studentId: toObjectId(studentId, 'studentId'),
      courseId: toObjectId(courseId, 'courseId'),
      enrollmentDate: new Date(),
      status: 'active',
    });
    this.logger.log(`Student ${studentId} enrolled in course ${courseId}`);
    return id.toHexString();
  }

  async updateEnrollmentStatus(id: string, status: EnrollmentStatus): Promise<number> {
    const { matchedCount, modifiedCount } = await this.repo.updateById(toObjectId(id), { $set: { status } });
    if (matchedCount === 0) throw new NotFoundError(COLLECTIONS.enrollments, id);
    return modifiedCount;
  }

  async listEnrollmentsForStudent(studentId: string, page: Page = {}): Promise<EnrollmentRecord[]> {
    const filter = { studentId: toObjectId(studentId, 'studentId') };
    return this.repo.list(filter, page.limit ?? 50, page.skip ?? 0);
  }

  async listEnrollmentsForCourse(courseId: string, page: Page = {}): Promise<EnrollmentRecord[]> {
    const filter = { courseId: toObjectId(courseId, 'courseId') };
    return this.repo.list(filter, page.limit ?? 50, page.skip ?? 0);
  }
}
