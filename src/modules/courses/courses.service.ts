import { Injectable, Logger } from '@nestjs/common';
import { FilterQuery } from 'mongoose';
import { NotFoundError } from '../../common/errors/eduhub.errors';
import { toObjectId } from '../../common/ids/object-id';
import { COLLECTIONS } from '../schema/validators/collection-schemas';
import { UserRepo } from '../users/repos/user.repo';
import { UserRecord } from '../users/schemas/user.schema';
import { CreateCourseDto } from './dto/create-course.dto';
import { ListCoursesDto } from './dto/list-courses.dto';
import { CourseRepo } from './repos/course.repo';
import { Course, CourseRecord } from './schemas/course.schema';

export interface CourseWithInstructor {
  course: CourseRecord;
  instructor: UserRecord | null;
}

@Injectable()
export class CoursesService {
  private readonly logger = new Logger(CoursesService.name);

  constructor(
    private readonly repo: CourseRepo,
    private readonly users: UserRepo,
  ) {}

  async createCourse(dto: CreateCourseDto): Promise<string> {
    const data: Course = {
      title: dto.title,
      instructorId: toObjectId(dto.instructorId, 'instructorId'),
      category: dto.category,
      level: dto.level,
      price: dto.price,
      isPublished: dto.isPublished ?? false,
    };
    if (dto.tags) data.tags = dto.tags;

    const id = await this.repo.create(data);
    this.logger.log(`Course created: ${id.toHexString()} "${dto.title}"`);
    return id.toHexString();
  }

  async findCourseById(id: string): Promise<CourseRecord | null> {
    return this.repo.findById(toObjectId(id));
  }

  listCourses(query: ListCoursesDto = {}): Promise<CourseRecord[]> {
    const filter: FilterQuery<Course> = {};
    if (query.category !== undefined) filter.category = query.category;
    if (query.level !== undefined) filter.level = query.level;
    if (query.tag !== undefined) filter.tags = query.tag;
    if (query.publishedOnly) filter.isPublished = true;
    return this.repo.list(filter, query.limit ?? 50, query.skip ?? 0);
  }

  /**
   * Only unpublished courses match, so a repeat call modifies nothing and
   * leaves updatedAt alone.
   */
  async markCourseAsPublished(id: string): Promise<number> {
    const _id = toObjectId(id);
    const { matchedCount, modifiedCount } = await this.repo.updateOne(
      { _id, isPublished: { $ne: true } },
      { $set: { isPublished: true } },
    );

    if (matchedCount === 0) {
      if (!(await this.repo.exists(_id))) throw new NotFoundError(COLLECTIONS.courses, id);
      return 0;
    }
    this.logger.log(`Course published: ${id}`);
    return modifiedCount;
  }

  async getCourseDetailsWithInstructor(id: string): Promise<CourseWithInstructor | null> {
    const course = await this.repo.findById(toObjectId(id));
    if (!course) {
      this.logger.warn(`Course not found: ${id}`);
      return null;
    }

    const instructor = await this.users.findById(course.instructorId);
    if (!instructor) {
      this.logger.warn(`Instructor ${course.instructorId.toHexString()} of course ${id} not found`);
    }
    return { course, instructor };
  }
}
