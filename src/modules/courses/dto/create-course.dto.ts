import { CourseLevel } from '../schemas/course.schema';

export interface CreateCourseDto {
  title: string;
  /** users._id of the instructor, as a hex string */
  instructorId: string;
  category: string;
  level: CourseLevel;
  price: number;
  tags?: string[];
  isPublished?: boolean;
}
