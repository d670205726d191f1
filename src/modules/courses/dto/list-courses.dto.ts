import { CourseLevel } from '../schemas/course.schema';

export interface ListCoursesDto {
  category?: string;
  level?: CourseLevel;
  tag?: string;
  publishedOnly?: boolean;
  limit?: number;
  skip?: number;
}
