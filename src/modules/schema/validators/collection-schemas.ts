import { COURSE_LEVELS } from '../../courses/schemas/course.schema';
import { ENROLLMENT_STATUSES } from '../../enrollments/schemas/enrollment.schema';
import { USER_ROLES } from '../../users/schemas/user.schema';
import { CollectionSchema } from './field-spec';

export const COLLECTIONS = {
  users: 'users',
  courses: 'courses',
  enrollments: 'enrollments',
} as const;

export type CollectionName = (typeof COLLECTIONS)[keyof typeof COLLECTIONS];

export const EMAIL_PATTERN = '^\\S+@\\S+$';

export const USERS_SCHEMA: CollectionSchema = {
  email: { kind: 'string', required: true, pattern: EMAIL_PATTERN, description: 'must be a valid email' },
  firstName: { kind: 'string', required: true },
  lastName: { kind: 'string', required: true },
  role: { kind: 'string', required: true, enum: USER_ROLES },
  dateJoined: { kind: 'date', required: true },
  isActive: { kind: 'bool', required: true },
};

export const COURSES_SCHEMA: CollectionSchema = {
  title: { kind: 'string', required: true },
  instructorId: { kind: 'objectId', required: true },
  category: { kind: 'string', required: true },
  level: { kind: 'string', required: true, enum: COURSE_LEVELS },
  price: { kind: 'number', required: true, minimum: 0, description: 'must be a non-negative number' },
  isPublished: { kind: 'bool', required: true },
  tags: { kind: 'stringArray', required: false },
  createdAt: { kind: 'date', required: true },
  updatedAt: { kind: 'date', required: true },
};

export const ENROLLMENTS_SCHEMA: CollectionSchema = {
  studentId: { kind: 'objectId', required: true },
  courseId: { kind: 'objectId', required: true },
  enrollmentDate: { kind: 'date', required: true },
  status: { kind: 'string', required: true, enum: ENROLLMENT_STATUSES },
};

export const COLLECTION_SCHEMAS: Readonly<Record<CollectionName, CollectionSchema>> = {
  users: USERS_SCHEMA,
  courses: COURSES_SCHEMA,
  enrollments: ENROLLMENTS_SCHEMA,
};
