import { mongo } from 'mongoose';
import { CollectionName } from './validators/collection-schemas';

export const EDUHUB_INDEXES: Readonly<Record<CollectionName, mongo.IndexDescription[]>> = {
  users: [
    { key: { email: 1 }, name: 'email_unique', unique: true },
    { key: { role: 1 }, name: 'role' },
  ],
  courses: [
    { key: { title: 1 }, name: 'title' },
    { key: { category: 1 }, name: 'category' },
    { key: { tags: 1 }, name: 'tags' },
  ],
  enrollments: [{ key: { studentId: 1, courseId: 1 }, name: 'student_course_unique', unique: true }],
};
