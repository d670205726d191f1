import { PipelineStage, Types } from 'mongoose';
import { COLLECTIONS } from '../schema/validators/collection-schemas';

/** Row as produced by the pipeline, before ids are stringified. */
export interface EnrollmentStatsAggregate {
  courseId: Types.ObjectId;
  courseTitle: string;
  totalEnrollments: number;
  activeStudents: number;
  enrollmentRate: number;
}

export interface EnrollmentStatsRow {
  courseId: string;
  courseTitle: string;
  totalEnrollments: number;
  activeStudents: number;
  /** activeStudents / totalEnrollments, in [0, 1] */
  enrollmentRate: number;
}

// Stage order matters: $project reads the counters $group introduces and the
// course $unwind flattens. $unwind without preserveNullAndEmptyArrays drops
// groups whose course no longer exists. Every group holds at least one
// enrollment, so the division is never by zero.
export function buildEnrollmentStatsPipeline(): PipelineStage[] {
  return [
    {
      $group: {
        _id: '$courseId',
        totalEnrollments: { $sum: 1 },
        activeStudents: { $sum: { $cond: [{ $eq: ['$status', 'active'] }, 1, 0] } },
      },
    },
    {
      $lookup: {
        from: COLLECTIONS.courses,
        localField: '_id',
        foreignField: '_id',
        as: 'course',
      },
    },
    { $unwind: '$course' },
    {
      $project: {
        _id: 0,
        courseId: '$_id',
        courseTitle: '$course.title',
        totalEnrollments: 1,
        activeStudents: 1,
        enrollmentRate: { $divide: ['$activeStudents', '$totalEnrollments'] },
      },
    },
  ];
}
