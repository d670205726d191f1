import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Types } from 'mongoose';

export const ENROLLMENT_STATUSES = ['active', 'completed', 'dropped'] as const;
export type EnrollmentStatus = (typeof ENROLLMENT_STATUSES)[number];

export type EnrollmentRecord = Enrollment & { _id: Types.ObjectId };

@Schema({ collection: 'enrollments', versionKey: false })
export class Enrollment {
  @Prop({ type: Types.ObjectId, ref: 'User' })
  studentId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'Course' })
  courseId!: Types.ObjectId;

  @Prop({ type: Date })
  enrollmentDate!: Date;

  @Prop({ type: String })
  status!: EnrollmentStatus;
}

export const EnrollmentSchema = SchemaFactory.createForClass(Enrollment);
