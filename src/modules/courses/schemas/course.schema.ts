import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Types } from 'mongoose';

export const COURSE_LEVELS = ['beginner', 'intermediate', 'advanced'] as const;
export type CourseLevel = (typeof COURSE_LEVELS)[number];

export type CourseRecord = Course & { _id: Types.ObjectId; createdAt: Date; updatedAt: Date };

@Schema({ collection: 'courses', timestamps: true, versionKey: false })
export class Course {
  @Prop({ type: String })
  title!: string;

  // points at users._id; not enforced by the database
  @Prop({ type: Types.ObjectId, ref: 'User' })
  instructorId!: Types.ObjectId;

  @Prop({ type: String })
  category!: string;

  @Prop({ type: String })
  level!: CourseLevel;

  @Prop({ type: Number })
  price!: number;

  @Prop({ type: Boolean, default: false })
  isPublished!: boolean;

  @Prop({ type: [String], default: undefined })
  tags?: string[];
}

export const CourseSchema = SchemaFactory.createForClass(Course);
