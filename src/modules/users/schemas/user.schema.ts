import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Types } from 'mongoose';

export const USER_ROLES = ['student', 'instructor'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export type UserRecord = User & { _id: Types.ObjectId };

// constraints (required, enum, email pattern, unique email) live in the
// collection validator and indexes, see modules/schema
@Schema({ collection: 'users', versionKey: false })
export class User {
  @Prop({ type: String })
  email!: string;

  @Prop({ type: String })
  firstName!: string;

  @Prop({ type: String })
  lastName!: string;

  @Prop({ type: String })
  role!: UserRole;

  @Prop({ type: Date })
  dateJoined!: Date;

  @Prop({ type: Boolean })
  isActive!: boolean;
}

export const UserSchema = SchemaFactory.createForClass(User);
