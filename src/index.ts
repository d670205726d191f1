export { AppModule } from './app.module';
export { DatabaseModule } from './database/database.module';
export { default as configuration, buildMongoUri, EDUHUB_DB_NAME } from './config/config.env';
export type { MongoConfig } from './config/config.env';

export * from './common/errors/eduhub.errors';
export { translateMongoError } from './common/errors/mongo-error.translator';
export { toObjectId } from './common/ids/object-id';

export { SchemaModule } from './modules/schema/schema.module';
export { SchemaManagerService } from './modules/schema/schema-manager.service';
export { EDUHUB_INDEXES } from './modules/schema/indexes';
export * from './modules/schema/validators/collection-schemas';
export * from './modules/schema/validators/field-spec';

export { UsersModule } from './modules/users/users.module';
export { UsersService } from './modules/users/users.service';
export * from './modules/users/schemas/user.schema';
export type { CreateUserDto } from './modules/users/dto/create-user.dto';
export type { UpdateUserProfileDto } from './modules/users/dto/update-user-profile.dto';

export { CoursesModule } from './modules/courses/courses.module';
export { CoursesService } from './modules/courses/courses.service';
export type { CourseWithInstructor } from './modules/courses/courses.service';
export * from './modules/courses/schemas/course.schema';
export type { CreateCourseDto } from './modules/courses/dto/create-course.dto';
export type { ListCoursesDto } from './modules/courses/dto/list-courses.dto';

export { EnrollmentsModule } from './modules/enrollments/enrollments.module';
export { EnrollmentsService } from './modules/enrollments/enrollments.service';
export * from './modules/enrollments/schemas/enrollment.schema';

export { ReportsModule } from './modules/reports/reports.module';
export { ReportsService } from './modules/reports/reports.service';
export type { EnrollmentStatsRow } from './modules/reports/enrollment-stats.pipeline';
