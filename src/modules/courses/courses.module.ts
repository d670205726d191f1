import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { UsersModule } from '../users/users.module';
import { Course, CourseSchema } from './schemas/course.schema';
import { CourseRepo } from './repos/course.repo';
import { CoursesService } from './courses.service';

@Module({
  imports: [MongooseModule.forFeature([{ name: Course.name, schema: CourseSchema }]), UsersModule],
  providers: [CourseRepo, CoursesService],
  exports: [CoursesService, CourseRepo],
})
export class CoursesModule {}
