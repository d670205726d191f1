import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { Enrollment, EnrollmentSchema } from './schemas/enrollment.schema';
import { EnrollmentRepo } from './repos/enrollment.repo';
import { EnrollmentsService } from './enrollments.service';

@Module({
  imports: [MongooseModule.forFeature([{ name: Enrollment.name, schema: EnrollmentSchema }])],
  providers: [EnrollmentRepo, EnrollmentsService],
  exports: [EnrollmentsService, EnrollmentRepo],
})
export class EnrollmentsModule {}
