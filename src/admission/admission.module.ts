import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AdmissionApplication } from './entities/admission-application.entity';
import { AdmissionService } from './admission.service';
import { AdmissionController } from './admission.controller';
import { CourseModule } from '../course/course.module';
import { StaffModule } from '../staff/staff.module';
import { StudentsModule } from '../student/student.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([AdmissionApplication]),
    CourseModule,
    StaffModule,
    // provides APPLICATION_APPROVED_HANDLER
    StudentsModule,
  ],
  controllers: [AdmissionController],
  providers: [AdmissionService],
  exports: [AdmissionService],
})
export class AdmissionModule {}
