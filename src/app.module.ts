import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { CourseModule } from './course/course.module';
import { StaffModule } from './staff/staff.module';
import { StudentsModule } from './student/student.module';
import { AdmissionModule } from './admission/admission.module';
import { ExaminationModule } from './examination/examination.module';

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,
    CourseModule,
    StaffModule,
    StudentsModule,
    AdmissionModule,
    ExaminationModule,
  ],
})
export class AppModule {}
