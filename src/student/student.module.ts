import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Student } from './entities/student.entity';
import { StudentsService } from './student.service';
import { APPLICATION_APPROVED_HANDLER } from '../admission/events/application-approved.event';

@Module({
  imports: [TypeOrmModule.forFeature([Student])],
  providers: [
    StudentsService,
    { provide: APPLICATION_APPROVED_HANDLER, useExisting: StudentsService },
  ],
  exports: [StudentsService, APPLICATION_APPROVED_HANDLER],
})
export class StudentsModule {}
