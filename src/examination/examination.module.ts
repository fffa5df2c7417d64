import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Examination } from './entities/examination.entity';
import { ExaminationService } from './examination.service';
import { ExaminationReportsService } from './examination-reports.service';
import { ExaminationController } from './examination.controller';
import { StaffModule } from '../staff/staff.module';

@Module({
  imports: [TypeOrmModule.forFeature([Examination]), StaffModule],
  controllers: [ExaminationController],
  providers: [ExaminationService, ExaminationReportsService],
  exports: [ExaminationService, ExaminationReportsService],
})
export class ExaminationModule {}
