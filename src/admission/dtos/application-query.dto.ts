import { IsDateString, IsEnum, IsOptional, IsUUID } from 'class-validator';
import { ApplicationStatus } from '../enums/application-status.enum';

export class ListApplicationsQueryDto {
  @IsOptional() @IsEnum(ApplicationStatus)
  status?: ApplicationStatus;

  @IsOptional() @IsUUID()
  courseId?: string;
}

export class StatisticsQueryDto {
  @IsOptional() @IsDateString()
  dateFrom?: string;

  @IsOptional() @IsDateString()
  dateTo?: string;
}
