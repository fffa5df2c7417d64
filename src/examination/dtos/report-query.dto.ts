import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString, IsUUID, Matches, Max, Min } from 'class-validator';
import { ACADEMIC_YEAR_PATTERN } from './schedule-examination.dto';

export class ClassPerformanceQueryDto {
  @IsUUID()
  courseId!: string;

  @Type(() => Number) @IsInt() @Min(1) @Max(12)
  semester!: number;

  @Matches(ACADEMIC_YEAR_PATTERN, { message: 'academicYear must look like 2025-26' })
  academicYear!: string;

  @IsOptional() @IsString()
  subjectCode?: string;
}

export class SemesterQueryDto {
  @IsOptional() @Type(() => Number) @IsInt() @Min(1) @Max(12)
  semester?: number;
}

export class RequiredSemesterQueryDto {
  @Type(() => Number) @IsInt() @Min(1) @Max(12)
  semester!: number;
}
