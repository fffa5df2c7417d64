import { IsDateString, IsEnum, IsInt, IsNotEmpty, IsOptional, IsString, IsUUID, Length, Matches, Max, Min } from 'class-validator';
import { ExamType } from '../enums/exam-type.enum';

export const ACADEMIC_YEAR_PATTERN = /^\d{4}-\d{2}$/;

export class ScheduleExaminationDto {
  @IsString() @IsNotEmpty() @Length(1, 20)
  studentId!: string;

  @IsUUID()
  courseId!: string;

  @IsOptional() @IsEnum(ExamType)
  examType?: ExamType;

  @IsString() @IsNotEmpty() @Length(1, 100)
  subjectName!: string;

  @IsString() @IsNotEmpty() @Length(1, 20)
  subjectCode!: string;

  @IsInt() @Min(1) @Max(12)
  semester!: number;

  @Matches(ACADEMIC_YEAR_PATTERN, { message: 'academicYear must look like 2025-26' })
  academicYear!: string;

  @IsDateString()
  examDate!: string;

  @IsOptional() @IsInt() @Min(1)
  maxMarks?: number;
}
