// src/course/dto/create-course.dto.ts
import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsInt,
  IsBoolean,
  Length,
  Min,
} from 'class-validator';

export class CreateCourseDto {
  @IsString()
  @IsNotEmpty()
  @Length(1, 50)
  programLevel!: string;

  @IsString()
  @IsNotEmpty()
  @Length(1, 100)
  degreeName!: string;

  @IsString()
  @IsNotEmpty()
  @Length(1, 200)
  courseName!: string;

  @IsString()
  @IsNotEmpty()
  @Length(1, 20)
  courseCode!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  durationYears?: number;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  feesPerSemester?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  totalSeats?: number;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}
