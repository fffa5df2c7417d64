import {
  IsDateString,
  IsEmail,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUUID,
  Length,
  Matches,
  Max,
  Min,
  MinLength,
} from 'class-validator';
import { Gender } from '../../common/enums/gender.enum';
import { GeneratedBy } from '../enums/generated-by.enum';

const PHONE_PATTERN = /^\+?\d{10,14}$/;

export class CreateApplicationDto {
  @IsString() @IsNotEmpty() @Length(1, 100)
  name!: string;

  @IsEmail()
  email!: string;

  @Matches(PHONE_PATTERN, { message: 'phone must be 10-14 digits' })
  phone!: string;

  @IsDateString()
  dateOfBirth!: string;

  @IsEnum(Gender)
  gender!: Gender;

  @IsUUID()
  courseId!: string;

  @IsString() @MinLength(8)
  password!: string;

  @IsOptional() @IsString()
  address?: string;

  @IsOptional() @IsString() @Length(1, 50)
  city?: string;

  @IsOptional() @IsString() @Length(1, 50)
  state?: string;

  @IsOptional() @Matches(/^\d{6}$/, { message: 'pincode must be 6 digits' })
  pincode?: string;

  @IsOptional() @IsString() @Length(1, 100)
  fatherName?: string;

  @IsOptional() @IsString() @Length(1, 100)
  motherName?: string;

  @IsOptional() @IsString() @Length(1, 100)
  guardianName?: string;

  @IsOptional() @Matches(PHONE_PATTERN, { message: 'guardianPhone must be 10-14 digits' })
  guardianPhone?: string;

  @IsOptional() @IsEmail()
  guardianEmail?: string;

  @IsOptional() @Matches(PHONE_PATTERN, { message: 'emergencyContact must be 10-14 digits' })
  emergencyContact?: string;

  @IsOptional() @IsString()
  medicalConditions?: string;

  @IsOptional() @IsString()
  previousEducation?: string;

  @IsOptional() @IsInt() @Min(0) @Max(100)
  tenthPercentage?: number;

  @IsOptional() @IsInt() @Min(0) @Max(100)
  twelfthPercentage?: number;

  @IsOptional() @IsInt() @Min(0)
  entranceExamScore?: number;

  @IsOptional() @IsEnum(GeneratedBy)
  generatedBy?: GeneratedBy;
}
