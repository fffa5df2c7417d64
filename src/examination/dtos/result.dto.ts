import { IsBoolean, IsInt, IsOptional, IsString, IsUUID, Min, ValidateIf } from 'class-validator';

// Marks may be omitted when the attempt is voided by absence or malpractice.
export class DeclareResultDto {
  @ValidateIf((o: DeclareResultDto) => !o.isAbsent && !o.hasMalpractice)
  @IsInt() @Min(0)
  marksObtained?: number;

  @IsOptional() @IsInt() @Min(0)
  internalMarks?: number;

  @IsOptional() @IsInt() @Min(0)
  externalMarks?: number;

  @IsOptional() @IsBoolean()
  isAbsent?: boolean;

  @IsOptional() @IsBoolean()
  hasMalpractice?: boolean;

  @IsOptional() @IsString()
  remarks?: string;

  @IsOptional() @IsUUID()
  staffId?: string;
}

export class UpdateResultDto extends DeclareResultDto {}
