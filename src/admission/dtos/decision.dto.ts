import { ArrayNotEmpty, IsArray, IsBoolean, IsNotEmpty, IsOptional, IsString, IsUUID } from 'class-validator';

export class ReviewApplicationDto {
  @IsOptional() @IsString()
  remarks?: string;
}

export class ApproveApplicationDto {
  @IsUUID()
  staffId!: string;

  @IsOptional() @IsString()
  remarks?: string;
}

export class WaitlistApplicationDto extends ApproveApplicationDto {}

export class DeclineApplicationDto {
  @IsUUID()
  staffId!: string;

  @IsString() @IsNotEmpty()
  reason!: string;
}

export class RequestDocumentsDto {
  @IsUUID()
  staffId!: string;

  @IsArray() @ArrayNotEmpty() @IsString({ each: true })
  documents!: string[];

  @IsOptional() @IsString()
  remarks?: string;
}

export class VerifyDocumentDto {
  @IsString() @IsNotEmpty()
  document!: string;

  @IsBoolean()
  verified!: boolean;
}

export class TrackApplicationDto {
  @IsString() @IsNotEmpty()
  password!: string;
}
