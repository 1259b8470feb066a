import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class ScreenRequestDto {
  @IsString()
  @IsNotEmpty()
  job_description!: string;

  /** Optional when a resume file is uploaded in the same request. */
  @IsOptional()
  @IsString()
  resume_text?: string;
}
