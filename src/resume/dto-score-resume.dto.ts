import { IsOptional, IsString, MaxLength } from 'class-validator';

export class ScoreResumeDto {
  @IsString()
  @IsOptional()
  @MaxLength(20000)
  resumeText?: string;

  @IsString()
  @IsOptional()
  @MaxLength(120)
  targetRole?: string;
}
