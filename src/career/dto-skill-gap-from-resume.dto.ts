import { IsOptional, IsString, MaxLength } from 'class-validator';

export class SkillGapFromResumeDto {
  @IsString()
  @IsOptional()
  @MaxLength(20000)
  resumeText?: string;

  @IsString()
  @MaxLength(120)
  targetRole!: string;

  @IsString()
  @IsOptional()
  @MaxLength(20)
  experienceLevel?: string;
}
