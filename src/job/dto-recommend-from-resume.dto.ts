import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString, Max, MaxLength } from 'class-validator';

export class RecommendFromResumeDto {
  @IsString()
  @IsOptional()
  @MaxLength(20000)
  resumeText?: string;

  @Type(() => Number)
  @IsInt()
  @IsOptional()
  @Max(50)
  topN?: number;

  @IsString()
  @IsOptional()
  @MaxLength(20)
  experienceLevel?: string;

  @IsString()
  @IsOptional()
  @MaxLength(120)
  location?: string;
}
