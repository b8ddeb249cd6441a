import { ArrayMaxSize, IsArray, IsOptional, IsString, MaxLength } from 'class-validator';

export class SkillGapDto {
  @IsArray()
  @ArrayMaxSize(100)
  @IsString({ each: true })
  @MaxLength(80, { each: true })
  skills!: string[];

  @IsString()
  @MaxLength(120)
  targetRole!: string;

  @IsString()
  @IsOptional()
  @MaxLength(20)
  experienceLevel?: string;
}
