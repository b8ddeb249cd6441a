import { ArrayMaxSize, IsArray, IsInt, IsOptional, IsString, Max, MaxLength } from 'class-validator';

export class RecommendDto {
  @IsArray()
  @ArrayMaxSize(100)
  @IsString({ each: true })
  @MaxLength(80, { each: true })
  skills!: string[];

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
