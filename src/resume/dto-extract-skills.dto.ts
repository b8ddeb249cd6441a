import { ArrayMaxSize, IsArray, IsOptional, IsString, MaxLength } from 'class-validator';

export class ExtractSkillsDto {
  @IsArray()
  @IsOptional()
  @ArrayMaxSize(100)
  @IsString({ each: true })
  @MaxLength(80, { each: true })
  skills?: string[];

  @IsString()
  @IsOptional()
  @MaxLength(20000)
  text?: string;
}
