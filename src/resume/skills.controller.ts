import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { ExtractSkillsDto } from './dto-extract-skills.dto';
import { ResumeService } from './resume.service';

@Controller('api/skills')
export class SkillsController {
  constructor(private readonly resumeService: ResumeService) {}

  @Post('extract')
  @HttpCode(200)
  extract(@Body() dto: ExtractSkillsDto) {
    return { success: true, data: this.resumeService.extractSkills(dto) };
  }
}
