import { Body, Controller, Get, HttpCode, Post, UploadedFile, UseInterceptors } from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { MAX_UPLOAD_BYTES } from '../common/services/cv-parser.service';
import { CareerService } from './career.service';
import { SkillGapFromResumeDto } from './dto-skill-gap-from-resume.dto';
import { SkillGapDto } from './dto-skill-gap.dto';

@Controller('api/career')
export class CareerController {
  constructor(private readonly careerService: CareerService) {}

  @Get('roles')
  roles() {
    return { success: true, data: this.careerService.roles() };
  }

  @Post('skill-gap')
  @HttpCode(200)
  skillGap(@Body() dto: SkillGapDto) {
    return { success: true, data: this.careerService.analyze(dto) };
  }

  @Post('skill-gap/resume')
  @HttpCode(200)
  @UseInterceptors(FileInterceptor('file', { limits: { fileSize: MAX_UPLOAD_BYTES } }))
  async skillGapFromResume(@UploadedFile() file: Express.Multer.File | undefined, @Body() dto: SkillGapFromResumeDto) {
    return { success: true, data: await this.careerService.analyzeFromResume(dto, file) };
  }
}
