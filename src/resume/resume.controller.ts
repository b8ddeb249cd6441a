import { Body, Controller, HttpCode, Post, UploadedFile, UseInterceptors } from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { MAX_UPLOAD_BYTES } from '../common/services/cv-parser.service';
import { ScoreResumeDto } from './dto-score-resume.dto';
import { ResumeService } from './resume.service';

@Controller('api/resume')
export class ResumeController {
  constructor(private readonly resumeService: ResumeService) {}

  @Post('score')
  @HttpCode(200)
  @UseInterceptors(FileInterceptor('file', { limits: { fileSize: MAX_UPLOAD_BYTES } }))
  async score(@UploadedFile() file: Express.Multer.File | undefined, @Body() dto: ScoreResumeDto) {
    return { success: true, data: await this.resumeService.score(dto, file) };
  }
}
