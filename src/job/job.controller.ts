import { Body, Controller, HttpCode, Post, UploadedFile, UseInterceptors } from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { MAX_UPLOAD_BYTES } from '../common/services/cv-parser.service';
import { RecommendFromResumeDto } from './dto-recommend-from-resume.dto';
import { RecommendDto } from './dto-recommend.dto';
import { JobService } from './job.service';

@Controller('api/job')
export class JobController {
  constructor(private readonly jobService: JobService) {}

  @Post('recommend')
  @HttpCode(200)
  recommend(@Body() dto: RecommendDto) {
    return { success: true, data: this.jobService.recommend(dto) };
  }

  @Post('recommend/resume')
  @HttpCode(200)
  @UseInterceptors(FileInterceptor('file', { limits: { fileSize: MAX_UPLOAD_BYTES } }))
  async recommendFromResume(@UploadedFile() file: Express.Multer.File | undefined, @Body() dto: RecommendFromResumeDto) {
    return { success: true, data: await this.jobService.recommendFromResume(dto, file) };
  }
}
