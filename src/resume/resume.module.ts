import { Module } from '@nestjs/common';
import { ResumeController } from './resume.controller';
import { ResumeService } from './resume.service';
import { SkillsController } from './skills.controller';

@Module({
  controllers: [ResumeController, SkillsController],
  providers: [ResumeService],
  exports: [ResumeService],
})
export class ResumeModule {}
