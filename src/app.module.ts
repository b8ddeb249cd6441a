import { Module } from '@nestjs/common';
import { CareerModule } from './career/career.module';
import { ChatbotModule } from './chatbot/chatbot.module';
import { CommonModule } from './common/common.module';
import { JobModule } from './job/job.module';
import { ReferenceModule } from './reference/reference.module';
import { ResumeModule } from './resume/resume.module';

@Module({
  imports: [CommonModule, JobModule, CareerModule, ResumeModule, ChatbotModule, ReferenceModule],
})
export class AppModule {}
