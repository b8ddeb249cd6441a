import { Module } from '@nestjs/common';
import { CareerModule } from '../career/career.module';
import { JobModule } from '../job/job.module';
import { ResumeModule } from '../resume/resume.module';
import { ChatbotController } from './chatbot.controller';
import { ChatbotService } from './chatbot.service';

@Module({
  imports: [JobModule, CareerModule, ResumeModule],
  controllers: [ChatbotController],
  providers: [ChatbotService],
})
export class ChatbotModule {}
