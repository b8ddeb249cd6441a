import { Controller, Get, HttpCode, Post } from '@nestjs/common';
import { ReferenceDataService } from '../common/services/reference-data.service';
import { ReferenceSnapshot } from '../common/types';

function summarize(snapshot: ReferenceSnapshot) {
  return {
    version: snapshot.version,
    loadedAt: snapshot.loadedAt,
    skills: snapshot.taxonomy.skills.length,
    postings: snapshot.postings.length,
    roles: snapshot.roadmaps.length,
  };
}

@Controller('api')
export class ReferenceController {
  constructor(private readonly referenceData: ReferenceDataService) {}

  @Get('health')
  health() {
    return { success: true, data: { status: 'healthy', reference: summarize(this.referenceData.snapshot()) } };
  }

  @Post('reference/reload')
  @HttpCode(200)
  async reload() {
    return { success: true, data: summarize(await this.referenceData.reload()) };
  }
}
