import { Global, Module } from '@nestjs/common';
import { CvParserService } from './services/cv-parser.service';
import { RecommendationEngineService } from './services/recommendation-engine.service';
import { ReferenceDataService } from './services/reference-data.service';
import { ResumeScorerService } from './services/resume-scorer.service';
import { SkillExtractorService } from './services/skill-extractor.service';
import { SkillGapAnalyzerService } from './services/skill-gap-analyzer.service';

const providers = [
  ReferenceDataService,
  SkillExtractorService,
  RecommendationEngineService,
  SkillGapAnalyzerService,
  ResumeScorerService,
  CvParserService,
];

@Global()
@Module({
  providers,
  exports: providers,
})
export class CommonModule {}
