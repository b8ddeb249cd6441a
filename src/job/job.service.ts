import { Injectable, Logger } from '@nestjs/common';
import { ValidationFault } from '../common/errors';
import { CvParserService, UploadedCv } from '../common/services/cv-parser.service';
import { parseExperienceLevel, RecommendationEngineService } from '../common/services/recommendation-engine.service';
import { ReferenceDataService } from '../common/services/reference-data.service';
import { SkillExtractorService } from '../common/services/skill-extractor.service';
import { ExtractionResult, RecommendationResult, ReferenceSnapshot } from '../common/types';
import { RecommendFromResumeDto } from './dto-recommend-from-resume.dto';
import { RecommendDto } from './dto-recommend.dto';

export interface RecommendationReport {
  recommendations: RecommendationResult[];
  totalJobsEvaluated: number;
  filtersApplied: { experienceLevel?: string; location?: string };
  detectedSkills: string[];
  unrecognizedSkills: string[];
}

type RecommendFilters = Pick<RecommendDto, 'topN' | 'experienceLevel' | 'location'>;

@Injectable()
export class JobService {
  private readonly logger = new Logger(JobService.name);

  constructor(
    private readonly referenceData: ReferenceDataService,
    private readonly extractor: SkillExtractorService,
    private readonly engine: RecommendationEngineService,
    private readonly cvParser: CvParserService,
  ) {}

  recommend(dto: RecommendDto): RecommendationReport {
    const snapshot = this.referenceData.snapshot();
    const extraction = this.extractor.extract(dto.skills, snapshot.taxonomy);
    return this.rank(snapshot, extraction, dto);
  }

  async recommendFromResume(dto: RecommendFromResumeDto, file?: UploadedCv): Promise<RecommendationReport> {
    const resumeText = await this.cvParser.parseCv(dto.resumeText, file);
    if (!resumeText) {
      throw new ValidationFault('EMPTY_RESUME', 'no resume content to extract skills from');
    }

    const snapshot = this.referenceData.snapshot();
    const extraction = this.extractor.extract(resumeText, snapshot.taxonomy);
    return this.rank(snapshot, extraction, dto);
  }

  private rank(snapshot: ReferenceSnapshot, extraction: ExtractionResult, filters: RecommendFilters): RecommendationReport {
    if (filters.topN !== undefined && filters.topN < 1) {
      throw new ValidationFault('INVALID_TOP_N', `topN must be a positive integer, got ${filters.topN}`);
    }

    const options = { topN: filters.topN, experienceLevel: filters.experienceLevel, location: filters.location };
    const recommendations = this.engine.recommend(extraction.canonical, snapshot.postings, options);
    const totalJobsEvaluated = this.engine.filterPostings(snapshot.postings, options).length;

    const filtersApplied: RecommendationReport['filtersApplied'] = {};
    const level = parseExperienceLevel(filters.experienceLevel);
    if (level) filtersApplied.experienceLevel = level;
    const location = filters.location?.trim();
    if (location) filtersApplied.location = location;

    this.logger.log(
      `Recommendation | skills=${extraction.canonical.length} | evaluated=${totalJobsEvaluated} | returned=${recommendations.length}`,
    );

    return {
      recommendations,
      totalJobsEvaluated,
      filtersApplied,
      detectedSkills: extraction.canonical,
      unrecognizedSkills: extraction.unrecognized,
    };
  }
}
