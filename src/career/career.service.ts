import { Injectable, Logger } from '@nestjs/common';
import { ValidationFault } from '../common/errors';
import { CvParserService, UploadedCv } from '../common/services/cv-parser.service';
import { ReferenceDataService } from '../common/services/reference-data.service';
import { SkillExtractorService } from '../common/services/skill-extractor.service';
import { SkillGapAnalyzerService } from '../common/services/skill-gap-analyzer.service';
import { ExtractionResult, GapReport, ReferenceSnapshot, RoadmapLevelName } from '../common/types';
import { SkillGapFromResumeDto } from './dto-skill-gap-from-resume.dto';
import { SkillGapDto } from './dto-skill-gap.dto';

export interface SkillGapReport extends GapReport {
  detectedSkills: string[];
  unrecognizedSkills: string[];
}

export interface RoleSummary {
  role: string;
  levels: Array<{ name: RoadmapLevelName; skills: string[] }>;
}

@Injectable()
export class CareerService {
  private readonly logger = new Logger(CareerService.name);

  constructor(
    private readonly referenceData: ReferenceDataService,
    private readonly extractor: SkillExtractorService,
    private readonly analyzer: SkillGapAnalyzerService,
    private readonly cvParser: CvParserService,
  ) {}

  analyze(dto: SkillGapDto): SkillGapReport {
    const snapshot = this.referenceData.snapshot();
    return this.report(snapshot, this.extractor.extract(dto.skills, snapshot.taxonomy), dto);
  }

  async analyzeFromResume(dto: SkillGapFromResumeDto, file?: UploadedCv): Promise<SkillGapReport> {
    const resumeText = await this.cvParser.parseCv(dto.resumeText, file);
    if (!resumeText) {
      throw new ValidationFault('EMPTY_RESUME', 'no resume content to extract skills from');
    }
    const snapshot = this.referenceData.snapshot();
    return this.report(snapshot, this.extractor.extract(resumeText, snapshot.taxonomy), dto);
  }

  roles(): RoleSummary[] {
    return this.referenceData.snapshot().roadmaps.map((roadmap) => ({
      role: roadmap.role,
      levels: roadmap.levels.map((level) => ({ name: level.name, skills: level.steps.map((s) => s.skill) })),
    }));
  }

  private report(
    snapshot: ReferenceSnapshot,
    extraction: ExtractionResult,
    request: { targetRole: string; experienceLevel?: string },
  ): SkillGapReport {
    const report = this.analyzer.analyze(extraction.canonical, request.targetRole, snapshot.roadmaps, request.experienceLevel);

    this.logger.log(
      `Skill gap | role=${report.role} | start=${report.startingLevel} | missing=${report.prioritizedMissing.length} | eta=${report.etaWeeks}w`,
    );

    return {
      ...report,
      detectedSkills: extraction.canonical,
      unrecognizedSkills: extraction.unrecognized,
    };
  }
}
