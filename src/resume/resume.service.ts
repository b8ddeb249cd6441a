import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { CvParserService, UploadedCv } from '../common/services/cv-parser.service';
import { ReferenceDataService } from '../common/services/reference-data.service';
import { ResumeScorerService } from '../common/services/resume-scorer.service';
import { SkillExtractorService } from '../common/services/skill-extractor.service';
import { ExtractionResult, RubricResult } from '../common/types';
import { ExtractSkillsDto } from './dto-extract-skills.dto';
import { ScoreResumeDto } from './dto-score-resume.dto';

@Injectable()
export class ResumeService {
  private readonly logger = new Logger(ResumeService.name);

  constructor(
    private readonly referenceData: ReferenceDataService,
    private readonly extractor: SkillExtractorService,
    private readonly scorer: ResumeScorerService,
    private readonly cvParser: CvParserService,
  ) {}

  async score(dto: ScoreResumeDto, file?: UploadedCv): Promise<RubricResult> {
    const resumeText = await this.cvParser.parseCv(dto.resumeText, file);
    return this.scoreText(resumeText, dto.targetRole);
  }

  scoreText(resumeText: string, targetRole?: string): RubricResult {
    const result = this.scorer.score(resumeText, this.referenceData.snapshot(), targetRole);
    this.logger.log(
      `Resume score | chars=${resumeText.length} | role=${result.targetRole ?? '-'} | overall=${result.overall} | grade=${result.grade}`,
    );
    return result;
  }

  /** An explicit skill list wins over free text when both are sent. */
  extractSkills(dto: ExtractSkillsDto): ExtractionResult {
    const { taxonomy } = this.referenceData.snapshot();
    if (dto.skills) {
      return this.extractor.extract(dto.skills, taxonomy);
    }
    if (dto.text !== undefined) {
      return this.extractor.extract(dto.text, taxonomy);
    }
    throw new BadRequestException('Provide either "skills" or "text"');
  }
}
