import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { CvParserService } from '../common/services/cv-parser.service';
import { SkillExtractorService } from '../common/services/skill-extractor.service';
import { SkillGapAnalyzerService } from '../common/services/skill-gap-analyzer.service';
import { ReferenceDataService } from '../common/services/reference-data.service';
import { referenceDataProvider, referenceSnapshot } from '../testing/reference.fixture';
import { CareerController } from './career.controller';
import { CareerService } from './career.service';

describe('CareerController', () => {
  let controller: CareerController;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    const moduleRef = await Test.createTestingModule({
      controllers: [CareerController],
      providers: [CareerService, SkillExtractorService, SkillGapAnalyzerService, CvParserService, referenceDataProvider()],
    }).compile();
    controller = moduleRef.get(CareerController);
  });

  afterEach(() => jest.restoreAllMocks());

  it('lists roles with their level skills', () => {
    const { success, data } = controller.roles();

    expect(success).toBe(true);
    expect(data[0]).toEqual({
      role: 'Data Scientist',
      levels: [
        { name: 'beginner', skills: ['Python', 'SQL', 'Statistics'] },
        { name: 'intermediate', skills: ['Pandas', 'Machine Learning'] },
        { name: 'advanced', skills: ['Deep Learning'] },
      ],
    });
    expect(data.map((r) => r.role)).toEqual(['Data Scientist', 'Backend Developer']);
  });

  it('analyzes an explicit skill list', () => {
    const { data } = controller.skillGap({ skills: ['python', 'git', 'Cobol'], targetRole: 'Backend Developer' });

    expect(data.detectedSkills).toEqual(['Python', 'Git']);
    expect(data.unrecognizedSkills).toEqual(['Cobol']);
    expect(data.levels[0]).toMatchObject({ name: 'beginner', known: ['Python', 'Git'], missing: ['SQL'] });
    expect(data.completionPercent).toBe(25);
    expect(data.etaWeeks).toBe(2 + 3 * 3 + 2 * 4);
    expect(data.readiness.level).toBe('low-medium');
  });

  it('analyzes skills found in resume text', async () => {
    const { data } = await controller.skillGapFromResume(undefined, {
      resumeText: 'Analyst with SQL, stats and Pandas experience',
      targetRole: 'Data Scientist',
      experienceLevel: 'intermediate',
    });

    expect(data.detectedSkills).toEqual(['SQL', 'Statistics', 'Pandas']);
    expect(data.startingLevel).toBe('intermediate');
    expect(data.prioritizedMissing.map((s) => s.skill)).toEqual(['Machine Learning', 'Deep Learning']);
  });

  it('surfaces an unknown role as a validation fault', () => {
    expect(() => controller.skillGap({ skills: ['Python'], targetRole: 'Astronaut' })).toThrow(
      expect.objectContaining({ reason: 'UNKNOWN_ROLE' }),
    );
  });

  it('requires resume content', async () => {
    await expect(controller.skillGapFromResume(undefined, { targetRole: 'Data Scientist' })).rejects.toMatchObject({
      reason: 'EMPTY_RESUME',
    });
  });

  it('reads the reference snapshot once per analysis', async () => {
    const snapshot = jest.fn(() => referenceSnapshot());
    const moduleRef = await Test.createTestingModule({
      providers: [
        CareerService,
        SkillExtractorService,
        SkillGapAnalyzerService,
        CvParserService,
        { provide: ReferenceDataService, useValue: { snapshot } },
      ],
    }).compile();
    const service = moduleRef.get(CareerService);

    service.analyze({ skills: ['Python'], targetRole: 'Data Scientist' });
    await service.analyzeFromResume({ resumeText: 'Python and SQL', targetRole: 'Data Scientist' });

    expect(snapshot).toHaveBeenCalledTimes(2);
  });
});
