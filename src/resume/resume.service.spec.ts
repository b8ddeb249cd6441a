import { BadRequestException, Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { CvParserService } from '../common/services/cv-parser.service';
import { ResumeScorerService } from '../common/services/resume-scorer.service';
import { SkillExtractorService } from '../common/services/skill-extractor.service';
import { referenceDataProvider } from '../testing/reference.fixture';
import { ResumeService } from './resume.service';

describe('ResumeService', () => {
  let service: ResumeService;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    const moduleRef = await Test.createTestingModule({
      providers: [ResumeService, SkillExtractorService, ResumeScorerService, CvParserService, referenceDataProvider()],
    }).compile();
    service = moduleRef.get(ResumeService);
  });

  afterEach(() => jest.restoreAllMocks());

  it('scores typed text merged with an uploaded file', async () => {
    const file = { originalname: 'contact.md', mimetype: 'text/markdown', buffer: Buffer.from('test@example.com') };
    const result = await service.score({ resumeText: 'Skills\nPython', targetRole: 'Backend Developer' }, file);

    expect(result.targetRole).toBe('Backend Developer');
    expect(result.dimensionScores.contactInfo).toBe(4);
    expect(result.dimensionScores.sections).toBe(3);
    expect(result.detectedSkills).toEqual(['Python']);
  });

  it('rejects an empty resume', async () => {
    await expect(service.score({ resumeText: '   ' })).rejects.toMatchObject({
      reason: 'EMPTY_RESUME',
      message: 'no content to score',
    });
  });

  it('extracts from an explicit list in preference to text', () => {
    const result = service.extractSkills({ skills: ['k8s', 'Fortran'], text: 'Python' });

    expect(result).toEqual({ canonical: ['Kubernetes'], byCategory: { 'cloud-devops': ['Kubernetes'] }, unrecognized: ['Fortran'] });
  });

  it('extracts from free text', () => {
    expect(service.extractSkills({ text: 'ML with python3 and dl' }).canonical).toEqual([
      'Machine Learning',
      'Python',
      'Deep Learning',
    ]);
  });

  it('requires skills or text', () => {
    expect(() => service.extractSkills({})).toThrow(BadRequestException);
  });
});
