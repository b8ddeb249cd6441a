import { referenceSnapshot } from '../../testing/reference.fixture';
import { thrownBy } from '../../testing/thrown-by';
import { ValidationFault } from '../errors';
import { gradeFor, ResumeScorerService } from './resume-scorer.service';
import { SkillExtractorService } from './skill-extractor.service';

const STRONG_RESUME = [
  'Jane Doe',
  'jane.doe@example.com | +91 98765 43210 | linkedin.com/in/janedoe',
  `Summary: ${'reliable backend engineer '.repeat(50).trim()}`,
  'Experience',
  '- Developed Django REST API services used by 50,000 users',
  '- Led migration to PostgreSQL, reduced query time by 40%',
  '- Built Docker images and Kubernetes deployments for 12 services',
  '- Optimized Python workers, saving $20k per year',
  'Education',
  'B.Tech Computer Science, 2019',
  'Skills',
  'Python, SQL, Git, Django, PostgreSQL, Docker',
  'Projects',
  '- Designed a job board with Python and SQL',
].join('\n');

describe('ResumeScorerService', () => {
  const scorer = new ResumeScorerService(new SkillExtractorService());
  const context = referenceSnapshot();

  it('gives a complete resume full marks', () => {
    const result = scorer.score(STRONG_RESUME, context, 'backend developer');

    expect(result.dimensionScores).toEqual({
      length: 10,
      impactVerbs: 10,
      quantifiedAchievements: 10,
      contactInfo: 10,
      sections: 10,
      atsKeywords: 10,
    });
    expect(result.overall).toBe(100);
    expect(result.grade).toBe('A');
    expect(result.tips).toEqual([]);
    expect(result.targetRole).toBe('Backend Developer');
    expect(result.keywordDensity).toBe(1);
    expect(result.roleAdvice).toEqual(['Ship a small API end to end.']);
  });

  it('scores missing contact details as 0 and says what to add', () => {
    const result = scorer.score('Experience\n- Developed data pipelines in Python', context);

    expect(result.dimensionScores.contactInfo).toBe(0);
    expect(result.tips).toContainEqual({
      dimension: 'contactInfo',
      message: 'Add your email address, phone number, LinkedIn or GitHub profile link so recruiters can reach you.',
    });
  });

  it('does not count a short local number as a phone', () => {
    const result = scorer.score('Contact: test@example.com, 555-1234', context);

    expect(result.dimensionScores.contactInfo).toBe(4);
    expect(result.tips).toContainEqual({
      dimension: 'contactInfo',
      message: 'Add your phone number, LinkedIn or GitHub profile link so recruiters can reach you.',
    });
  });

  it('emits one tip per weak dimension in dimension order', () => {
    const result = scorer.score('Worked on some projects with python and sql', context);

    expect(result.dimensionScores).toEqual({
      length: 2,
      impactVerbs: 0,
      quantifiedAchievements: 0,
      contactInfo: 0,
      sections: 0,
      atsKeywords: 2,
    });
    expect(result.overall).toBe(6);
    expect(result.grade).toBe('D');
    expect(result.summary).toBe('Significant improvements needed. Start with contact details and quantified achievements.');
    expect(result.detectedSkills).toEqual(['Python', 'SQL']);
    expect(result.keywordDensity).toBe(0.1538);
    expect(result.targetRole).toBeNull();
    expect(result.tips).toEqual([
      { dimension: 'length', message: 'Your resume is brief (8 words). Aim for 400-800 words.' },
      {
        dimension: 'impactVerbs',
        message:
          'Start bullet points with action verbs such as Developed, Led, Optimized, Automated or Delivered. Write "Developed a REST API serving 10k+ users" instead of "Worked on API".',
      },
      {
        dimension: 'quantifiedAchievements',
        message: 'Add measurable results, e.g. "Reduced page load time by 40%" or "Served 10,000+ daily users".',
      },
      {
        dimension: 'contactInfo',
        message: 'Add your email address, phone number, LinkedIn or GitHub profile link so recruiters can reach you.',
      },
      { dimension: 'sections', message: 'Add clearly labelled sections for: Experience, Education, Skills, Projects.' },
      {
        dimension: 'atsKeywords',
        message:
          'Only 2 recognizable technical skill(s) found. List your skills in a dedicated Skills section using the terms job descriptions use.',
      },
    ]);
  });

  it('measures keywords against the target role roadmap', () => {
    const result = scorer.score('Skills\nPython, SQL, Pandas', context, 'Data Scientist');

    expect(result.dimensionScores.sections).toBe(3);
    expect(result.dimensionScores.atsKeywords).toBe(10);
    expect(result.keywordDensity).toBe(0.5);
    expect(result.overall).toBe(27);
    expect(result.roleAdvice).toEqual(['Publish notebooks that tell a story.', 'Practice explaining models to non-experts.']);
    expect(result.tips[0]).toEqual({
      dimension: 'length',
      message: 'Your resume is brief (4 words). Aim for 400-800 words for Data Scientist roles.',
    });
    expect(result.tips.map((t) => t.dimension)).toEqual([
      'length',
      'impactVerbs',
      'quantifiedAchievements',
      'contactInfo',
      'sections',
    ]);
  });

  it('names the missing roadmap skills in the keyword tip', () => {
    const result = scorer.score('Skills\nPython', context, 'Backend Developer');

    expect(result.dimensionScores.atsKeywords).toBe(3);
    expect(result.tips).toContainEqual({
      dimension: 'atsKeywords',
      message: 'Add keywords Backend Developer screens look for: Git, SQL, Django, PostgreSQL, REST API.',
    });
  });

  it('falls back to general wording for an unknown role', () => {
    const result = scorer.score('Skills\nPython', context, 'Astronaut');

    expect(result.targetRole).toBeNull();
    expect(result.roleAdvice).toEqual([]);
  });

  it('does not read a year range and grade as a phone number', () => {
    const result = scorer.score('Education\nB.Tech Computer Science (2015-2019) 8.5 CGPA', context);

    expect(result.dimensionScores.contactInfo).toBe(0);
  });

  it.each(['+91 98765 43210', '(555) 123-4567', '555-123-4567', '9876543210'])('recognizes %s as a phone number', (phone) => {
    expect(scorer.score(`Call me on ${phone}`, context).dimensionScores.contactInfo).toBe(3);
  });

  it('only treats a number as a bullet marker when a space follows it', () => {
    const result = scorer.score('- Developed a payments service\n8.5 CGPA overall', context);

    expect(result.dimensionScores.impactVerbs).toBe(10);
  });

  it('counts quantified achievements stepwise', () => {
    const one = scorer.score('- Reduced costs by 30%', context);
    const two = scorer.score('- Reduced costs by 30%\n- Served 2,000 customers', context);

    expect(one.dimensionScores.quantifiedAchievements).toBe(4);
    expect(two.dimensionScores.quantifiedAchievements).toBe(7);
    expect(two.tips.map((t) => t.dimension)).not.toContain('quantifiedAchievements');
  });

  it('rejects empty text', () => {
    const error = thrownBy(() => scorer.score('  \n ', context));

    expect(error).toBeInstanceOf(ValidationFault);
    expect(error).toMatchObject({ reason: 'EMPTY_RESUME', message: 'no content to score' });
  });

  it('keeps every overall score within 0-100 with a matching grade', () => {
    const samples = [STRONG_RESUME, 'x', 'Skills\nPython', '- Developed things\n- Led people', 'Education\nProjects'];

    for (const sample of samples) {
      const result = scorer.score(sample, context);
      expect(result.overall).toBeGreaterThanOrEqual(0);
      expect(result.overall).toBeLessThanOrEqual(100);
      expect(result.grade).toBe(gradeFor(result.overall));
    }
  });
});

describe('gradeFor', () => {
  it('uses inclusive lower bounds', () => {
    expect([100, 85, 84, 70, 69, 50, 49, 0].map(gradeFor)).toEqual(['A', 'A', 'B', 'B', 'C', 'C', 'D', 'D']);
  });
});
