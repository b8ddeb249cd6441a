import { Injectable } from '@nestjs/common';
import { ValidationFault } from '../errors';
import { EXPERIENCE_LEVELS, ExperienceLevel, JobPosting, RecommendationResult } from '../types';

export const DEFAULT_TOP_N = 5;

export interface RecommendOptions {
  topN?: number;
  experienceLevel?: string;
  location?: string;
}

export function parseExperienceLevel(value: string | undefined): ExperienceLevel | undefined {
  const token = (value || '').trim().toLowerCase();
  if (!token) return undefined;
  const level = EXPERIENCE_LEVELS.find((l) => l.toLowerCase() === token);
  if (!level) {
    throw new ValidationFault(
      'INVALID_EXPERIENCE_LEVEL',
      `Unknown experience level "${value}". Use one of: ${EXPERIENCE_LEVELS.join(', ')}`,
    );
  }
  return level;
}

/** Jaccard overlap as a percentage with two decimals; an empty requirement set scores 0. */
export function jaccardPercent(skills: ReadonlySet<string>, required: readonly string[]): { percent: number; matched: number } {
  const requiredSet = new Set(required);
  if (!requiredSet.size) return { percent: 0, matched: 0 };

  let matched = 0;
  for (const skill of requiredSet) {
    if (skills.has(skill)) matched += 1;
  }
  const union = skills.size + requiredSet.size - matched;
  if (matched === union) return { percent: 100, matched };
  // Only identical sets may report 100.
  return { percent: Math.min(99.99, Math.round((matched / union) * 10000) / 100), matched };
}

@Injectable()
export class RecommendationEngineService {
  recommend(skills: Iterable<string>, postings: readonly JobPosting[], options: RecommendOptions = {}): RecommendationResult[] {
    const candidates = this.filterPostings(postings, options);
    const skillSet = new Set(skills);
    if (!skillSet.size) return [];

    const topN = Number.isInteger(options.topN) && Number(options.topN) > 0 ? Number(options.topN) : DEFAULT_TOP_N;

    return candidates
      .map((job) => {
        const { percent, matched } = jaccardPercent(skillSet, job.requiredSkills);
        return { job, percent, matched };
      })
      .sort((a, b) => b.percent - a.percent || b.matched - a.matched || compareIds(a.job.id, b.job.id))
      .slice(0, topN)
      .map(({ job, percent }) => ({
        jobId: job.id,
        title: job.title,
        company: job.company,
        location: job.location,
        experienceLevel: job.experienceLevel,
        matchPercent: percent,
        matchedSkills: job.requiredSkills.filter((s) => skillSet.has(s)),
        missingSkills: job.requiredSkills.filter((s) => !skillSet.has(s)),
      }));
  }

  /** Postings that pass the experience and location filters; failing either excludes the posting. */
  filterPostings(postings: readonly JobPosting[], options: Pick<RecommendOptions, 'experienceLevel' | 'location'>): JobPosting[] {
    const level = parseExperienceLevel(options.experienceLevel);
    const location = (options.location || '').trim().toLowerCase();

    return postings.filter(
      (job) => (!level || job.experienceLevel === level) && (!location || job.location.toLowerCase().includes(location)),
    );
  }
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
