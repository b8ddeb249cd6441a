import { Injectable } from '@nestjs/common';
import { ValidationFault } from '../errors';
import { GapLevelReport, GapReport, PrioritizedSkill, Readiness, Roadmap, ROADMAP_LEVELS, RoadmapLevelName } from '../types';

export const WEEKS_PER_SKILL: Readonly<Record<RoadmapLevelName, number>> = {
  beginner: 2,
  intermediate: 3,
  advanced: 4,
};

const LEVEL_ALIASES: ReadonlyMap<string, RoadmapLevelName> = new Map<string, RoadmapLevelName>([
  ['beginner', 'beginner'],
  ['entry', 'beginner'],
  ['intermediate', 'intermediate'],
  ['mid', 'intermediate'],
  ['advanced', 'advanced'],
  ['senior', 'advanced'],
]);

export function findRoadmap(roadmaps: readonly Roadmap[], role: string | undefined): Roadmap | undefined {
  const key = (role || '').trim().toLowerCase();
  if (!key) return undefined;
  return roadmaps.find((r) => r.role.toLowerCase() === key);
}

export function parseStartingLevel(value: string | undefined): RoadmapLevelName {
  const token = (value || '').trim().toLowerCase();
  if (!token) return 'beginner';
  const level = LEVEL_ALIASES.get(token);
  if (!level) {
    throw new ValidationFault(
      'INVALID_EXPERIENCE_LEVEL',
      `Unknown experience level "${value}". Use one of: ${[...LEVEL_ALIASES.keys()].join(', ')}`,
    );
  }
  return level;
}

@Injectable()
export class SkillGapAnalyzerService {
  analyze(skills: Iterable<string>, targetRole: string, roadmaps: readonly Roadmap[], experienceLevel?: string): GapReport {
    const startingLevel = parseStartingLevel(experienceLevel);
    const roadmap = findRoadmap(roadmaps, targetRole);
    if (!roadmap) {
      throw new ValidationFault('UNKNOWN_ROLE', `unknown role: "${targetRole}"`);
    }

    const owned = new Set(skills);
    const startIndex = ROADMAP_LEVELS.indexOf(startingLevel);

    const levels: GapLevelReport[] = [];
    const prioritizedMissing: PrioritizedSkill[] = [];
    let scopedTotal = 0;
    let scopedKnown = 0;
    let etaWeeks = 0;

    for (const level of roadmap.levels) {
      const inScope = ROADMAP_LEVELS.indexOf(level.name) >= startIndex;
      const known = level.steps.filter((s) => owned.has(s.skill));
      const missing = level.steps.filter((s) => !owned.has(s.skill));

      levels.push({
        name: level.name,
        inScope,
        skills: level.steps.map((s) => s.skill),
        known: known.map((s) => s.skill),
        missing: missing.map((s) => s.skill),
        completionPercent: this.percent(known.length, level.steps.length),
      });

      if (!inScope) continue;
      scopedTotal += level.steps.length;
      scopedKnown += known.length;
      etaWeeks += missing.length * WEEKS_PER_SKILL[level.name];
      prioritizedMissing.push(...missing.map((s) => ({ skill: s.skill, level: level.name, resource: s.resource })));
    }

    const completionPercent = this.percent(scopedKnown, scopedTotal);

    return {
      role: roadmap.role,
      startingLevel,
      levels,
      prioritizedMissing,
      completionPercent,
      etaWeeks,
      readiness: this.readiness(completionPercent),
    };
  }

  private percent(part: number, total: number): number {
    return total ? Math.round((part / total) * 100) : 100;
  }

  private readiness(completion: number): { level: Readiness; message: string } {
    if (completion >= 80) {
      return { level: 'high', message: "You're well prepared for this role." };
    }
    if (completion >= 50) {
      return { level: 'medium', message: 'With focused learning you can reach this role in 3-6 months.' };
    }
    if (completion >= 25) {
      return { level: 'low-medium', message: 'Expect 6-12 months of dedicated learning.' };
    }
    return { level: 'low', message: 'Significant upskilling required. Start with the beginner resources.' };
  }
}
