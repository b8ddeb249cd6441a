import { Injectable } from '@nestjs/common';
import { ValidationFault } from '../errors';
import { normalizeText } from '../taxonomy';
import {
  Grade,
  ReferenceSnapshot,
  RESUME_SECTIONS,
  ResumeRubric,
  ResumeSection,
  Roadmap,
  RubricDimension,
  RubricResult,
  RubricTip,
} from '../types';
import { findRoadmap } from './skill-gap-analyzer.service';
import { SkillExtractorService } from './skill-extractor.service';

export type ScoringContext = Pick<ReferenceSnapshot, 'taxonomy' | 'roadmaps' | 'rubric'>;

export const RUBRIC_DIMENSIONS: readonly RubricDimension[] = [
  'length',
  'impactVerbs',
  'quantifiedAchievements',
  'contactInfo',
  'sections',
  'atsKeywords',
];

/** Points each dimension contributes to the overall score at a full 10/10. */
export const RUBRIC_WEIGHTS: Readonly<Record<RubricDimension, number>> = {
  length: 10,
  impactVerbs: 20,
  quantifiedAchievements: 20,
  contactInfo: 15,
  sections: 15,
  atsKeywords: 20,
};

export const TIP_THRESHOLD = 7;

const BULLET = /^(?:[-*•·▪‣◦–]\s*|\d{1,2}[.)]\s+)/;
const METRIC =
  /[$€£₹]\s?\d[\d,.]*|\d[\d,.]*\s?(?:%|percent\b|x\b|k\b|million\b|billion\b|(?:users|customers|clients|requests|transactions|orders|hours|engineers|people|members|downloads)\b)|\d[\d,.]*\+/gi;
const EMAIL = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/;
// Digit groups joined by single spaces or hyphens, with an optional +CC and (area) prefix.
const PHONE = /(?<![\w.])(?:\+\d{1,3}[ -]?)?(?:\(\d{2,5}\)[ -]?)?\d{2,5}(?:[ -]?\d{2,5}){1,4}(?![\w.])/g;
const PROFILE_LINK =
  /(?:linkedin\.com|github\.com|gitlab\.com|behance\.net|dribbble\.com|stackoverflow\.com)\/\S+|https?:\/\/\S+/i;

const SECTION_TITLES: Readonly<Record<ResumeSection, string>> = {
  experience: 'Experience',
  education: 'Education',
  skills: 'Skills',
  projects: 'Projects',
};

export function gradeFor(overall: number): Grade {
  if (overall >= 85) return 'A';
  if (overall >= 70) return 'B';
  if (overall >= 50) return 'C';
  return 'D';
}

interface Signals {
  words: number;
  impact: { strong: number; lines: number };
  metrics: number;
  contact: { email: boolean; phone: boolean; profile: boolean };
  missingSections: ResumeSection[];
  ats: { hits: number; relevant: number; missingRoleSkills: string[] };
}

@Injectable()
export class ResumeScorerService {
  constructor(private readonly extractor: SkillExtractorService) {}

  score(resumeText: string, context: ScoringContext, targetRole?: string): RubricResult {
    if (!resumeText || !resumeText.trim()) {
      throw new ValidationFault('EMPTY_RESUME', 'no content to score');
    }

    const roadmap = findRoadmap(context.roadmaps, targetRole);
    const lines = resumeText
      .split(/\r?\n/)
      .map((l) => l.trim())
      .filter(Boolean);
    const detectedSkills = this.extractor.extract(resumeText, context.taxonomy).canonical;

    const signals: Signals = {
      words: resumeText.split(/\s+/).filter(Boolean).length,
      impact: this.impactVerbUsage(lines, context.rubric),
      metrics: resumeText.match(METRIC)?.length ?? 0,
      contact: {
        email: EMAIL.test(resumeText),
        phone: (resumeText.match(PHONE) ?? []).some((m) => {
          const digits = m.replace(/\D/g, '').length;
          return digits >= 10 && digits <= 15;
        }),
        profile: PROFILE_LINK.test(resumeText),
      },
      missingSections: RESUME_SECTIONS.filter(
        (section) => !lines.some((line) => this.isHeader(line, context.rubric.sectionHeaders[section])),
      ),
      ats: this.keywordCoverage(detectedSkills, context, roadmap),
    };

    const dimensionScores: Record<RubricDimension, number> = {
      length: this.lengthScore(signals.words),
      impactVerbs: signals.impact.lines
        ? Math.round(Math.min(1, signals.impact.strong / signals.impact.lines / 0.6) * 10)
        : 0,
      quantifiedAchievements: signals.metrics >= 3 ? 10 : [0, 4, 7][signals.metrics],
      contactInfo: (signals.contact.email ? 4 : 0) + (signals.contact.phone ? 3 : 0) + (signals.contact.profile ? 3 : 0),
      sections: Math.round((10 * (RESUME_SECTIONS.length - signals.missingSections.length)) / RESUME_SECTIONS.length),
      atsKeywords: this.atsScore(signals.ats, roadmap),
    };

    const weighted = RUBRIC_DIMENSIONS.reduce((sum, d) => sum + (RUBRIC_WEIGHTS[d] * dimensionScores[d]) / 10, 0);
    const overall = Math.max(0, Math.min(100, Math.round(weighted)));
    const grade = gradeFor(overall);

    return {
      targetRole: roadmap?.role ?? null,
      dimensionScores,
      overall,
      grade,
      summary: this.summary(grade),
      tips: RUBRIC_DIMENSIONS.filter((d) => dimensionScores[d] < TIP_THRESHOLD).map((d) => this.tip(d, signals, roadmap)),
      detectedSkills,
      keywordDensity: signals.ats.relevant ? Math.round((signals.ats.hits / signals.ats.relevant) * 10000) / 10000 : 0,
      roleAdvice: [...(roadmap?.advice ?? [])],
    };
  }

  private lengthScore(words: number): number {
    if (words >= 200 && words <= 1000) return 10;
    if ((words >= 100 && words < 200) || (words > 1000 && words <= 1500)) return 6;
    return 2;
  }

  /** Bullet lines when the resume has any, otherwise every line of three words or more. */
  private impactVerbUsage(lines: string[], rubric: ResumeRubric): { strong: number; lines: number } {
    const bullets = lines.filter((l) => BULLET.test(l)).map((l) => l.replace(BULLET, ''));
    const candidates = bullets.length ? bullets : lines.filter((l) => l.split(/\s+/).length >= 3);
    const strong = candidates.filter((l) => rubric.impactVerbs.has(normalizeText(l).split(' ')[0])).length;
    return { strong, lines: candidates.length };
  }

  private isHeader(line: string, variants: readonly string[]): boolean {
    const words = normalizeText(line);
    if (!words || words.split(' ').length > 5) return false;
    return variants.some((v) => words === v || ` ${words} `.includes(` ${v} `));
  }

  private keywordCoverage(detected: string[], context: ScoringContext, roadmap: Roadmap | undefined): Signals['ats'] {
    const relevant = roadmap
      ? roadmap.levels.flatMap((l) => l.steps.map((s) => s.skill))
      : context.taxonomy.skills.map((s) => s.id);
    const found = new Set(detected);
    return {
      hits: relevant.filter((s) => found.has(s)).length,
      relevant: relevant.length,
      missingRoleSkills: roadmap ? relevant.filter((s) => !found.has(s)) : [],
    };
  }

  private atsScore(ats: Signals['ats'], roadmap: Roadmap | undefined): number {
    const target = roadmap ? Math.ceil(ats.relevant / 2) : Math.min(10, ats.relevant);
    return target ? Math.round(10 * Math.min(1, ats.hits / target)) : 0;
  }

  private tip(dimension: RubricDimension, signals: Signals, roadmap: Roadmap | undefined): RubricTip {
    const forRole = roadmap ? ` for ${roadmap.role} roles` : '';

    switch (dimension) {
      case 'length':
        return {
          dimension,
          message:
            signals.words < 200
              ? `Your resume is brief (${signals.words} words). Aim for 400-800 words${forRole}.`
              : `Your resume runs ${signals.words} words. Trim it to one or two pages${forRole}.`,
        };
      case 'impactVerbs':
        return {
          dimension,
          message: `Start bullet points with action verbs such as Developed, Led, Optimized, Automated or Delivered${forRole}. Write "Developed a REST API serving 10k+ users" instead of "Worked on API".`,
        };
      case 'quantifiedAchievements':
        return {
          dimension,
          message: signals.metrics
            ? `Only ${signals.metrics} quantified achievement(s) found. Put numbers on more of your results${forRole}.`
            : `Add measurable results${forRole}, e.g. "Reduced page load time by 40%" or "Served 10,000+ daily users".`,
        };
      case 'contactInfo': {
        const missing = [
          signals.contact.email ? '' : 'email address',
          signals.contact.phone ? '' : 'phone number',
          signals.contact.profile ? '' : 'LinkedIn or GitHub profile link',
        ].filter(Boolean);
        return { dimension, message: `Add your ${missing.join(', ')} so recruiters can reach you.` };
      }
      case 'sections':
        return {
          dimension,
          message: `Add clearly labelled sections for: ${signals.missingSections.map((s) => SECTION_TITLES[s]).join(', ')}.`,
        };
      case 'atsKeywords':
        return {
          dimension,
          message: roadmap
            ? `Add keywords ${roadmap.role} screens look for: ${signals.ats.missingRoleSkills.slice(0, 5).join(', ')}.`
            : `Only ${signals.ats.hits} recognizable technical skill(s) found. List your skills in a dedicated Skills section using the terms job descriptions use.`,
        };
    }
  }

  private summary(grade: Grade): string {
    switch (grade) {
      case 'A':
        return 'Your resume is strong. A few minor tweaks could make it perfect.';
      case 'B':
        return 'Solid resume with room for improvement. Focus on the flagged areas.';
      case 'C':
        return 'Your resume needs work. Address the flagged issues to stand out.';
      case 'D':
        return 'Significant improvements needed. Start with contact details and quantified achievements.';
    }
  }
}
