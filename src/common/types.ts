export const EXPERIENCE_LEVELS = ['Entry', 'Mid', 'Senior'] as const;
export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number];

export const ROADMAP_LEVELS = ['beginner', 'intermediate', 'advanced'] as const;
export type RoadmapLevelName = (typeof ROADMAP_LEVELS)[number];

export const RESUME_SECTIONS = ['experience', 'education', 'skills', 'projects'] as const;
export type ResumeSection = (typeof RESUME_SECTIONS)[number];

export interface Skill {
  id: string;
  displayName: string;
  category: string;
  aliases: readonly string[];
}

export interface Taxonomy {
  categories: readonly string[];
  skills: readonly Skill[];
  aliasIndex: ReadonlyMap<string, Skill>;
  maxAliasWords: number;
}

export interface JobPosting {
  id: string;
  title: string;
  company: string;
  location: string;
  experienceLevel: ExperienceLevel;
  requiredSkills: readonly string[];
  salaryRange?: string;
  description?: string;
}

export interface RoadmapStep {
  skill: string;
  resource: string;
}

export interface RoadmapLevel {
  name: RoadmapLevelName;
  steps: readonly RoadmapStep[];
}

export interface Roadmap {
  role: string;
  levels: readonly RoadmapLevel[];
  advice: readonly string[];
}

export interface ResumeRubric {
  impactVerbs: ReadonlySet<string>;
  sectionHeaders: Readonly<Record<ResumeSection, readonly string[]>>;
}

export interface ReferenceSnapshot {
  version: number;
  loadedAt: string;
  taxonomy: Taxonomy;
  postings: readonly JobPosting[];
  roadmaps: readonly Roadmap[];
  rubric: ResumeRubric;
}

export interface ExtractionResult {
  canonical: string[];
  byCategory: Record<string, string[]>;
  unrecognized: string[];
}

export interface RecommendationResult {
  jobId: string;
  title: string;
  company: string;
  location: string;
  experienceLevel: ExperienceLevel;
  matchPercent: number;
  matchedSkills: string[];
  missingSkills: string[];
}

export interface GapLevelReport {
  name: RoadmapLevelName;
  inScope: boolean;
  skills: string[];
  known: string[];
  missing: string[];
  completionPercent: number;
}

export interface PrioritizedSkill {
  skill: string;
  level: RoadmapLevelName;
  resource: string;
}

export type Readiness = 'high' | 'medium' | 'low-medium' | 'low';

export interface GapReport {
  role: string;
  startingLevel: RoadmapLevelName;
  levels: GapLevelReport[];
  prioritizedMissing: PrioritizedSkill[];
  completionPercent: number;
  etaWeeks: number;
  readiness: { level: Readiness; message: string };
}

export type RubricDimension =
  | 'length'
  | 'impactVerbs'
  | 'quantifiedAchievements'
  | 'contactInfo'
  | 'sections'
  | 'atsKeywords';

export type Grade = 'A' | 'B' | 'C' | 'D';

export interface RubricTip {
  dimension: RubricDimension;
  message: string;
}

export interface RubricResult {
  targetRole: string | null;
  dimensionScores: Record<RubricDimension, number>;
  overall: number;
  grade: Grade;
  summary: string;
  tips: RubricTip[];
  detectedSkills: string[];
  keywordDensity: number;
  roleAdvice: string[];
}
