import { ClassConstructor, plainToInstance, Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
  ValidationError,
  validateSync,
} from 'class-validator';
import { ReferenceDataError } from './errors';
import { buildTaxonomy, canonicalOrLiteral, normalizeText } from './taxonomy';
import {
  EXPERIENCE_LEVELS,
  ExperienceLevel,
  JobPosting,
  ReferenceSnapshot,
  ResumeRubric,
  Roadmap,
  ROADMAP_LEVELS,
  Taxonomy,
} from './types';

export const SKILLS_FILE = 'skills.json';
export const JOBS_FILE = 'jobs.json';
export const RUBRIC_FILE = 'resume-rubric.json';

class SkillRow {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  category!: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  aliases?: string[];
}

class RoadmapStepRow {
  @IsString()
  @IsNotEmpty()
  skill!: string;

  @IsString()
  resource!: string;
}

class RoadmapLevelsRow {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RoadmapStepRow)
  beginner!: RoadmapStepRow[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RoadmapStepRow)
  intermediate!: RoadmapStepRow[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RoadmapStepRow)
  advanced!: RoadmapStepRow[];
}

class RoadmapRow {
  @IsString()
  @IsNotEmpty()
  role!: string;

  @IsObject()
  @ValidateNested()
  @Type(() => RoadmapLevelsRow)
  levels!: RoadmapLevelsRow;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  advice?: string[];
}

class SkillsDocument {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  categories!: string[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SkillRow)
  skills!: SkillRow[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RoadmapRow)
  roadmaps!: RoadmapRow[];
}

class JobPostingRow {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  title!: string;

  @IsString()
  company!: string;

  @IsString()
  location!: string;

  @IsIn(EXPERIENCE_LEVELS)
  experienceLevel!: ExperienceLevel;

  @IsArray()
  @IsString({ each: true })
  requiredSkills!: string[];

  @IsOptional()
  @IsString()
  salaryRange?: string;

  @IsOptional()
  @IsString()
  description?: string;
}

class JobsDocument {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => JobPostingRow)
  postings!: JobPostingRow[];
}

class SectionHeadersRow {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  experience!: string[];

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  education!: string[];

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  skills!: string[];

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  projects!: string[];
}

class RubricDocument {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  impactVerbs!: string[];

  @IsObject()
  @ValidateNested()
  @Type(() => SectionHeadersRow)
  sectionHeaders!: SectionHeadersRow;
}

export interface RawReferenceData {
  skills: unknown;
  jobs: unknown;
  rubric: unknown;
}

export interface LoadedReference {
  snapshot: ReferenceSnapshot;
  /** Non-fatal findings, e.g. posting skills the taxonomy does not know. */
  warnings: string[];
}

export function buildReferenceSnapshot(
  raw: RawReferenceData,
  meta: { version: number; loadedAt: string } = { version: 1, loadedAt: new Date().toISOString() },
): LoadedReference {
  const skillsDoc = validateDocument(SkillsDocument, raw.skills, SKILLS_FILE);
  const jobsDoc = validateDocument(JobsDocument, raw.jobs, JOBS_FILE);
  const rubricDoc = validateDocument(RubricDocument, raw.rubric, RUBRIC_FILE);

  const taxonomy = buildTaxonomy(
    skillsDoc.categories,
    skillsDoc.skills.map((s) => ({ name: s.name, category: s.category, aliases: s.aliases ?? [] })),
    SKILLS_FILE,
  );

  const warnings: string[] = [];
  const roadmaps = buildRoadmaps(skillsDoc.roadmaps, taxonomy, warnings);
  const postings = buildPostings(jobsDoc.postings, taxonomy, warnings);

  const rubric: ResumeRubric = Object.freeze({
    impactVerbs: new Set(rubricDoc.impactVerbs.map(normalizeText).filter(Boolean)),
    sectionHeaders: Object.freeze({
      experience: Object.freeze(rubricDoc.sectionHeaders.experience.map(normalizeText).filter(Boolean)),
      education: Object.freeze(rubricDoc.sectionHeaders.education.map(normalizeText).filter(Boolean)),
      skills: Object.freeze(rubricDoc.sectionHeaders.skills.map(normalizeText).filter(Boolean)),
      projects: Object.freeze(rubricDoc.sectionHeaders.projects.map(normalizeText).filter(Boolean)),
    }),
  });

  const snapshot: ReferenceSnapshot = Object.freeze({
    version: meta.version,
    loadedAt: meta.loadedAt,
    taxonomy,
    postings,
    roadmaps,
    rubric,
  });

  return { snapshot, warnings };
}

function buildRoadmaps(rows: RoadmapRow[], taxonomy: Taxonomy, warnings: string[]): readonly Roadmap[] {
  const problems: string[] = [];
  const seenRoles = new Set<string>();
  const roadmaps: Roadmap[] = [];

  for (const row of rows) {
    const role = row.role.trim();
    const roleKey = role.toLowerCase();
    if (seenRoles.has(roleKey)) {
      problems.push(`duplicate roadmap "${role}"`);
      continue;
    }
    seenRoles.add(roleKey);

    const seenSkills = new Set<string>();
    const levels = ROADMAP_LEVELS.map((name) => {
      const steps = row.levels[name].map((step) => {
        const skill = canonicalOrLiteral(taxonomy, step.skill);
        if (seenSkills.has(skill)) {
          problems.push(`roadmap "${role}" lists "${skill}" more than once`);
        }
        seenSkills.add(skill);
        if (!taxonomy.aliasIndex.has(normalizeText(skill))) {
          warnings.push(`roadmap "${role}" references unknown skill "${skill}"`);
        }
        return Object.freeze({ skill, resource: step.resource.trim() });
      });
      return Object.freeze({ name, steps: Object.freeze(steps) });
    });

    roadmaps.push(Object.freeze({ role, levels: Object.freeze(levels), advice: Object.freeze([...(row.advice ?? [])]) }));
  }

  if (problems.length) {
    throw new ReferenceDataError(SKILLS_FILE, problems);
  }
  return Object.freeze(roadmaps);
}

function buildPostings(rows: JobPostingRow[], taxonomy: Taxonomy, warnings: string[]): readonly JobPosting[] {
  const problems: string[] = [];
  const seenIds = new Set<string>();
  const postings: JobPosting[] = [];

  for (const row of rows) {
    const id = row.id.trim();
    if (seenIds.has(id)) {
      problems.push(`duplicate posting id "${id}"`);
      continue;
    }
    seenIds.add(id);

    const requiredSkills = [
      ...new Set(row.requiredSkills.filter((s) => s.trim()).map((s) => canonicalOrLiteral(taxonomy, s))),
    ];
    for (const skill of requiredSkills) {
      if (!taxonomy.aliasIndex.has(normalizeText(skill))) {
        warnings.push(`posting "${id}" requires unknown skill "${skill}"`);
      }
    }

    postings.push(
      Object.freeze({
        id,
        title: row.title.trim(),
        company: row.company.trim(),
        location: row.location.trim(),
        experienceLevel: row.experienceLevel,
        requiredSkills: Object.freeze(requiredSkills),
        salaryRange: row.salaryRange,
        description: row.description,
      }),
    );
  }

  if (problems.length) {
    throw new ReferenceDataError(JOBS_FILE, problems);
  }
  return Object.freeze(postings);
}

function validateDocument<T extends object>(cls: ClassConstructor<T>, raw: unknown, source: string): T {
  if (!isRecord(raw)) {
    throw new ReferenceDataError(source, ['expected a JSON object at the top level']);
  }
  const instance = plainToInstance(cls, raw);
  const errors = validateSync(instance);
  if (errors.length) {
    throw new ReferenceDataError(source, flattenErrors(errors));
  }
  return instance;
}

function flattenErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = prefix ? `${prefix}.${error.property}` : error.property;
    const own = error.constraints ? [`${path}: ${Object.values(error.constraints).join(', ')}`] : [];
    return [...own, ...flattenErrors(error.children ?? [], path)];
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
