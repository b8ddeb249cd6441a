import { ReferenceDataError } from './errors';
import { Skill, Taxonomy } from './types';

/**
 * Lower-cases, strips diacritics and turns every character other than
 * `a-z`, `0-9`, `+` and `#` into a word break. `+` and `#` survive so that
 * "C++" and "C#" never collapse into "c".
 */
export function normalizeText(value: string): string {
  return String(value || '')
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z0-9+#]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export interface SkillEntry {
  name: string;
  category: string;
  aliases: string[];
}

export function buildTaxonomy(categories: string[], entries: SkillEntry[], source = 'taxonomy'): Taxonomy {
  const problems: string[] = [];
  const knownCategories = new Set(categories);
  const aliasIndex = new Map<string, Skill>();
  const skills: Skill[] = [];
  let maxAliasWords = 1;

  for (const entry of entries) {
    const id = entry.name.trim();
    if (!normalizeText(id)) {
      problems.push(`skill "${entry.name}" has no usable name`);
      continue;
    }
    if (!knownCategories.has(entry.category)) {
      problems.push(`skill "${id}" uses undeclared category "${entry.category}"`);
      continue;
    }

    const skill: Skill = Object.freeze({
      id,
      displayName: id,
      category: entry.category,
      aliases: Object.freeze(entry.aliases.map((a) => a.trim()).filter(Boolean)),
    });

    const keys = new Set([id, ...skill.aliases].map(normalizeText).filter(Boolean));
    for (const key of keys) {
      const owner = aliasIndex.get(key);
      if (owner) {
        problems.push(
          owner.id.toLowerCase() === id.toLowerCase()
            ? `duplicate skill "${id}"`
            : `alias "${key}" maps to both "${owner.id}" and "${id}"`,
        );
        continue;
      }
      aliasIndex.set(key, skill);
      maxAliasWords = Math.max(maxAliasWords, key.split(' ').length);
    }
    skills.push(skill);
  }

  if (problems.length) {
    throw new ReferenceDataError(source, problems);
  }

  return Object.freeze({
    categories: Object.freeze([...categories]),
    skills: Object.freeze(skills),
    aliasIndex,
    maxAliasWords,
  });
}

export function resolveSkill(taxonomy: Taxonomy, token: string): Skill | undefined {
  const key = normalizeText(token);
  return key ? taxonomy.aliasIndex.get(key) : undefined;
}

/** Canonical id for a known name, the trimmed name itself otherwise. */
export function canonicalOrLiteral(taxonomy: Taxonomy, token: string): string {
  return resolveSkill(taxonomy, token)?.id ?? token.trim();
}
