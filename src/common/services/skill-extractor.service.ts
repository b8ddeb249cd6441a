import { Injectable } from '@nestjs/common';
import { normalizeText, resolveSkill } from '../taxonomy';
import { ExtractionResult, Skill, Taxonomy } from '../types';

@Injectable()
export class SkillExtractorService {
  /**
   * Explicit lists are resolved token by token; free text is scanned for
   * whole-word alias hits. Either way the result holds canonical ids only,
   * in order of first appearance.
   */
  extract(input: readonly string[] | string, taxonomy: Taxonomy): ExtractionResult {
    if (typeof input === 'string') {
      return this.collect(this.scanText(input, taxonomy), []);
    }

    const hits: Skill[] = [];
    const unrecognized = new Map<string, string>();
    for (const token of input) {
      const key = normalizeText(token);
      if (!key) continue;
      const skill = resolveSkill(taxonomy, token);
      if (skill) {
        hits.push(skill);
      } else if (!unrecognized.has(key)) {
        unrecognized.set(key, String(token).trim());
      }
    }
    return this.collect(hits, [...unrecognized.values()]);
  }

  private scanText(text: string, taxonomy: Taxonomy): Skill[] {
    const words = normalizeText(text).split(' ').filter(Boolean);
    const hits: Skill[] = [];

    let i = 0;
    while (i < words.length) {
      let consumed = 0;
      for (let size = Math.min(taxonomy.maxAliasWords, words.length - i); size > 0; size -= 1) {
        const skill = taxonomy.aliasIndex.get(words.slice(i, i + size).join(' '));
        if (skill) {
          hits.push(skill);
          consumed = size;
          break;
        }
      }
      i += consumed || 1;
    }

    return hits;
  }

  private collect(hits: Skill[], unrecognized: string[]): ExtractionResult {
    const canonical: string[] = [];
    const byCategory: Record<string, string[]> = {};

    for (const skill of hits) {
      if (canonical.includes(skill.id)) continue;
      canonical.push(skill.id);
      (byCategory[skill.category] ??= []).push(skill.id);
    }

    return { canonical, byCategory, unrecognized };
  }
}
