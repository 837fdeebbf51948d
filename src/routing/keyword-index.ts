/**
 * Keyword Index
 *
 * Maps each skill held by the agents of a run to the words that signal it in
 * ticket text: curated synonyms plus the words of the skill name.
 * Rebuilt for every run from that run's agents.
 */

import { normalizeSkillName, SkillVocabulary } from './skill-vocabulary';
import { TextMatcher } from './text-matcher';

const EMPTY: ReadonlySet<string> = new Set();

export class KeywordIndex {
  private constructor(private readonly entries: ReadonlyMap<string, ReadonlySet<string>>) {}

  static build(skillNames: Iterable<string>, vocabulary: SkillVocabulary, matcher: TextMatcher): KeywordIndex {
    const entries = new Map<string, ReadonlySet<string>>();
    for (const skill of skillNames) {
      const key = normalizeSkillName(skill);
      if (!key || entries.has(key)) continue;

      const keywords = new Set(vocabulary.get(key) ?? []);
      for (const token of matcher.extractKeywords(skill)) {
        keywords.add(token);
      }
      entries.set(key, keywords);
    }
    return new KeywordIndex(entries);
  }

  /** Keywords for a skill; empty for a skill no agent of the run declared */
  keywordsFor(skill: string): ReadonlySet<string> {
    return this.entries.get(normalizeSkillName(skill)) ?? EMPTY;
  }

  has(skill: string): boolean {
    return this.entries.has(normalizeSkillName(skill));
  }

  get size(): number {
    return this.entries.size;
  }
}
