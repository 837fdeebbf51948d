/**
 * Text Matcher
 *
 * Tokenizes free ticket text and measures its overlap with the keywords of
 * an agent's skills.
 */

import { DomainAffinity, detectDomains, domainMultiplier, NO_DOMAIN_AFFINITY } from './domain-affinity';
import { KeywordIndex } from './keyword-index';
import { normalizeSkillName, normalizeText } from './skill-vocabulary';
import { SkillMatch, SkillMatchResult } from './types';

/** Proficiency that earns a skill its full weight */
export const MAX_PROFICIENCY = 10;
/** Matched keywords at which a skill counts as fully evidenced */
export const KEYWORD_SATURATION = 2;

export interface TextMatcherOptions {
  minKeywordLength: number;
  stopWords: ReadonlySet<string>;
  /** Scales skill contributions by ticket domain; none when omitted */
  domainAffinity?: DomainAffinity;
}

export class TextMatcher {
  constructor(private readonly options: TextMatcherOptions) {}

  /** Distinct lowercase tokens worth matching, punctuation and stop words removed */
  extractKeywords(text: string): Set<string> {
    const keywords = new Set<string>();
    for (const token of normalizeText(text).split(' ')) {
      if (token.length < this.options.minKeywordLength) continue;
      if (this.options.stopWords.has(token)) continue;
      keywords.add(token);
    }
    return keywords;
  }

  /**
   * Keywords present in the text, sorted. Single words must equal a token;
   * phrases must appear on word boundaries.
   */
  matchKeywords(text: string, keywords: Iterable<string>): string[] {
    const tokens = this.extractKeywords(text);
    const padded = ` ${normalizeText(text)} `;
    const matched: string[] = [];
    for (const keyword of keywords) {
      const hit = keyword.includes(' ') ? padded.includes(` ${keyword} `) : tokens.has(keyword);
      if (hit) matched.push(keyword);
    }
    return matched.sort();
  }

  /**
   * Per-skill overlap, in the order of the agent's skills. Names that
   * normalize alike are one skill, held at the highest proficiency given.
   */
  matchSkills(ticketText: string, agentSkills: Record<string, number>, index: KeywordIndex): SkillMatchResult {
    const affinity = this.options.domainAffinity ?? NO_DOMAIN_AFFINITY;
    const ticketDomains = detectDomains(affinity, ticketText);
    const matches: SkillMatch[] = [];
    let total = 0;

    for (const { skill, proficiency } of distinctSkills(agentSkills)) {
      const matchedKeywords = this.matchKeywords(ticketText, index.keywordsFor(skill));
      if (matchedKeywords.length === 0) continue;

      const strength = Math.min(1, matchedKeywords.length / KEYWORD_SATURATION);
      const multiplier = domainMultiplier(affinity, skill, ticketDomains);
      const contribution = strength * clamp(proficiency / MAX_PROFICIENCY, 0, 1) * multiplier;
      total += contribution;
      matches.push({ skill, proficiency, matchedKeywords, domainMultiplier: multiplier, contribution });
    }

    return { score: Math.min(1, total), matches };
  }

  /** Aggregate skill relevance in [0, 1]; 0 when nothing overlaps */
  skillMatchScore(ticketText: string, agentSkills: Record<string, number>, index: KeywordIndex): number {
    return this.matchSkills(ticketText, agentSkills, index).score;
  }
}

function distinctSkills(agentSkills: Record<string, number>): { skill: string; proficiency: number }[] {
  const byName = new Map<string, { skill: string; proficiency: number }>();
  for (const [skill, proficiency] of Object.entries(agentSkills)) {
    const key = normalizeSkillName(skill);
    const seen = byName.get(key);
    if (!seen) byName.set(key, { skill, proficiency });
    else if (proficiency > seen.proficiency) seen.proficiency = proficiency;
  }
  return [...byName.values()];
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
