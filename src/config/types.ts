import type { DomainAffinity } from '../routing/domain-affinity';
import type { SkillVocabulary } from '../routing/skill-vocabulary';

/** Weights of the compatibility score factors; they must sum to 1 */
export interface ScoringWeights {
  skill: number;
  load: number;
  experience: number;
  bonus: number;
}

/** Resolved configuration of one assignment run */
export interface AssignmentConfig {
  /** Max open tickets per agent unless the agent sets max_load */
  capacityCeiling: number;
  weights: ScoringWeights;
  /** Applied to the experience term of High and Critical tickets */
  experiencePriorityMultiplier: number;
  minKeywordLength: number;
  stopWords: ReadonlySet<string>;
  vocabulary: SkillVocabulary;
  domainAffinity: DomainAffinity;
}

/** Caller overrides; anything omitted keeps its default */
export interface AssignmentOptions {
  capacityCeiling?: number;
  weights?: Partial<ScoringWeights>;
  experiencePriorityMultiplier?: number;
  minKeywordLength?: number;
  stopWords?: Iterable<string>;
  vocabulary?: SkillVocabulary;
  domainAffinity?: DomainAffinity;
}
