import { AssignmentConfig, AssignmentOptions, ScoringWeights } from './types';
import { InvalidConfigurationError } from '../routing/errors';
import { getDefaultDomainAffinity } from '../routing/domain-affinity';
import { getDefaultVocabulary } from '../routing/skill-vocabulary';

export const DEFAULT_CAPACITY_CEILING = 8;

export const W_SKILL = 0.5;
export const W_LOAD = 0.25;
export const W_EXPERIENCE = 0.15;
export const W_BONUS = 0.1;

export const DEFAULT_WEIGHTS: Readonly<ScoringWeights> = Object.freeze({
  skill: W_SKILL,
  load: W_LOAD,
  experience: W_EXPERIENCE,
  bonus: W_BONUS,
});

export const EXPERIENCE_PRIORITY_MULTIPLIER = 1.2;
export const DEFAULT_MIN_KEYWORD_LENGTH = 2;

/** Allowed drift of the weight sum from 1 */
export const WEIGHT_SUM_TOLERANCE = 0.01;

/**
 * Words that carry no skill signal in ticket text.
 * Tokens shorter than the minimum keyword length are dropped separately.
 */
export const DEFAULT_STOP_WORDS: ReadonlySet<string> = new Set([
  'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'of', 'with', 'by',
  'is', 'are', 'was', 'were', 'be', 'been', 'have', 'has', 'had',
  'do', 'does', 'did', 'will', 'would', 'could', 'should', 'may', 'might', 'must', 'can',
  'this', 'that', 'these', 'those',
  'i', 'we', 'they', 'it', 'he', 'she', 'you',
  'our', 'their', 'his', 'her', 'your', 'my',
  'not', 'from', 'as', 'into', 'after', 'since', 'when',
]);

/**
 * Merge caller overrides over the defaults, key by key. Weights are never
 * renormalized, so overriding one weight alone usually fails validation.
 */
export function resolveAssignmentConfig(options: AssignmentOptions = {}): AssignmentConfig {
  const config: AssignmentConfig = {
    capacityCeiling: options.capacityCeiling ?? DEFAULT_CAPACITY_CEILING,
    weights: { ...DEFAULT_WEIGHTS, ...definedOnly(options.weights) },
    experiencePriorityMultiplier: options.experiencePriorityMultiplier ?? EXPERIENCE_PRIORITY_MULTIPLIER,
    minKeywordLength: options.minKeywordLength ?? DEFAULT_MIN_KEYWORD_LENGTH,
    stopWords: options.stopWords ? new Set([...options.stopWords].map((w) => w.toLowerCase())) : DEFAULT_STOP_WORDS,
    vocabulary: options.vocabulary ?? getDefaultVocabulary(),
    domainAffinity: options.domainAffinity ?? getDefaultDomainAffinity(),
  };
  validateAssignmentConfig(config);
  return config;
}

export function validateAssignmentConfig(config: AssignmentConfig): void {
  const problems: string[] = [];

  if (!Number.isInteger(config.capacityCeiling) || config.capacityCeiling < 0) {
    problems.push(`capacityCeiling must be a non-negative integer (got ${config.capacityCeiling})`);
  }

  const entries = Object.entries(config.weights);
  for (const [name, value] of entries) {
    if (!Number.isFinite(value) || value < 0) {
      problems.push(`weights.${name} must be a finite number >= 0 (got ${value})`);
    }
  }
  const sum = entries.reduce((acc, [, value]) => acc + value, 0);
  if (Number.isFinite(sum) && Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    problems.push(`weights must sum to 1 ± ${WEIGHT_SUM_TOLERANCE} (got ${Number(sum.toFixed(4))})`);
  }

  if (!Number.isFinite(config.experiencePriorityMultiplier) || config.experiencePriorityMultiplier < 1) {
    problems.push(`experiencePriorityMultiplier must be a finite number >= 1 (got ${config.experiencePriorityMultiplier})`);
  }

  if (!Number.isInteger(config.minKeywordLength) || config.minKeywordLength < 1) {
    problems.push(`minKeywordLength must be a positive integer (got ${config.minKeywordLength})`);
  }

  if (problems.length > 0) {
    throw new InvalidConfigurationError(problems);
  }
}

function definedOnly(weights: Partial<ScoringWeights> | undefined): Partial<ScoringWeights> {
  const result: Partial<ScoringWeights> = {};
  if (!weights) return result;
  if (weights.skill !== undefined) result.skill = weights.skill;
  if (weights.load !== undefined) result.load = weights.load;
  if (weights.experience !== undefined) result.experience = weights.experience;
  if (weights.bonus !== undefined) result.bonus = weights.bonus;
  return result;
}
