import {
  DEFAULT_STOP_WORDS,
  DEFAULT_WEIGHTS,
  resolveAssignmentConfig,
} from '../../src/config/assignment-config';
import { getDefaultDomainAffinity, NO_DOMAIN_AFFINITY } from '../../src/routing/domain-affinity';
import { AssignmentError, InvalidConfigurationError } from '../../src/routing/errors';
import { createVocabulary } from '../../src/routing/skill-vocabulary';

const vocabulary = createVocabulary({ Networking: ['network'] });

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidConfigurationError) return err.problems;
    throw err;
  }
  throw new Error('expected InvalidConfigurationError');
}

describe('resolveAssignmentConfig', () => {
  it('should apply the documented defaults', () => {
    const config = resolveAssignmentConfig({ vocabulary });
    expect(config.capacityCeiling).toBe(8);
    expect(config.weights).toEqual({ skill: 0.5, load: 0.25, experience: 0.15, bonus: 0.1 });
    expect(config.experiencePriorityMultiplier).toBe(1.2);
    expect(config.minKeywordLength).toBe(2);
    expect(config.stopWords).toBe(DEFAULT_STOP_WORDS);
    expect(config.vocabulary).toBe(vocabulary);
  });

  it('should use the bundled vocabulary by default', () => {
    expect(resolveAssignmentConfig().vocabulary.get('networking')).toContain('network');
  });

  it('should use the bundled domain affinity unless one is given', () => {
    expect(resolveAssignmentConfig({ vocabulary }).domainAffinity).toBe(getDefaultDomainAffinity());
    expect(resolveAssignmentConfig({ vocabulary, domainAffinity: NO_DOMAIN_AFFINITY }).domainAffinity).toBe(
      NO_DOMAIN_AFFINITY,
    );
  });

  it('should override one option without changing the others', () => {
    const config = resolveAssignmentConfig({ vocabulary, capacityCeiling: 3 });
    expect(config.capacityCeiling).toBe(3);
    expect(config.weights).toEqual(DEFAULT_WEIGHTS);
    expect(config.experiencePriorityMultiplier).toBe(1.2);
  });

  it('should accept a complete weight set that sums to 1', () => {
    const weights = { skill: 0.7, load: 0.2, experience: 0.1, bonus: 0 };
    expect(resolveAssignmentConfig({ vocabulary, weights }).weights).toEqual(weights);
  });

  it('should not renormalize a partial weight override', () => {
    expect(problemsOf(() => resolveAssignmentConfig({ vocabulary, weights: { skill: 0.9 } }))).toEqual([
      'weights must sum to 1 ± 0.01 (got 1.4)',
    ]);
  });

  it('should ignore weight keys passed as undefined', () => {
    const config = resolveAssignmentConfig({ vocabulary, weights: { skill: undefined } });
    expect(config.weights.skill).toBe(0.5);
  });

  it('should reject a negative capacity ceiling', () => {
    expect(problemsOf(() => resolveAssignmentConfig({ vocabulary, capacityCeiling: -1 }))).toEqual([
      'capacityCeiling must be a non-negative integer (got -1)',
    ]);
  });

  it('should reject negative weights', () => {
    const weights = { skill: 0.8, load: -0.05, experience: 0.15, bonus: 0.1 };
    expect(problemsOf(() => resolveAssignmentConfig({ vocabulary, weights }))).toEqual([
      'weights.load must be a finite number >= 0 (got -0.05)',
    ]);
  });

  it('should report every problem at once', () => {
    const problems = problemsOf(() =>
      resolveAssignmentConfig({ vocabulary, capacityCeiling: -2, minKeywordLength: 0, experiencePriorityMultiplier: 0.5 }),
    );
    expect(problems).toEqual([
      'capacityCeiling must be a non-negative integer (got -2)',
      'experiencePriorityMultiplier must be a finite number >= 1 (got 0.5)',
      'minKeywordLength must be a positive integer (got 0)',
    ]);
  });

  it('should raise a coded assignment error', () => {
    try {
      resolveAssignmentConfig({ vocabulary, capacityCeiling: -1 });
      throw new Error('expected a failure');
    } catch (err) {
      expect(err).toBeInstanceOf(AssignmentError);
      expect(err).toMatchObject({ code: 'INVALID_CONFIGURATION', name: 'InvalidConfigurationError' });
    }
  });

  it('should lowercase custom stop words', () => {
    const config = resolveAssignmentConfig({ vocabulary, stopWords: ['Please', 'HELP'] });
    expect([...config.stopWords].sort()).toEqual(['help', 'please']);
  });
});
