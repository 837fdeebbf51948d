/**
 * Agent Scorer
 *
 * Compatibility of one agent with one ticket:
 *
 *   score = W_skill * skill + W_load * workload
 *         + W_exp * experience (x multiplier on High/Critical tickets)
 *         + W_bonus * requiredSkillBonus
 *
 * clamped to [0, 1]. Agents that are not Available, or whose load has
 * reached their capacity, are ineligible and score -1.
 */

import { AssignmentConfig } from '../config/types';
import { KeywordIndex } from './keyword-index';
import { effectivePriority, isUrgent } from './priority';
import { normalizeSkillName } from './skill-vocabulary';
import { clamp, TextMatcher } from './text-matcher';
import { Agent, AgentScore, ScoreBreakdown, ScoreFactor, SkillMatch, Ticket, TicketPriority } from './types';

export const AVAILABLE_STATUS = 'Available';
/** Experience level that earns the full experience factor */
export const MAX_EXPERIENCE = 15;

const FACTOR_ORDER: readonly ScoreFactor[] = ['skill', 'workload', 'experience', 'bonus'];
const RATIONALE_FACTORS = 2;

export class AgentScorer {
  private readonly matcher: TextMatcher;

  constructor(
    private readonly config: AssignmentConfig,
    private readonly index: KeywordIndex,
  ) {
    this.matcher = new TextMatcher({
      minKeywordLength: config.minKeywordLength,
      stopWords: config.stopWords,
      domainAffinity: config.domainAffinity,
    });
  }

  /** Capacity ceiling of an agent: its own max_load, else the configured one */
  capacityOf(agent: Agent): number {
    return agent.max_load ?? this.config.capacityCeiling;
  }

  score(ticket: Ticket, agent: Agent): AgentScore {
    if (agent.availability_status !== AVAILABLE_STATUS) {
      return { eligible: false, agent, score: -1, reason: 'unavailable' };
    }
    const capacity = this.capacityOf(agent);
    if (agent.current_load >= capacity) {
      return { eligible: false, agent, score: -1, reason: 'at_capacity' };
    }

    const priority = effectivePriority(ticket);
    const { weights } = this.config;

    const skillMatch = this.matcher.matchSkills(`${ticket.title} ${ticket.description}`, agent.skills, this.index);
    const workload = 1 - agent.current_load / capacity;
    const experience = clamp(agent.experience_level, 0, MAX_EXPERIENCE) / MAX_EXPERIENCE;
    const experienceBoosted = isUrgent(priority);
    const bonus = hasRequiredSkill(ticket, agent) ? 1 : 0;

    const contributions: Record<ScoreFactor, number> = {
      skill: weights.skill * skillMatch.score,
      workload: weights.load * workload,
      experience: weights.experience * experience * (experienceBoosted ? this.config.experiencePriorityMultiplier : 1),
      bonus: weights.bonus * bonus,
    };

    const breakdown: ScoreBreakdown = {
      skill: skillMatch.score,
      workload,
      experience,
      bonus,
      contributions,
      experienceBoosted,
      matches: skillMatch.matches,
      capacity,
    };

    const total = contributions.skill + contributions.workload + contributions.experience + contributions.bonus;

    return {
      eligible: true,
      agent,
      score: clamp(total, 0, 1),
      breakdown,
      rationale: this.explain(breakdown, agent, ticket, priority),
    };
  }

  /** Top contributing factors, strongest first */
  private explain(breakdown: ScoreBreakdown, agent: Agent, ticket: Ticket, priority: TicketPriority): string {
    const top = FACTOR_ORDER
      .filter((factor) => breakdown.contributions[factor] > 0)
      .sort((a, b) => breakdown.contributions[b] - breakdown.contributions[a])
      .slice(0, RATIONALE_FACTORS);

    if (top.length === 0) return 'no distinguishing factors';

    return top
      .map((factor) => {
        switch (factor) {
          case 'skill':
            return describeSkill(breakdown.skill, breakdown.matches);
          case 'workload':
            return `${grade(breakdown.workload, 0.75, 0.4, ['low', 'moderate', 'high'])} current load (${agent.current_load}/${breakdown.capacity})`;
          case 'experience': {
            const label = `${grade(breakdown.experience, 0.6, 0.4, ['extensive', 'solid', 'limited'])} experience (${breakdown.experience.toFixed(2)}`;
            return breakdown.experienceBoosted
              ? `${label}, x${this.config.experiencePriorityMultiplier} for ${priority} priority)`
              : `${label})`;
          }
          case 'bonus':
            return `has required skill ${ticket.metadata?.required_skill ?? ''}`.trim();
        }
      })
      .join('; ');
  }
}

function describeSkill(score: number, matches: SkillMatch[]): string {
  const skills = [...matches]
    .sort((a, b) => b.contribution - a.contribution)
    .slice(0, 2)
    .map((m) => m.skill);
  return `${grade(score, 0.6, 0.3, ['strong', 'moderate', 'weak'])} skill match (${score.toFixed(2)}) on ${skills.join(', ')}`;
}

function grade(value: number, high: number, mid: number, labels: [string, string, string]): string {
  if (value >= high) return labels[0];
  if (value >= mid) return labels[1];
  return labels[2];
}

function hasRequiredSkill(ticket: Ticket, agent: Agent): boolean {
  const required = ticket.metadata?.required_skill;
  if (!required) return false;
  const wanted = normalizeSkillName(required);
  return Object.keys(agent.skills).some((skill) => normalizeSkillName(skill) === wanted);
}
