/**
 * Ticket Assignment Types
 *
 * Agent and ticket records keep the snake_case field names of the dataset
 * they are loaded from.
 */

export type AvailabilityStatus = 'Available' | 'Busy' | 'Offline' | 'On Leave';

export type TicketPriority = 'Low' | 'Medium' | 'High' | 'Critical';

export interface Agent {
  agent_id: string;
  name: string;
  /** Skill name -> proficiency (nominally 1-10) */
  skills: Record<string, number>;
  /** Open tickets currently held; incremented as tickets are assigned */
  current_load: number;
  /** One of AvailabilityStatus; unrecognized values count as unavailable */
  availability_status: string;
  experience_level: number;
  /** Overrides the configured capacity ceiling for this agent */
  max_load?: number;
}

export interface TicketMetadata {
  /** Skill whose presence on an agent earns the bonus factor */
  required_skill?: string;
  [key: string]: unknown;
}

export interface Ticket {
  ticket_id: string;
  title: string;
  description: string;
  priority?: TicketPriority;
  creation_timestamp?: number;
  metadata?: TicketMetadata;
}

/** A record as parsed from JSON, before schema validation */
export type RawRecord = Record<string, unknown>;

export type AgentInput = Agent | RawRecord;
export type TicketInput = Ticket | RawRecord;

export interface AssignmentRecord {
  ticket_id: string;
  title: string | null;
  priority: TicketPriority | null;
  assigned_agent_id: string | null;
  score: number;
  rationale: string;
}

export interface SkillMatch {
  skill: string;
  proficiency: number;
  matchedKeywords: string[];
  /** Domain affinity factor applied to this skill; 1 when none applies */
  domainMultiplier: number;
  /** Proficiency-weighted share of the skill score */
  contribution: number;
}

export interface SkillMatchResult {
  /** Aggregate in [0, 1] */
  score: number;
  matches: SkillMatch[];
}

export type ScoreFactor = 'skill' | 'workload' | 'experience' | 'bonus';

export interface ScoreBreakdown {
  skill: number;
  workload: number;
  experience: number;
  bonus: number;
  /** Weighted contribution of each factor to the final score */
  contributions: Record<ScoreFactor, number>;
  experienceBoosted: boolean;
  matches: SkillMatch[];
  capacity: number;
}

export type IneligibleReason = 'unavailable' | 'at_capacity';

export type AgentScore =
  | {
      eligible: true;
      agent: Agent;
      score: number;
      breakdown: ScoreBreakdown;
      rationale: string;
    }
  | {
      eligible: false;
      agent: Agent;
      score: -1;
      reason: IneligibleReason;
    };

export interface SkippedRecord {
  kind: 'agent' | 'ticket';
  id: string;
  reason: string;
}

export interface AssignmentRun {
  runId: string;
  records: AssignmentRecord[];
  /** The validated agents the run worked on, loads as left by the run */
  agents: Agent[];
  skippedAgents: SkippedRecord[];
}
