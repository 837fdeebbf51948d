/**
 * Assignment Engine
 *
 * Greedy, single-pass assignment: tickets are taken most urgent first and
 * each goes to the best eligible agent at that moment. The chosen agent's
 * load is incremented before the next ticket is scored, so earlier (more
 * urgent) tickets get first pick and decisions are never revisited.
 */

import { v4 as uuidv4 } from 'uuid';
import { resolveAssignmentConfig } from '../config/assignment-config';
import { AssignmentConfig, AssignmentOptions } from '../config/types';
import { childLogger } from '../observability/logger';
import { AgentScorer } from './agent-scorer';
import { KeywordIndex } from './keyword-index';
import { effectivePriority, priorityRank } from './priority';
import { checkAgent, checkTicket, recordId } from './record-validator';
import { ResultBuilder } from './result-builder';
import { TextMatcher } from './text-matcher';
import {
  Agent,
  AgentInput,
  AgentScore,
  AssignmentRecord,
  AssignmentRun,
  SkippedRecord,
  Ticket,
  TicketInput,
  TicketPriority,
} from './types';

type EligibleScore = Extract<AgentScore, { eligible: true }>;

interface QueuedTicket {
  index: number;
  ticket: Ticket;
  priority: TicketPriority;
}

export class AssignmentEngine {
  readonly config: AssignmentConfig;

  /** Configuration problems throw here, before any record is read */
  constructor(options?: AssignmentOptions) {
    this.config = resolveAssignmentConfig(options);
  }

  /**
   * Assign every ticket. The agents' `current_load` counters are mutated in
   * place: the pool is the run's working set.
   */
  run(agents: readonly AgentInput[], tickets: readonly TicketInput[]): AssignmentRun {
    const runId = uuidv4();
    const log = childLogger(runId, { component: 'assignment-engine' });
    log.info({ agents: agents.length, tickets: tickets.length }, 'Assignment run started');

    const skippedAgents: SkippedRecord[] = [];
    const pool = this.admitAgents(agents, skippedAgents);
    for (const skipped of skippedAgents) {
      log.warn({ agentId: skipped.id, reason: skipped.reason }, 'Skipping malformed agent record');
    }

    const matcher = new TextMatcher({
      minKeywordLength: this.config.minKeywordLength,
      stopWords: this.config.stopWords,
    });
    const index = KeywordIndex.build(
      pool.flatMap((agent) => Object.keys(agent.skills)),
      this.config.vocabulary,
      matcher,
    );
    const scorer = new AgentScorer(this.config, index);

    const queue: QueuedTicket[] = [];
    const rejected: SkippedRecord[] = [];
    const seenTickets = new Set<string>();

    tickets.forEach((raw, i) => {
      const check = checkTicket(raw);
      if (!check.ok) {
        rejected.push({ kind: 'ticket', id: recordId(raw, 'ticket_id', i), reason: check.reason });
        return;
      }
      if (seenTickets.has(check.value.ticket_id)) {
        rejected.push({ kind: 'ticket', id: check.value.ticket_id, reason: 'duplicate ticket_id' });
        return;
      }
      seenTickets.add(check.value.ticket_id);
      queue.push({ index: i, ticket: check.value, priority: effectivePriority(check.value) });
    });

    queue.sort((a, b) => priorityRank(b.priority) - priorityRank(a.priority) || a.index - b.index);

    const results = new ResultBuilder();

    for (const { ticket, priority } of queue) {
      const record = this.assignOne(ticket, priority, pool, scorer);
      log.debug(
        { ticketId: ticket.ticket_id, priority, agentId: record.assigned_agent_id, score: record.score },
        'Ticket processed',
      );
      results.add(record);
    }

    for (const skipped of rejected) {
      log.warn({ ticketId: skipped.id, reason: skipped.reason }, 'Skipping malformed ticket record');
      results.add({
        ticket_id: skipped.id,
        title: null,
        priority: null,
        assigned_agent_id: null,
        score: 0,
        rationale: `Skipped malformed ticket: ${skipped.reason}`,
      });
    }

    const records = results.build(tickets.length);
    const assigned = records.filter((r) => r.assigned_agent_id !== null).length;
    log.info(
      { assigned, unassigned: records.length - assigned, skippedAgents: skippedAgents.length },
      'Assignment run completed',
    );

    return { runId, records, agents: pool, skippedAgents };
  }

  private admitAgents(agents: readonly AgentInput[], skipped: SkippedRecord[]): Agent[] {
    const pool: Agent[] = [];
    const seen = new Set<string>();

    agents.forEach((raw, i) => {
      const check = checkAgent(raw);
      if (!check.ok) {
        skipped.push({ kind: 'agent', id: recordId(raw, 'agent_id', i), reason: check.reason });
        return;
      }
      if (seen.has(check.value.agent_id)) {
        skipped.push({ kind: 'agent', id: check.value.agent_id, reason: 'duplicate agent_id' });
        return;
      }
      seen.add(check.value.agent_id);
      pool.push(check.value);
    });

    return pool;
  }

  private assignOne(ticket: Ticket, priority: TicketPriority, pool: Agent[], scorer: AgentScorer): AssignmentRecord {
    const scores = pool.map((agent) => scorer.score(ticket, agent));
    const best = pickBest(scores);

    if (!best) {
      return {
        ticket_id: ticket.ticket_id,
        title: ticket.title,
        priority,
        assigned_agent_id: null,
        score: 0,
        rationale: explainNoCandidate(scores),
      };
    }

    const rationale = `Assigned to ${best.agent.name} (${best.agent.agent_id}): ${best.rationale}`;
    best.agent.current_load += 1;

    return {
      ticket_id: ticket.ticket_id,
      title: ticket.title,
      priority,
      assigned_agent_id: best.agent.agent_id,
      score: best.score,
      rationale,
    };
  }
}

/** Highest score; ties go to the lower current load, then the smaller agent_id */
export function pickBest(scores: readonly AgentScore[]): EligibleScore | null {
  let best: EligibleScore | null = null;
  for (const candidate of scores) {
    if (!candidate.eligible) continue;
    if (!best || outranks(candidate, best)) best = candidate;
  }
  return best;
}

function outranks(a: EligibleScore, b: EligibleScore): boolean {
  if (a.score !== b.score) return a.score > b.score;
  if (a.agent.current_load !== b.agent.current_load) return a.agent.current_load < b.agent.current_load;
  return a.agent.agent_id < b.agent.agent_id;
}

function explainNoCandidate(scores: readonly AgentScore[]): string {
  if (scores.length === 0) return 'No suitable agent available: no agents in pool';

  let atCapacity = 0;
  let unavailable = 0;
  for (const s of scores) {
    if (s.eligible) continue;
    if (s.reason === 'at_capacity') atCapacity++;
    else unavailable++;
  }

  const parts: string[] = [];
  if (atCapacity > 0) parts.push(`${atCapacity} at capacity`);
  if (unavailable > 0) parts.push(`${unavailable} not available`);
  return `No suitable agent available: ${parts.join(', ')}`;
}

/**
 * Run one batch. Returns one record per input ticket, in processing order,
 * and leaves the agents' loads incremented by their new assignments.
 */
export function runAssignment(
  agents: readonly AgentInput[],
  tickets: readonly TicketInput[],
  options?: AssignmentOptions,
): AssignmentRecord[] {
  return new AssignmentEngine(options).run(agents, tickets).records;
}
