/**
 * Result Builder
 *
 * Collects assignment records in processing order and checks the batch is
 * complete before it is handed to the writer.
 */

import { AssignmentIntegrityError } from './errors';
import { Agent, AssignmentRecord } from './types';

const SCORE_DECIMALS = 4;

export interface AgentWorkloadSummary {
  agentId: string;
  name: string;
  newAssignments: number;
  totalLoad: number;
}

export interface AssignmentSummary {
  ticketsProcessed: number;
  ticketsAssigned: number;
  ticketsUnassigned: number;
  /** Percentage of tickets that received an agent, one decimal */
  successRate: number;
  agents: AgentWorkloadSummary[];
}

export class ResultBuilder {
  private readonly records: AssignmentRecord[] = [];

  add(record: AssignmentRecord): void {
    this.records.push({ ...record, score: roundScore(record.score) });
  }

  get count(): number {
    return this.records.length;
  }

  /** The records in processing order; exactly one per input ticket */
  build(expectedCount: number): AssignmentRecord[] {
    if (this.records.length !== expectedCount) {
      throw new AssignmentIntegrityError(
        `Expected ${expectedCount} assignment records, built ${this.records.length}`,
        { expected: expectedCount, actual: this.records.length },
      );
    }

    const assignedIds = new Set<string>();
    for (const record of this.records) {
      if (record.assigned_agent_id === null) continue;
      if (assignedIds.has(record.ticket_id)) {
        throw new AssignmentIntegrityError(`Ticket ${record.ticket_id} was assigned more than once`, {
          ticketId: record.ticket_id,
        });
      }
      assignedIds.add(record.ticket_id);
    }

    return [...this.records];
  }
}

/** The document written for the assignment consumer */
export function toOutput(records: readonly AssignmentRecord[]): { assignments: AssignmentRecord[] } {
  return { assignments: [...records] };
}

/**
 * Per-agent workload after the run. Expects the agents whose loads the run
 * already incremented, so new assignments are counted from the records.
 */
export function summarize(records: readonly AssignmentRecord[], agents: readonly Agent[]): AssignmentSummary {
  const perAgent = new Map<string, number>();
  for (const record of records) {
    if (record.assigned_agent_id === null) continue;
    perAgent.set(record.assigned_agent_id, (perAgent.get(record.assigned_agent_id) ?? 0) + 1);
  }

  const assigned = records.filter((r) => r.assigned_agent_id !== null).length;
  const successRate = records.length === 0 ? 0 : Math.round((assigned / records.length) * 1000) / 10;

  return {
    ticketsProcessed: records.length,
    ticketsAssigned: assigned,
    ticketsUnassigned: records.length - assigned,
    successRate,
    agents: agents.map((agent) => ({
      agentId: agent.agent_id,
      name: agent.name,
      newAssignments: perAgent.get(agent.agent_id) ?? 0,
      totalLoad: agent.current_load,
    })),
  };
}

function roundScore(score: number): number {
  const factor = 10 ** SCORE_DECIMALS;
  return Math.round(score * factor) / factor;
}
