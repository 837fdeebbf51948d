/**
 * Per-record validation of agents and tickets.
 *
 * A record that fails is reported back as a reason string; the caller keeps
 * processing the rest of the batch.
 */

import Ajv, { ErrorObject } from 'ajv';
import { TICKET_PRIORITIES } from './priority';
import { Agent, AgentInput, Ticket, TicketInput } from './types';

const ajv = new Ajv({ allErrors: true });

export const agentSchema = {
  type: 'object',
  required: ['agent_id', 'name', 'skills', 'current_load', 'availability_status', 'experience_level'],
  properties: {
    agent_id: { type: 'string', minLength: 1 },
    name: { type: 'string' },
    skills: {
      type: 'object',
      additionalProperties: { type: 'number', minimum: 0 },
    },
    current_load: { type: 'integer', minimum: 0 },
    availability_status: { type: 'string' },
    experience_level: { type: 'number', minimum: 0 },
    max_load: { type: 'integer', minimum: 0 },
  },
};

export const ticketSchema = {
  type: 'object',
  required: ['ticket_id', 'title', 'description'],
  properties: {
    ticket_id: { type: 'string', minLength: 1 },
    title: { type: 'string' },
    description: { type: 'string' },
    priority: { enum: [...TICKET_PRIORITIES] },
    creation_timestamp: { type: 'number' },
    metadata: {
      type: 'object',
      properties: {
        required_skill: { type: 'string' },
      },
    },
  },
};

const validateAgentSchema = ajv.compile<Agent>(agentSchema);
const validateTicketSchema = ajv.compile<Ticket>(ticketSchema);

export type RecordCheck<T> = { ok: true; value: T } | { ok: false; reason: string };

export function checkAgent(record: AgentInput): RecordCheck<Agent> {
  if (!validateAgentSchema(record)) {
    return { ok: false, reason: formatErrors(validateAgentSchema.errors) };
  }
  return { ok: true, value: record };
}

export function checkTicket(record: TicketInput): RecordCheck<Ticket> {
  if (!validateTicketSchema(record)) {
    return { ok: false, reason: formatErrors(validateTicketSchema.errors) };
  }
  if (`${record.title}${record.description}`.trim() === '') {
    return { ok: false, reason: 'ticket has no title or description text' };
  }
  return { ok: true, value: record };
}

/**
 * Best-effort identifier of a record that may have failed validation;
 * falls back to its input position, as `(input #2)`.
 */
export function recordId(record: AgentInput | TicketInput, key: 'agent_id' | 'ticket_id', index: number): string {
  const value: unknown = Object.entries(record).find(([k]) => k === key)?.[1];
  return typeof value === 'string' && value !== '' ? value : `(input #${index})`;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'record failed validation';
  return errors.map((e) => (e.instancePath ? `${e.instancePath} ${e.message}` : `${e.message}`)).join('; ');
}
