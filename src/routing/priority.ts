import { normalizeText } from './skill-vocabulary';
import { Ticket, TicketPriority } from './types';

export const TICKET_PRIORITIES: readonly TicketPriority[] = ['Low', 'Medium', 'High', 'Critical'];

const PRIORITY_RANK: Record<TicketPriority, number> = {
  Low: 0,
  Medium: 1,
  High: 2,
  Critical: 3,
};

const HIGH_URGENCY_TERMS = [
  'critical', 'urgent', 'emergency', 'down', 'outage', 'breach', 'security',
  'production', 'business critical', 'attack', 'locked', 'unreachable',
  'slow performance', 'phishing',
];

const MEDIUM_URGENCY_TERMS = [
  'unable', 'error', 'problem', 'issue', 'failed', 'not working',
  'access denied', 'boot', 'laptop',
];

const MAX_URGENCY_POINTS = 5;

export function priorityRank(priority: TicketPriority): number {
  return PRIORITY_RANK[priority];
}

export function isUrgent(priority: TicketPriority): boolean {
  return priority === 'High' || priority === 'Critical';
}

/**
 * Urgency points from the ticket text: 1 base, +2 per high-urgency term,
 * +1 per medium-urgency term, capped at 5.
 */
export function urgencyPoints(text: string): number {
  const padded = ` ${normalizeText(text)} `;
  const has = (term: string) => padded.includes(` ${term} `);

  let points = 1;
  for (const term of HIGH_URGENCY_TERMS) {
    if (has(term)) points += 2;
  }
  for (const term of MEDIUM_URGENCY_TERMS) {
    if (has(term)) points += 1;
  }
  return Math.min(points, MAX_URGENCY_POINTS);
}

export function inferPriority(text: string): TicketPriority {
  const points = urgencyPoints(text);
  if (points >= 5) return 'Critical';
  if (points >= 3) return 'High';
  if (points >= 2) return 'Medium';
  return 'Low';
}

/** Declared priority, or the one inferred from title and description */
export function effectivePriority(ticket: Ticket): TicketPriority {
  return ticket.priority ?? inferPriority(`${ticket.title} ${ticket.description}`);
}
