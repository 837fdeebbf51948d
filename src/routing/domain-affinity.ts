/**
 * Domain affinity: tags a ticket with the technical domains its text names
 * and scales each skill's contribution by how well the skill fits them.
 * Read from config/domain-affinity.yaml.
 */

import * as path from 'path';
import Ajv from 'ajv';
import { logger } from '../observability/logger';
import { InvalidConfigurationError } from './errors';
import { normalizeSkillName, normalizeText, readYamlConfig } from './skill-vocabulary';

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const DEFAULT_AFFINITY_FILE = path.resolve(PROJECT_ROOT, 'config', 'domain-affinity.yaml');

export interface AffinityRule {
  /** Substrings of a normalized skill name that put the skill under this rule */
  skills: string[];
  domain: string;
  multiplier: number;
}

export interface DomainAffinityDefinition {
  domains: Record<string, string[]>;
  rules: AffinityRule[];
}

export interface DomainAffinity {
  /** Domain -> normalized detection terms */
  readonly domains: ReadonlyMap<string, readonly string[]>;
  /** Evaluated in order; the first applicable rule wins */
  readonly rules: readonly Readonly<AffinityRule>[];
}

const ajv = new Ajv({ allErrors: true });
const validateDefinition = ajv.compile<DomainAffinityDefinition>({
  type: 'object',
  required: ['domains', 'rules'],
  additionalProperties: false,
  properties: {
    domains: {
      type: 'object',
      additionalProperties: { type: 'array', items: { type: 'string', minLength: 1 } },
    },
    rules: {
      type: 'array',
      items: {
        type: 'object',
        required: ['skills', 'domain', 'multiplier'],
        additionalProperties: false,
        properties: {
          skills: { type: 'array', minItems: 1, items: { type: 'string', minLength: 1 } },
          domain: { type: 'string', minLength: 1 },
          multiplier: { type: 'number', exclusiveMinimum: 0 },
        },
      },
    },
  },
});

export function createDomainAffinity(definition: DomainAffinityDefinition): DomainAffinity {
  const domains = new Map<string, readonly string[]>();
  for (const [domain, terms] of Object.entries(definition.domains)) {
    const normalized = terms.map(normalizeText).filter((term) => term !== '');
    domains.set(domain, Object.freeze([...new Set(normalized)]));
  }

  const unknown = definition.rules.filter((rule) => !domains.has(rule.domain)).map((rule) => rule.domain);
  if (unknown.length > 0) {
    throw new InvalidConfigurationError(
      [...new Set(unknown)].map((domain) => `affinity rule names unknown domain "${domain}"`),
    );
  }

  const rules = definition.rules.map((rule) =>
    Object.freeze({
      skills: rule.skills.map(normalizeSkillName).filter((marker) => marker !== ''),
      domain: rule.domain,
      multiplier: rule.multiplier,
    }),
  );

  return { domains, rules: Object.freeze(rules) };
}

/** No domains and no rules: every multiplier is 1 */
export const NO_DOMAIN_AFFINITY: DomainAffinity = createDomainAffinity({ domains: {}, rules: [] });

export function loadDomainAffinity(filepath: string = DEFAULT_AFFINITY_FILE): DomainAffinity {
  const parsed = readYamlConfig(filepath, 'domain affinity');
  if (!validateDefinition(parsed)) {
    const errors = validateDefinition.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    throw new InvalidConfigurationError([`Invalid domain affinity in ${filepath}: ${errors}`]);
  }
  const affinity = createDomainAffinity(parsed);
  logger.debug({ filepath, domains: affinity.domains.size, rules: affinity.rules.length }, 'Loaded domain affinity');
  return affinity;
}

let defaultAffinity: DomainAffinity | undefined;

export function getDefaultDomainAffinity(): DomainAffinity {
  if (!defaultAffinity) {
    defaultAffinity = loadDomainAffinity();
  }
  return defaultAffinity;
}

/** Domains whose terms appear in the text on word boundaries */
export function detectDomains(affinity: DomainAffinity, text: string): Set<string> {
  const padded = ` ${normalizeText(text)} `;
  const found = new Set<string>();
  for (const [domain, terms] of affinity.domains) {
    if (terms.some((term) => padded.includes(` ${term} `))) found.add(domain);
  }
  return found;
}

/** Multiplier of the first rule that covers the skill and one of the ticket's domains */
export function domainMultiplier(affinity: DomainAffinity, skill: string, ticketDomains: ReadonlySet<string>): number {
  if (ticketDomains.size === 0) return 1;
  const name = normalizeSkillName(skill);
  for (const rule of affinity.rules) {
    if (!ticketDomains.has(rule.domain)) continue;
    if (rule.skills.some((marker) => name.includes(marker))) return rule.multiplier;
  }
  return 1;
}
