/**
 * Static skill vocabulary: curated synonyms per skill, read from
 * config/skill-keywords.yaml.
 */

import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import Ajv from 'ajv';
import { logger } from '../observability/logger';
import { InvalidConfigurationError } from './errors';

// Resolve from project root (2 levels up from dist/routing/ or src/routing/)
const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
export const DEFAULT_VOCABULARY_FILE = path.resolve(PROJECT_ROOT, 'config', 'skill-keywords.yaml');

/** Normalized skill name -> keyword list */
export type SkillVocabulary = ReadonlyMap<string, readonly string[]>;

const ajv = new Ajv({ allErrors: true });
const validateVocabulary = ajv.compile<Record<string, string[]>>({
  type: 'object',
  additionalProperties: {
    type: 'array',
    items: { type: 'string', minLength: 1 },
  },
});

/** "VPN Troubleshooting", "vpn_troubleshooting" -> "vpn_troubleshooting" */
export function normalizeSkillName(skill: string): string {
  return skill
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '_')
    .replace(/^_+|_+$/g, '');
}

/** Lowercase, collapse every run of non-letters and non-digits to a single space */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

export function createVocabulary(entries: Record<string, readonly string[]>): SkillVocabulary {
  const vocabulary = new Map<string, readonly string[]>();
  for (const [skill, keywords] of Object.entries(entries)) {
    const key = normalizeSkillName(skill);
    const merged = new Set(vocabulary.get(key) ?? []);
    for (const keyword of keywords) {
      const normalized = normalizeText(keyword);
      if (normalized) merged.add(normalized);
    }
    vocabulary.set(key, Object.freeze([...merged]));
  }
  return vocabulary;
}

export function loadVocabulary(filepath: string = DEFAULT_VOCABULARY_FILE): SkillVocabulary {
  const parsed = readYamlConfig(filepath, 'skill vocabulary');
  if (!validateVocabulary(parsed)) {
    const errors = validateVocabulary.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    throw new InvalidConfigurationError([`Invalid skill vocabulary in ${filepath}: ${errors}`]);
  }
  const vocabulary = createVocabulary(parsed);
  logger.debug({ filepath, skills: vocabulary.size }, 'Loaded skill vocabulary');
  return vocabulary;
}

/** Read and parse a YAML config file; I/O and syntax failures are configuration errors */
export function readYamlConfig(filepath: string, label: string): unknown {
  try {
    return yaml.load(fs.readFileSync(filepath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidConfigurationError([`Invalid ${label} in ${filepath}: ${reason}`]);
  }
}

let defaultVocabulary: SkillVocabulary | undefined;

/** The bundled vocabulary, parsed on first use; it never changes afterwards */
export function getDefaultVocabulary(): SkillVocabulary {
  if (!defaultVocabulary) {
    defaultVocabulary = loadVocabulary();
  }
  return defaultVocabulary;
}
