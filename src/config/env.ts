import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  return val ? parseInt(val, 10) : fallback;
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  logLevel: optional('LOG_LEVEL', 'info'),

  // ───── Dataset I/O ─────
  dataset: {
    inputPath: path.resolve(optional('DATASET_PATH', 'dataset.json')),
    outputPath: path.resolve(optional('OUTPUT_PATH', 'output_result.json')),
  },

  // ───── Assignment ─────
  assignment: {
    capacityCeiling: optionalInt('ASSIGNMENT_CAPACITY_CEILING', 8),
  },
} as const;
