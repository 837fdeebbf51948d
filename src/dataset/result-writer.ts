import * as fs from 'fs';
import * as path from 'path';
import { toOutput } from '../routing/result-builder';
import { AssignmentRecord } from '../routing/types';
import { logger } from '../observability/logger';

/** Write `{ assignments }` as indented JSON, creating the directory if needed */
export function writeAssignments(filepath: string, records: readonly AssignmentRecord[]): void {
  fs.mkdirSync(path.dirname(filepath), { recursive: true });
  fs.writeFileSync(filepath, `${JSON.stringify(toOutput(records), null, 2)}\n`, 'utf-8');
  logger.info({ filepath, assignments: records.length }, 'Assignment results saved');
}
