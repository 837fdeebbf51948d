/**
 * Dataset Source
 *
 * Reads the `{ agents: [...], tickets: [...] }` document the CLI runs
 * against. Only the envelope is checked here; individual records are
 * validated by the assignment engine so one bad record never aborts a batch.
 */

import * as fs from 'fs';
import Ajv from 'ajv';
import { DatasetError } from '../routing/errors';
import { RawRecord } from '../routing/types';
import { logger } from '../observability/logger';

interface DatasetDocument {
  agents: RawRecord[];
  tickets: RawRecord[];
}

const ajv = new Ajv({ allErrors: true });
const validateDocument = ajv.compile<DatasetDocument>({
  type: 'object',
  required: ['agents', 'tickets'],
  properties: {
    agents: { type: 'array', items: { type: 'object' } },
    tickets: { type: 'array', items: { type: 'object' } },
  },
});

export class DatasetSource {
  private document?: DatasetDocument;
  private readonly log = logger.child({ component: 'dataset-source' });

  constructor(private readonly filepath: string) {}

  loadAgents(): RawRecord[] {
    return this.load().agents;
  }

  loadTickets(): RawRecord[] {
    return this.load().tickets;
  }

  private load(): DatasetDocument {
    if (this.document) return this.document;

    let content: string;
    try {
      content = fs.readFileSync(this.filepath, 'utf-8');
    } catch (err) {
      throw new DatasetError(`Dataset file '${this.filepath}' could not be read`, {
        filepath: this.filepath,
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new DatasetError(`Invalid JSON in dataset file '${this.filepath}'`, {
        filepath: this.filepath,
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    if (!validateDocument(parsed)) {
      const errors = validateDocument.errors?.map((e) => `${e.instancePath} ${e.message}`.trim()).join('; ');
      throw new DatasetError(`Dataset file '${this.filepath}' is not an agents/tickets document: ${errors}`, {
        filepath: this.filepath,
      });
    }

    this.log.info(
      { filepath: this.filepath, agents: parsed.agents.length, tickets: parsed.tickets.length },
      'Loaded dataset',
    );
    this.document = parsed;
    return parsed;
  }
}
