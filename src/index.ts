#!/usr/bin/env node
import { env } from './config/env';
import { DatasetSource } from './dataset/dataset-source';
import { writeAssignments } from './dataset/result-writer';
import { logger } from './observability/logger';
import { AssignmentEngine } from './routing/assignment-engine';
import { summarize } from './routing/result-builder';

function main(): number {
  try {
    const source = new DatasetSource(env.dataset.inputPath);
    const engine = new AssignmentEngine({ capacityCeiling: env.assignment.capacityCeiling });
    const run = engine.run(source.loadAgents(), source.loadTickets());

    writeAssignments(env.dataset.outputPath, run.records);

    const summary = summarize(run.records, run.agents);
    for (const agent of summary.agents) {
      logger.info(agent, 'Agent workload');
    }
    logger.info(
      {
        runId: run.runId,
        processed: summary.ticketsProcessed,
        assigned: summary.ticketsAssigned,
        unassigned: summary.ticketsUnassigned,
        successRate: summary.successRate,
        skippedAgents: run.skippedAgents.length,
      },
      'Ticket assignment completed',
    );
    return 0;
  } catch (err) {
    logger.fatal({ err }, 'Ticket assignment failed');
    return 1;
  }
}

process.exitCode = main();
