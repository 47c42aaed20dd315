/**
 * CLI command: stats
 *
 * Index, catalog and worker statistics.
 */

import type { Command } from 'commander';
import { contextOptionsFrom, withContext } from '../context.js';
import { handleError } from '../errors.js';
import { formatStats } from '../output.js';

interface StatsOptions {
  json?: boolean;
}

async function executeStats(options: StatsOptions, command: Command): Promise<void> {
  const isJson = options.json === true;
  try {
    await withContext(async (context) => {
      formatStats(
        context.service.getIndexStats(),
        context.storage.getStatistics(),
        context.service.getWorkerStats(),
        { json: isJson }
      );
    }, contextOptionsFrom(command));
  } catch (error) {
    handleError(error, isJson);
  }
}

export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Show index, catalog and worker statistics')
    .option('--json', 'Output in JSON format')
    .action(async (options: StatsOptions, command: Command) => {
      await executeStats(options, command);
    });
}
