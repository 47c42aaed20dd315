/**
 * CLI command: remove
 *
 * Delete a part from the catalog and the index.
 */

import type { Command } from 'commander';
import { contextOptionsFrom, withContext } from '../context.js';
import { AgentErrors, ExitCode, exitWithAgentError, handleError } from '../errors.js';

interface RemoveOptions {
  json?: boolean;
}

async function executeRemove(id: string, options: RemoveOptions, command: Command): Promise<void> {
  const isJson = options.json === true;
  try {
    const removed = await withContext(async (context) => {
      const deleted = await context.ingestor.remove(id);
      if (deleted) await context.saveSnapshot();
      return deleted;
    }, contextOptionsFrom(command));

    if (!removed) {
      exitWithAgentError(AgentErrors.partNotFound(id), ExitCode.NOT_FOUND, isJson);
    }
    console.log(isJson ? JSON.stringify({ id, deleted: true }) : `Removed ${id}`);
  } catch (error) {
    handleError(error, isJson);
  }
}

export function registerRemoveCommand(program: Command): void {
  program
    .command('remove')
    .description('Delete a part from the catalog and the index')
    .argument('<id>', 'Part id')
    .option('--json', 'Output in JSON format')
    .action(async (id: string, options: RemoveOptions, command: Command) => {
      await executeRemove(id, options, command);
    });
}
