/**
 * CLI command: part
 *
 * Show one part record.
 */

import type { Command } from 'commander';
import { contextOptionsFrom, withContext } from '../context.js';
import { AgentErrors, ExitCode, exitWithAgentError, handleError } from '../errors.js';
import { formatPart } from '../output.js';

interface PartOptions {
  json?: boolean;
}

async function executePart(id: string, options: PartOptions, command: Command): Promise<void> {
  const isJson = options.json === true;
  try {
    const part = await withContext(async (context) => context.storage.getPart(id), contextOptionsFrom(command));
    if (part === null) {
      exitWithAgentError(AgentErrors.partNotFound(id), ExitCode.NOT_FOUND, isJson);
    }
    formatPart(part, { json: isJson });
  } catch (error) {
    handleError(error, isJson);
  }
}

export function registerPartCommand(program: Command): void {
  program
    .command('part')
    .description('Show a part record by id')
    .argument('<id>', 'Part id (e.g. BBa_J23100)')
    .option('--json', 'Output in JSON format')
    .action(async (id: string, options: PartOptions, command: Command) => {
      await executePart(id, options, command);
    });
}
