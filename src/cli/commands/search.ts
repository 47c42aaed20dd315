/**
 * CLI command: search
 *
 * Ranked semantic search over the part catalog.
 */

import type { Command } from 'commander';
import type { PartFiltersInput } from '../../parts/types.js';
import { contextOptionsFrom, withContext } from '../context.js';
import { AgentErrors, ExitCode, exitWithAgentError, handleError, parsePositiveInt } from '../errors.js';
import { formatSearchOutcome } from '../output.js';

interface SearchOptions {
  type?: string[];
  source?: string[];
  organism?: string;
  topK?: string;
  timeout?: string;
  json?: boolean;
}

async function executeSearch(query: string, options: SearchOptions, command: Command): Promise<void> {
  const isJson = options.json === true;

  try {
    const filters: PartFiltersInput = {};
    if (options.type !== undefined) filters.types = options.type;
    if (options.source !== undefined) filters.sources = options.source;
    if (options.organism !== undefined) filters.organism = options.organism;

    const outcome = await withContext(async (context) => {
      if (context.engine.size === 0 && context.storage.count() === 0) {
        return null;
      }
      return context.service.search({
        queryText: query,
        filters,
        topK: options.topK === undefined ? undefined : parsePositiveInt(options.topK, 'top-k', 10),
        timeoutMs: options.timeout === undefined ? undefined : parsePositiveInt(options.timeout, 'timeout', 2000),
      });
    }, contextOptionsFrom(command));

    if (outcome === null) {
      exitWithAgentError(AgentErrors.indexEmpty(), ExitCode.EMPTY_INDEX, isJson);
    }

    switch (outcome.status) {
      case 'ok':
        formatSearchOutcome(outcome, { json: isJson });
        return;
      case 'invalid_request':
        formatSearchOutcome(outcome, { json: isJson });
        process.exit(ExitCode.INVALID_ARGS);
      case 'error':
        formatSearchOutcome(outcome, { json: isJson });
        process.exit(ExitCode.GENERAL_ERROR);
      case 'timeout':
        exitWithAgentError(
          AgentErrors.searchUnavailable(outcome.status, `No result within ${String(outcome.elapsedMs)}ms`),
          ExitCode.UNAVAILABLE,
          isJson
        );
      case 'overload':
      case 'no_available_worker':
        exitWithAgentError(AgentErrors.searchUnavailable(outcome.status, outcome.message), ExitCode.UNAVAILABLE, isJson);
    }
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the search command with the program
 */
export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Search parts by natural language or part id')
    .argument('[query]', 'Query text; omit to rank by filters alone', '')
    .option('-t, --type <types...>', 'Filter by part type (e.g. promoter, terminator)')
    .option('-s, --source <sources...>', 'Filter by source collection')
    .option('-o, --organism <name>', 'Filter by host organism')
    .option('-k, --top-k <n>', 'Maximum results (default: 10)')
    .option('--timeout <ms>', 'Search deadline in milliseconds (default: 2000)')
    .option('--json', 'Output in JSON format')
    .action(async (query: string, options: SearchOptions, command: Command) => {
      await executeSearch(query, options, command);
    });
}
