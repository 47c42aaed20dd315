/**
 * CLI command: list
 *
 * Filtered, paginated listing of the catalog.
 */

import type { Command } from 'commander';
import { PartFiltersSchema } from '../../parts/types.js';
import { contextOptionsFrom, withContext } from '../context.js';
import { handleError, InvalidArgumentError, parsePositiveInt } from '../errors.js';
import { formatPartPage } from '../output.js';

interface ListOptions {
  type?: string[];
  source?: string[];
  organism?: string;
  limit?: string;
  offset?: string;
  byUsage?: boolean;
  includeFilters?: boolean;
  json?: boolean;
}

async function executeList(options: ListOptions, command: Command): Promise<void> {
  const isJson = options.json === true;

  try {
    const limit = parsePositiveInt(options.limit, 'limit', 20);
    const offset = options.offset === undefined ? 0 : Number.parseInt(options.offset, 10);
    if (Number.isNaN(offset) || offset < 0) {
      throw new InvalidArgumentError('--offset must be a non-negative integer');
    }

    const filters = PartFiltersSchema.parse({
      types: options.type,
      sources: options.source,
      organism: options.organism,
    });

    await withContext(async (context) => {
      const page = context.storage.listParts(filters, {
        limit,
        offset,
        orderBy: options.byUsage === true ? 'usage' : 'id',
      });
      const available = options.includeFilters === true ? context.storage.getAvailableFilters() : undefined;
      formatPartPage(page, offset, available, { json: isJson });
    }, contextOptionsFrom(command));
  } catch (error) {
    handleError(error, isJson);
  }
}

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List parts, optionally filtered')
    .option('-t, --type <types...>', 'Filter by part type')
    .option('-s, --source <sources...>', 'Filter by source collection')
    .option('-o, --organism <name>', 'Filter by host organism')
    .option('-n, --limit <n>', 'Page size (default: 20)')
    .option('--offset <n>', 'Records to skip (default: 0)')
    .option('--by-usage', 'Order by usage count instead of id')
    .option('--include-filters', 'Show the available filter values')
    .option('--json', 'Output in JSON format')
    .action(async (options: ListOptions, command: Command) => {
      await executeList(options, command);
    });
}
