/**
 * CLI command: ingest
 *
 * Load a JSON or JSON Lines part feed, embed changed records, update the
 * index and persist a new snapshot.
 */

import type { Command } from 'commander';
import { readFeedFile } from '../../ingest/feed.js';
import { IngestError, IngestErrorCode } from '../../ingest/types.js';
import { contextOptionsFrom, withContext } from '../context.js';
import { handleError, InvalidArgumentError, NotFoundError } from '../errors.js';
import { formatIngestReport } from '../output.js';
import { createProgressDisplay } from '../progress.js';

interface IngestOptions {
  json?: boolean;
  quiet?: boolean;
  snapshot?: boolean;
}

async function executeIngest(file: string, options: IngestOptions, command: Command): Promise<void> {
  const isJson = options.json === true;

  try {
    let records: unknown[];
    try {
      records = readFeedFile(file);
    } catch (error) {
      if (error instanceof IngestError && error.code === IngestErrorCode.FEED_MISSING) {
        throw new NotFoundError(error.message, error);
      }
      if (error instanceof IngestError) {
        throw new InvalidArgumentError(error.message, error);
      }
      throw error;
    }

    const progress = createProgressDisplay({ json: isJson, quiet: options.quiet === true });

    await withContext(async (context) => {
      const report = await context.ingestor.ingest(records, { onProgress: progress.createCallback() });
      progress.finish();

      const changed = report.inserted + report.updated > 0;
      const snapshotId = options.snapshot !== false && changed ? await context.saveSnapshot() : undefined;
      formatIngestReport(report, snapshotId, { json: isJson });
    }, contextOptionsFrom(command));
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the ingest command with the program
 */
export function registerIngestCommand(program: Command): void {
  program
    .command('ingest')
    .description('Ingest a part feed (JSON array or JSON Lines)')
    .argument('<file>', 'Path to the feed file')
    .option('--no-snapshot', 'Do not save an index snapshot afterwards')
    .option('-q, --quiet', 'Suppress progress output')
    .option('--json', 'Output in JSON format')
    .action(async (file: string, options: IngestOptions, command: Command) => {
      await executeIngest(file, options, command);
    });
}
