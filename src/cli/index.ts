#!/usr/bin/env node
/**
 * partlens CLI entry point
 *
 * Provides command-line access to ingestion, search and the MCP server.
 */

import { Command } from 'commander';
import { VERSION } from '../version.js';
import { registerIngestCommand } from './commands/ingest.js';
import { registerListCommand } from './commands/list.js';
import { registerPartCommand } from './commands/part.js';
import { registerRemoveCommand } from './commands/remove.js';
import { registerSearchCommand } from './commands/search.js';
import { registerServeCommand } from './commands/serve.js';
import { registerStatsCommand } from './commands/stats.js';

/**
 * Create and configure the CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('partlens')
    .description('Semantic search over synthetic-biology part catalogs')
    .version(VERSION)
    .option('-c, --config <path>', 'Configuration file (default: partlens.config.json lookup)');

  registerIngestCommand(program);
  registerSearchCommand(program);
  registerPartCommand(program);
  registerListCommand(program);
  registerStatsCommand(program);
  registerRemoveCommand(program);
  registerServeCommand(program);

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    // Commander handles most errors, but catch any unexpected ones
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

void main();
