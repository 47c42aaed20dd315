/**
 * CLI command: serve
 *
 * Run the MCP server on stdio.
 */

import type { Command } from 'commander';
import { startMCPServer } from '../../mcp/server.js';
import { contextOptionsFrom, loadCLIConfig } from '../context.js';
import { handleError } from '../errors.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the MCP server on stdio')
    .action(async (_options: object, command: Command) => {
      try {
        const options = contextOptionsFrom(command);
        // installs the configured logger before the server starts
        loadCLIConfig(options);
        await startMCPServer(options);
      } catch (error) {
        handleError(error);
      }
    });
}
