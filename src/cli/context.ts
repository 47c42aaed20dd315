/**
 * CLI context manager
 *
 * Provides shared component initialization for CLI commands. Uses the same
 * runtime wiring as the MCP server.
 */

import type { Command } from 'commander';
import { ZodError } from 'zod';
import { loadConfig, type LoadConfigOptions } from '../config/config.js';
import type { PartlensConfig } from '../config/schema.js';
import { createLogger, setDefaultLogger } from '../logging/logger.js';
import { createRuntime, type Runtime } from '../runtime/runtime.js';
import { AgentErrors, CLIError, ExitCode } from './errors.js';

/**
 * CLI context containing all initialized components
 */
export type CLIContext = Runtime;

export type CreateContextOptions = LoadConfigOptions;

/**
 * Load configuration and install the configured logger
 */
export function loadCLIConfig(options: CreateContextOptions = {}): PartlensConfig {
  let config: PartlensConfig;
  try {
    config = loadConfig(options);
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw CLIError.withAgentInfo(AgentErrors.configInvalid(details), ExitCode.INVALID_ARGS, error);
    }
    throw error;
  }
  setDefaultLogger(createLogger(config.logging));
  return config;
}

/**
 * Create CLI context with all components initialized
 */
export async function createCLIContext(options: CreateContextOptions = {}): Promise<CLIContext> {
  return createRuntime(loadCLIConfig(options));
}

/**
 * Run a function with CLI context, ensuring cleanup on exit
 */
export async function withContext<T>(
  fn: (context: CLIContext) => Promise<T>,
  options: CreateContextOptions = {}
): Promise<T> {
  const context = await createCLIContext(options);
  try {
    return await fn(context);
  } finally {
    await context.close();
  }
}

/**
 * Context options from the program-wide flags
 */
export function contextOptionsFrom(command: Command): CreateContextOptions {
  const { config } = command.optsWithGlobals<{ config?: string }>();
  return config === undefined ? {} : { configPath: config };
}
