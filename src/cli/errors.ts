/**
 * CLI error types and handlers
 *
 * Defines CLI-specific errors with exit codes for proper process termination.
 * Includes agent-friendly error formatting so AI agents know how to recover.
 */

/**
 * Agent-friendly error structure
 */
export interface AgentError {
  error: string;
  action_required: string;
  command?: string;
  hint?: string;
}

/**
 * CLI exit codes
 */
export enum ExitCode {
  SUCCESS = 0,
  GENERAL_ERROR = 1,
  INVALID_ARGS = 2,
  /** Part or feed file not found */
  NOT_FOUND = 3,
  /** Index holds no parts yet */
  EMPTY_INDEX = 4,
  /** Search ran out of time or capacity */
  UNAVAILABLE = 5,
}

/**
 * Base CLI error class with agent-friendly error support
 */
export class CLIError extends Error {
  public readonly agentError: AgentError | undefined;

  constructor(
    message: string,
    public readonly exitCode: ExitCode = ExitCode.GENERAL_ERROR,
    public readonly cause?: Error,
    agentError?: AgentError
  ) {
    super(message);
    this.name = 'CLIError';
    this.agentError = agentError;
  }

  static withAgentInfo(
    agentError: AgentError,
    exitCode: ExitCode = ExitCode.GENERAL_ERROR,
    cause?: Error
  ): CLIError {
    return new CLIError(agentError.error, exitCode, cause, agentError);
  }
}

export class InvalidArgumentError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, ExitCode.INVALID_ARGS, cause);
    this.name = 'InvalidArgumentError';
  }
}

export class NotFoundError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, ExitCode.NOT_FOUND, cause);
    this.name = 'NotFoundError';
  }
}

/**
 * Common agent-friendly errors with pre-defined messages
 */
export const AgentErrors = {
  indexEmpty: (): AgentError => ({
    error: 'The index holds no parts',
    action_required: 'Ingest a part feed before searching',
    command: 'partlens ingest <feed.json>',
  }),

  partNotFound: (id: string): AgentError => ({
    error: `Part not found: ${id}`,
    action_required: 'Check the id or search for the part by description',
    command: `partlens search "${id}"`,
  }),

  noResults: (query: string): AgentError => ({
    error: 'No results found',
    action_required: 'Try a broader query or fewer filters',
    command: 'partlens list --include-filters',
    hint: `Query was: "${query}"`,
  }),

  searchUnavailable: (status: string, details: string): AgentError => ({
    error: `Search ${status.replace(/_/g, ' ')}`,
    action_required: 'Retry with a longer --timeout or once load has dropped',
    hint: details,
  }),

  configInvalid: (details: string): AgentError => ({
    error: 'Invalid configuration',
    action_required: 'Fix partlens.config.json or the PARTLENS_* environment variables',
    hint: details,
  }),
} as const;

/**
 * Format an agent-friendly error for output
 */
export function formatAgentError(error: AgentError, json = false): string {
  if (json || process.env.PARTLENS_OUTPUT === 'json') {
    return JSON.stringify(error, null, 2);
  }

  const lines: string[] = [`Error: ${error.error}`, '', `Action required: ${error.action_required}`];

  if (error.command !== undefined) {
    lines.push('', `Run: ${error.command}`);
  }

  if (error.hint !== undefined) {
    lines.push('', `Hint: ${error.hint}`);
  }

  return lines.join('\n');
}

/**
 * Handle an error and exit the process with appropriate code
 */
export function handleError(error: unknown, json = false): never {
  let exitCode = ExitCode.GENERAL_ERROR;
  let message: string;
  let agentError: AgentError | undefined;

  if (error instanceof CLIError) {
    exitCode = error.exitCode;
    message = error.message;
    agentError = error.agentError;
  } else if (error instanceof Error) {
    message = error.message;
  } else {
    message = String(error);
  }

  if (agentError !== undefined) {
    console.error(formatAgentError(agentError, json));
  } else if (json) {
    console.error(JSON.stringify({ error: { code: exitCode, message } }));
  } else {
    console.error(`Error: ${message}`);
  }

  process.exit(exitCode);
}

/**
 * Exit with an agent-friendly error
 */
export function exitWithAgentError(
  agentError: AgentError,
  exitCode: ExitCode = ExitCode.GENERAL_ERROR,
  json = false
): never {
  console.error(formatAgentError(agentError, json));
  process.exit(exitCode);
}

/**
 * Parse a positive integer option value
 */
export function parsePositiveInt(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError(`--${name} must be a positive integer`);
  }
  return parsed;
}
