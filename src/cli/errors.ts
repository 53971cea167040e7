/**
 * CLI error types and handlers
 *
 * Defines CLI-specific errors with exit codes for proper process termination.
 * Includes agent-friendly error formatting so automated callers know how to recover.
 */

import { ZodError } from 'zod';
import { RetrievalError, RetrievalErrorCode } from '../similarity/errors.js';
import { ContentTreeError } from '../content/tree.js';
import { StorageError } from '../storage/types.js';

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
  /** Success */
  SUCCESS = 0,
  /** General error */
  GENERAL_ERROR = 1,
  /** Invalid arguments or settings */
  INVALID_ARGS = 2,
  /** Site or document not found */
  NOT_FOUND = 3,
  /** Backend or storage unavailable */
  CONNECTION_ERROR = 5,
}

/**
 * Base CLI error class with agent-friendly error support
 */
export class CLIError extends Error {
  public readonly agentError: AgentError | undefined;

  constructor(
    message: string,
    public readonly exitCode: ExitCode = ExitCode.GENERAL_ERROR,
    public override readonly cause?: Error,
    agentError?: AgentError
  ) {
    super(message);
    this.name = 'CLIError';
    this.agentError = agentError;
  }

  /**
   * Create a CLIError with agent-friendly information
   */
  static withAgentInfo(
    agentError: AgentError,
    exitCode: ExitCode = ExitCode.GENERAL_ERROR,
    cause?: Error
  ): CLIError {
    return new CLIError(agentError.error, exitCode, cause, agentError);
  }
}

/**
 * Error for invalid command arguments
 */
export class InvalidArgumentError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, ExitCode.INVALID_ARGS, cause);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Common agent-friendly errors with pre-defined messages
 */
export const AgentErrors = {
  siteNotFound: (identifier: string, known: readonly string[]): AgentError => ({
    error: `Site not found: ${identifier}`,
    action_required: 'Pass a configured site identifier or root id',
    hint: known.length > 0 ? `Configured sites: ${known.join(', ')}` : 'No sites configured',
  }),

  noSites: (): AgentError => ({
    error: 'No sites configured',
    action_required: 'Add at least one site with its cores to likewise.config.json',
    hint: 'sites: [{ "identifier": "main", "rootContainerId": 1, "cores": { "0": "core_en" } }]',
  }),

  contentTreeMissing: (): AgentError => ({
    error: 'No content tree configured',
    action_required: 'Export the page tree as JSON and point contentTree.path at it',
    hint: 'Or set LIKEWISE_CONTENT_TREE',
  }),

  invalidSettings: (details: string): AgentError => ({
    error: 'Invalid similarity settings',
    action_required: 'Fix the settings in the configuration file or the --set flags',
    hint: details,
  }),


  databaseError: (details: string): AgentError => ({
    error: 'Database error',
    action_required: 'Check the storage.databasePath setting and file permissions',
    hint: details,
  }),

  configInvalid: (details: string): AgentError => ({
    error: 'Invalid configuration',
    action_required: 'Fix the configuration file or the LIKEWISE_* environment variables',
    hint: details,
  }),
} as const;

/**
 * Format an agent-friendly error for output
 */
export function formatAgentError(error: AgentError, json = false): string {
  if (json || process.env.LIKEWISE_OUTPUT === 'json') {
    return JSON.stringify(error, null, 2);
  }

  const lines: string[] = [
    `Error: ${error.error}`,
    '',
    `Action required: ${error.action_required}`,
  ];

  if (error.command !== undefined) {
    lines.push('', `Run: ${error.command}`);
  }

  if (error.hint !== undefined) {
    lines.push('', `Hint: ${error.hint}`);
  }

  return lines.join('\n');
}

/**
 * Map a domain error to a CLI error
 */
export function toCLIError(error: unknown): CLIError | null {
  if (error instanceof CLIError) {
    return error;
  }
  if (error instanceof RetrievalError) {
    if (error.code === RetrievalErrorCode.INVALID_CONFIGURATION) {
      return CLIError.withAgentInfo(
        AgentErrors.invalidSettings(error.message),
        ExitCode.INVALID_ARGS,
        error
      );
    }
    return new CLIError(error.message, ExitCode.CONNECTION_ERROR, error);
  }
  if (error instanceof StorageError) {
    return CLIError.withAgentInfo(
      AgentErrors.databaseError(error.message),
      ExitCode.CONNECTION_ERROR,
      error
    );
  }
  if (error instanceof ZodError) {
    const details = error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    return CLIError.withAgentInfo(AgentErrors.configInvalid(details), ExitCode.INVALID_ARGS, error);
  }
  if (error instanceof ContentTreeError) {
    return CLIError.withAgentInfo(
      AgentErrors.configInvalid(error.message),
      ExitCode.INVALID_ARGS,
      error
    );
  }
  return null;
}

/**
 * Handle an error and exit the process with appropriate code
 *
 * Outputs agent-friendly error format when available, falling back to simple messages.
 */
export function handleError(error: unknown, json = false): never {
  let exitCode = ExitCode.GENERAL_ERROR;
  let message: string;
  let agentError: AgentError | undefined;

  const cliError = toCLIError(error);
  if (cliError !== null) {
    exitCode = cliError.exitCode;
    message = cliError.message;
    agentError = cliError.agentError;
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
