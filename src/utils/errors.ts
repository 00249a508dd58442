/**
 * Command Error Handling
 *
 * Provides centralized error handling for the CLI.
 * Every fatal error ends the process with exit status 1; the code
 * identifies the failure for messages and tests.
 */

import { printBlank, printRaw, colors } from './output';

/**
 * Exit status for every fatal error
 */
export const FATAL_EXIT_CODE = 1;

/**
 * CLI error codes for different failure scenarios
 */
export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',
  CONFIG_INVALID = 'CONFIG_INVALID',
  KEY_FILE_NOT_FOUND = 'KEY_FILE_NOT_FOUND',
  INVALID_KEY_FILE = 'INVALID_KEY_FILE',
  KEY_GEN_FAILED = 'KEY_GEN_FAILED',
  REMOTE_EXEC_FAILED = 'REMOTE_EXEC_FAILED',
}

/**
 * Base CLI error class with structured information
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode = ErrorCode.UNKNOWN,
    public readonly suggestion?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CLIError';
  }

  /**
   * Create error from unknown thrown value
   */
  static from(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): CLIError {
    if (error instanceof CLIError) {
      return error;
    }
    if (error instanceof Error) {
      return new CLIError(error.message, code, undefined, error);
    }
    return new CLIError(String(error), code);
  }
}

/**
 * Specific error types for common scenarios
 */
export class ConfigError extends CLIError {
  constructor(message: string, suggestion?: string) {
    super(message, ErrorCode.CONFIG_INVALID, suggestion);
    this.name = 'ConfigError';
  }
}

export class KeyFileNotFoundError extends CLIError {
  constructor(public readonly path: string) {
    super(
      `Public key file not found: ${path}`,
      ErrorCode.KEY_FILE_NOT_FOUND,
      'Pass the path of an existing public key, or use --generate to create one.'
    );
    this.name = 'KeyFileNotFoundError';
  }
}

export class InvalidKeyFileError extends CLIError {
  constructor(public readonly path: string, reason: string) {
    super(`Invalid public key file ${path}: ${reason}`, ErrorCode.INVALID_KEY_FILE);
    this.name = 'InvalidKeyFileError';
  }
}

export class KeyGenError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, ErrorCode.KEY_GEN_FAILED, 'Check that ssh-keygen is installed and the key directory is writable.', cause);
    this.name = 'KeyGenError';
  }
}

export class RemoteExecError extends CLIError {
  constructor(
    message: string,
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(message, ErrorCode.REMOTE_EXEC_FAILED, stderr.trim() || undefined);
    this.name = 'RemoteExecError';
  }
}

/**
 * Format error for display
 */
export function formatError(error: CLIError): string {
  const lines: string[] = [];

  lines.push(colors.error(`Error: ${error.message}`));

  if (error.suggestion) {
    lines.push(colors.dim(`  → ${error.suggestion}`));
  }

  if (process.env.DEBUG && error.cause) {
    lines.push(colors.dim(`  Caused by: ${error.cause.message}`));
    if (error.cause.stack) {
      lines.push(colors.dim(error.cause.stack));
    }
  }

  return lines.join('\n');
}

/**
 * Print a formatted error without exiting
 */
export function reportError(error: CLIError): void {
  printBlank();
  printRaw(formatError(error));
  printBlank();
}

/**
 * Handle error and exit process
 * This is the ONLY place that should call process.exit for errors
 */
export function handleError(error: unknown): never {
  reportError(CLIError.from(error));
  process.exit(FATAL_EXIT_CODE);
}

/**
 * Type for async command action handlers
 */
export type CommandAction<T extends unknown[] = unknown[]> = (...args: T) => Promise<void>;

/**
 * Wrap a command action with error handling
 *
 * Usage:
 * ```typescript
 * .action(withErrorHandler(async (target, options) => {
 *   // Command logic - just throw errors, don't call process.exit
 *   if (!valid) throw new ConfigError('Invalid input');
 * }))
 * ```
 */
export function withErrorHandler<T extends unknown[]>(
  action: CommandAction<T>
): CommandAction<T> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      handleError(error);
    }
  };
}
