import { ErrorCodes } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Base error for every failure lintflow reports to the user.
 * `remediation` lines are printed under the message instead of a stack trace.
 */
export class LintflowError extends Error {
  public readonly code: ErrorCodes;
  public readonly remediation: string[];

  constructor(message: string, code: ErrorCodes, remediation: string[] = []) {
    super(message);
    this.name = 'LintflowError';
    this.code = code;
    this.remediation = remediation;
  }
}

export class FetchError extends LintflowError {
  constructor(message: string, remediation: string[] = []) {
    super(message, ErrorCodes.FETCH_ERROR, remediation);
    this.name = 'FetchError';
  }
}

export class NotAProjectError extends LintflowError {
  constructor(
    message: string,
    public readonly missingMarkers: string[],
    remediation: string[] = []
  ) {
    super(message, ErrorCodes.NOT_A_PROJECT, remediation);
    this.name = 'NotAProjectError';
  }
}

export class UnknownEcosystemError extends LintflowError {
  constructor(public readonly requested: string, supported: readonly string[]) {
    super(`Unknown language: ${requested}`, ErrorCodes.UNKNOWN_ECOSYSTEM, [
      `Supported languages: ${supported.join(', ')}`
    ]);
    this.name = 'UnknownEcosystemError';
  }
}

export class ManifestPatchError extends LintflowError {
  constructor(message: string, public readonly filePath: string) {
    super(message, ErrorCodes.MANIFEST_PATCH_ERROR);
    this.name = 'ManifestPatchError';
  }
}

export class DownstreamCommandError extends LintflowError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number | null,
    remediation: string[] = []
  ) {
    super(message, ErrorCodes.DOWNSTREAM_COMMAND_ERROR, remediation);
    this.name = 'DownstreamCommandError';
  }
}

export class FileNotFoundError extends LintflowError {
  constructor(public readonly filePath: string) {
    super(`File not found: ${filePath}`, ErrorCodes.FILE_NOT_FOUND);
    this.name = 'FileNotFoundError';
  }
}

export class ValidationError extends LintflowError {
  constructor(message: string, remediation: string[] = []) {
    super(message, ErrorCodes.VALIDATION_ERROR, remediation);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends LintflowError {
  constructor(message: string, remediation: string[] = []) {
    super(message, ErrorCodes.CONFIG_ERROR, remediation);
    this.name = 'ConfigError';
  }
}

export class UserCancellationError extends LintflowError {
  constructor(message: string = 'Operation cancelled by user') {
    super(message, ErrorCodes.USER_CANCELLED);
    this.name = 'UserCancellationError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Print a user-facing error: one line plus remediation hints.
 */
export function printError(error: unknown): void {
  console.error(`❌ ${describeError(error)}`);
  if (error instanceof LintflowError) {
    for (const line of error.remediation) {
      console.error(`   ${line}`);
    }
  }
}

/**
 * Wrap a command action so failures print a readable message and set a
 * non-zero exit code instead of surfacing a stack trace.
 */
export function withErrorHandling<A extends unknown[]>(
  action: (...args: A) => Promise<void>
): (...args: A) => Promise<void> {
  return async (...args: A): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      if (error instanceof UserCancellationError) {
        console.log(`⏭️  ${error.message}`);
        process.exitCode = 130;
        return;
      }

      logger.debug('Command failed', { error });
      printError(error);
      process.exitCode = 1;
    }
  };
}
