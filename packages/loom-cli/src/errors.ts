import { ZodError } from 'zod';
import {
  AmbiguousPrefixError,
  ArchiveBlockedError,
  ArchiveConflictError,
  InvalidLinkError,
  InvalidTransitionError,
  TaskArchivedError,
  TaskNotFoundError,
  WorkspaceExistsError,
  WorkspaceNotFoundError,
  formatIssues,
} from 'loom-core';
import { createErrorEnvelope } from './output.js';

export enum ExitCode {
  Success = 0,
  GeneralError = 1,
  InvalidUsage = 2,
  InvalidInput = 3,
  NotFound = 4,
  StorageError = 5,
  ValidationError = 6,
}

export class CLIError extends Error {
  public readonly exitCode: ExitCode;
  public readonly code: string;
  public readonly details?: unknown;
  public readonly suggestions?: string[];

  constructor(
    message: string,
    exitCode: ExitCode = ExitCode.GeneralError,
    code?: string,
    details?: unknown,
    suggestions?: string[]
  ) {
    super(message);
    this.exitCode = exitCode;
    this.code = code ?? codeForExitCode(exitCode);
    this.details = details;
    this.suggestions = suggestions;
    this.name = 'CLIError';
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Maps core and I/O errors onto exit codes. Anything unrecognized becomes a
 * general error carrying the original message.
 */
export function toCLIError(error: unknown): CLIError {
  if (error instanceof CLIError) return error;

  if (error instanceof TaskNotFoundError) {
    return new CLIError(error.message, ExitCode.NotFound, undefined, undefined, ['loom list']);
  }
  if (error instanceof WorkspaceNotFoundError) {
    return new CLIError(error.message, ExitCode.NotFound, undefined, undefined, ['loom init']);
  }
  if (error instanceof AmbiguousPrefixError) {
    return new CLIError(
      error.message,
      ExitCode.InvalidInput,
      undefined,
      { matches: error.matches },
      error.matches.slice(0, 5).map((id) => `loom show ${id}`)
    );
  }
  if (error instanceof TaskArchivedError) {
    return new CLIError(error.message, ExitCode.InvalidInput, 'task_archived', undefined, [
      `loom show ${error.taskId} --archived`,
    ]);
  }
  if (
    error instanceof InvalidTransitionError ||
    error instanceof InvalidLinkError ||
    error instanceof WorkspaceExistsError
  ) {
    return new CLIError(error.message, ExitCode.InvalidInput);
  }
  if (error instanceof ZodError) {
    return new CLIError(`Invalid input: ${formatIssues(error)}`, ExitCode.InvalidInput);
  }
  if (error instanceof ArchiveBlockedError) {
    return new CLIError(error.message, ExitCode.ValidationError, undefined, { diagnostics: error.diagnostics }, [
      'loom validate',
    ]);
  }
  if (error instanceof ArchiveConflictError) {
    return new CLIError(error.message, ExitCode.StorageError, 'archive_conflict', { files: error.files }, [
      'loom archive',
    ]);
  }
  if (isErrnoException(error)) {
    return new CLIError(error.message, ExitCode.StorageError);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CLIError(message, ExitCode.GeneralError);
}

export function handleError(error: unknown, json: boolean = false): void {
  const cliError = toCLIError(error);
  if (json) {
    console.log(
      JSON.stringify(createErrorEnvelope(cliError.code, cliError.message, cliError.details, cliError.suggestions))
    );
  } else {
    console.error(`Error: ${cliError.message}`);
    for (const suggestion of cliError.suggestions ?? []) {
      console.error(`Hint: ${suggestion}`);
    }
  }
  process.exit(cliError.exitCode);
}

export function codeForExitCode(exitCode: ExitCode): string {
  switch (exitCode) {
    case ExitCode.InvalidUsage:
      return 'invalid_usage';
    case ExitCode.InvalidInput:
      return 'invalid_input';
    case ExitCode.NotFound:
      return 'not_found';
    case ExitCode.StorageError:
      return 'storage_error';
    case ExitCode.ValidationError:
      return 'validation_error';
    case ExitCode.GeneralError:
      return 'general_error';
    case ExitCode.Success:
      return 'success';
  }
}
