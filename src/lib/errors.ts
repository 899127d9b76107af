/**
 * Error types shared by every command.
 *
 * Fatal errors (`ApplicationError`, `ConfigError`) stop a run before the next
 * file is touched. Per-file errors (`MetadataReadError`, `MetadataWriteError`)
 * are caught by the batch loops, logged and counted in the run summary.
 */

import type { ZodIssue } from 'zod';

export type ErrorCode =
  | 'APPLICATION_ERROR'
  | 'CONFIG_ERROR'
  | 'METADATA_READ_ERROR'
  | 'METADATA_WRITE_ERROR';

export abstract class PhotoToolsError extends Error {
  abstract readonly code: ErrorCode;
  /** Whether the batch must stop when this error is raised */
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid invocation or project layout: missing directories, no input files.
 */
export class ApplicationError extends PhotoToolsError {
  readonly code = 'APPLICATION_ERROR';
  readonly fatal = true;
}

/**
 * Malformed rule file or option value. Raised once, before any file is processed.
 */
export class ConfigError extends PhotoToolsError {
  readonly code = 'CONFIG_ERROR';
  readonly fatal = true;

  static fromIssues(source: string, issues: readonly ZodIssue[]): ConfigError {
    return new ConfigError(`Invalid EXIF override rules in ${source}:\n${formatIssues(issues)}`);
  }
}

export class MetadataReadError extends PhotoToolsError {
  readonly code = 'METADATA_READ_ERROR';
  readonly fatal = false;

  constructor(
    readonly filePath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${message}: "${filePath}"`, options);
  }
}

export class MetadataWriteError extends PhotoToolsError {
  readonly code = 'METADATA_WRITE_ERROR';
  readonly fatal = false;

  constructor(
    readonly filePath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${message}: "${filePath}"`, options);
  }
}

export function isFatal(error: unknown): boolean {
  return !(error instanceof PhotoToolsError) || error.fatal;
}

/**
 * Render zod issues as `  path: message` lines.
 */
export function formatIssues(issues: readonly ZodIssue[]): string {
  return issues
    .map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Message of an error plus the chain of its causes, for log and CLI output.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const parts = [error.message];
  let cause: unknown = error.cause;
  while (cause !== undefined) {
    if (cause instanceof Error) {
      parts.push(cause.message);
      cause = cause.cause;
    } else {
      parts.push(String(cause));
      cause = undefined;
    }
  }
  return parts.join(' <- ');
}
