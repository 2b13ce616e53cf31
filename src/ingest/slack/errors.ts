/**
 * Fatal ingestion errors
 */

import type { z } from 'zod';

/**
 * A day file could not be read or is not a list of records
 */
export class ArchiveFileError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ArchiveFileError';
  }
}

/**
 * The user directory is unreadable or a user record is incomplete
 */
export class UserDirectoryError extends Error {
  constructor(
    message: string,
    public readonly issues: z.ZodIssue[] = [],
    public readonly record?: unknown
  ) {
    super(message);
    this.name = 'UserDirectoryError';
  }

  static fromZodError(error: z.ZodError, record: unknown): UserDirectoryError {
    const messages = error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    return new UserDirectoryError(
      `User definition is missing required attributes:\n${messages.join('\n')}\nDefinition: ${JSON.stringify(record)}`,
      error.issues,
      record
    );
  }
}

/**
 * The export root does not exist
 */
export class ExportNotFoundError extends Error {
  constructor(
    public readonly exportDir: string,
    options?: { cause?: unknown }
  ) {
    super(`Cannot find export directory ${exportDir}`, options);
    this.name = 'ExportNotFoundError';
  }
}
