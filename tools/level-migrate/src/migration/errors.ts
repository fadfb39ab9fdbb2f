import type { ZodIssue } from 'zod';

export type MigrationErrorKind = 'unknown-variant' | 'malformed' | 'motion-change' | 'io';

/**
 * Base class for errors that fail a single level file.
 * The runner records `kind` and `message` and moves on to the next file.
 */
export abstract class MigrationError extends Error {
  abstract readonly kind: MigrationErrorKind;
}

/**
 * Error thrown when a legacy laser carries a kind tag no decoder handles.
 */
export class UnknownLegacyKindError extends MigrationError {
  readonly kind = 'unknown-variant';

  constructor(
    public readonly tag: string,
    public readonly laserId: string | null,
  ) {
    super(
      laserId === null
        ? `Unknown laser kind: ${tag}`
        : `Unknown laser kind "${tag}" on laser "${laserId}"`,
    );
    this.name = 'UnknownLegacyKindError';
  }
}

/**
 * Error thrown when a document does not parse, or lacks a field a step
 * needs once that step's precondition applies.
 */
export class MalformedDocumentError extends MigrationError {
  readonly kind = 'malformed';

  constructor(message: string) {
    super(message);
    this.name = 'MalformedDocumentError';
  }

  /** Build an error from zod issues, prefixed with where they were found. */
  static fromIssues(where: string, issues: ZodIssue[]): MalformedDocumentError {
    const details = issues
      .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join(', ');
    return new MalformedDocumentError(`${where}: ${details}`);
  }
}

/**
 * Error thrown when a migration would change how a laser moves on screen.
 */
export class MotionChangeError extends MigrationError {
  readonly kind = 'motion-change';

  constructor(
    message: string,
    public readonly laserId: string,
  ) {
    super(message);
    this.name = 'MotionChangeError';
  }
}

/**
 * Error thrown when a level file cannot be read or written.
 */
export class FileAccessError extends MigrationError {
  readonly kind = 'io';

  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    super(`Cannot access ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'FileAccessError';
  }
}
