/**
 * Study Core Errors
 *
 * Every failure the study core can signal. All of them are recoverable by
 * the calling layer (skip a line, report to the user, retry later); none is
 * fatal to the process.
 *
 * The API error handler maps `code` onto its response envelope, and the CLI
 * prints `message`.
 */

import type { SwingReport } from './swing/types';

export type StudyErrorCode =
  | 'INVALID_GRADE'
  | 'EMPTY_TARGET'
  | 'ORACLE_UNAVAILABLE'
  | 'ILLEGAL_MOVE'
  | 'EMPTY_LINE'
  | 'DUPLICATE_NAME'
  | 'OPENING_NOT_FOUND';

/**
 * Base class for all study core errors.
 */
export abstract class StudyError extends Error {
  abstract readonly code: StudyErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A grade outside the integer range 0..5. Raised before any state is read
 * or written.
 */
export class InvalidGradeError extends StudyError {
  readonly code = 'INVALID_GRADE' as const;

  constructor(public readonly grade: unknown) {
    super(`Grade must be an integer 0..5, got ${String(grade)}`);
  }
}

/**
 * A quiz was requested against an empty target.
 */
export class EmptyTargetError extends StudyError {
  readonly code = 'EMPTY_TARGET' as const;

  constructor(message = 'Quiz target has no move tokens') {
    super(message);
  }
}

/**
 * The evaluation oracle failed mid-scan. `partial` holds everything gathered
 * before the failure; it is never padded or truncated.
 */
export class OracleUnavailableError extends StudyError {
  readonly code = 'ORACLE_UNAVAILABLE' as const;

  constructor(
    message: string,
    public readonly partial: SwingReport | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * The move-application collaborator rejected a token. Indicates corrupt or
 * unvalidated line data upstream.
 */
export class IllegalTokenError extends StudyError {
  readonly code = 'ILLEGAL_MOVE' as const;

  constructor(
    public readonly token: string,
    /** 1-based ply at which the token was played */
    public readonly ply: number,
    options?: { cause?: unknown }
  ) {
    super(`Invalid SAN move '${token}' at ply ${ply}.`, options);
  }
}

/**
 * A line was submitted without any move tokens.
 */
export class EmptyLineError extends StudyError {
  readonly code = 'EMPTY_LINE' as const;

  constructor(message = 'No moves provided.') {
    super(message);
  }
}

/**
 * An opening with the same name is already stored.
 */
export class DuplicateNameError extends StudyError {
  readonly code = 'DUPLICATE_NAME' as const;

  constructor(public readonly openingName: string) {
    super(`An opening named '${openingName}' already exists.`);
  }
}

/**
 * No opening is stored under the given id or name.
 */
export class OpeningNotFoundError extends StudyError {
  readonly code = 'OPENING_NOT_FOUND' as const;

  constructor(public readonly reference: string) {
    super(`No opening '${reference}'.`);
  }
}
