/**
 * Error taxonomy for termdle
 *
 * Recoverable guess rejections are not errors (see GuessResult in the
 * session module). Everything here either aborts a command or signals a
 * programming mistake.
 */

export type ErrorCode =
  | 'usage'
  | 'session-not-terminal'
  | 'invalid-outcome'
  | 'word-source'
  | 'storage'
  | 'serialization';

export class TermdleError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad command line. The dispatcher prints usage alongside it. */
export class UsageError extends TermdleError {
  constructor(message: string) {
    super('usage', message);
  }
}

export class SessionNotTerminalError extends TermdleError {
  constructor(attempt: number) {
    super('session-not-terminal', `cannot finish a session still awaiting guess ${attempt}`);
  }
}

export class InvalidOutcomeError extends TermdleError {
  constructor(attempts: number) {
    super('invalid-outcome', `solved outcome must use 1-6 attempts, got ${attempts}`);
  }
}

export class WordSourceError extends TermdleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('word-source', message, options);
  }
}

export type StorageErrorKind = 'open' | 'read' | 'write';

export class StorageError extends TermdleError {
  readonly kind: StorageErrorKind;

  constructor(kind: StorageErrorKind, message: string, options?: { cause?: unknown; code?: ErrorCode }) {
    super(options?.code ?? 'storage', message, options);
    this.kind = kind;
  }
}

/** Stored bytes that are not a Player. */
export class SerializationError extends StorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('read', message, { ...options, code: 'serialization' });
  }
}

/**
 * Single-line diagnostic for the top-level dispatcher
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? `: ${err.cause.message.split('\n')[0]}` : '';
    return `${err.message}${cause}`;
  }
  return String(err);
}
