/**
 * Error classes for kibitz
 *
 * Every failure the user can cause or the environment can throw ends up as
 * a status line; these classes keep enough context to write that line.
 */

/**
 * Base error class for kibitz errors
 */
export class KibitzError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KibitzError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Thrown when the UCI engine cannot be started, dies, or times out
 */
export class EngineError extends KibitzError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
  }
}

/**
 * Thrown when user text or a protocol move is not a legal move
 */
export class IllegalMoveError extends KibitzError {
  constructor(
    public readonly input: string,
    public readonly parsed: boolean = false
  ) {
    super(parsed ? `Illegal move: ${input}` : `Cannot parse move: ${input}`);
    this.name = 'IllegalMoveError';
  }
}

/**
 * Thrown on socket failures and malformed server lines
 */
export class ProtocolError extends KibitzError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

/**
 * Thrown when the puzzle API is unreachable or returns an unexpected document
 */
export class PuzzleFetchError extends KibitzError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PuzzleFetchError';
  }
}

/**
 * Thrown when a tablebase probe fails (as opposed to a position outside the tables)
 */
export class TablebaseError extends KibitzError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TablebaseError';
  }
}

/**
 * Thrown when configuration cannot be read or does not validate
 */
export class ConfigError extends KibitzError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
  }
}

/**
 * Turn anything thrown into a one-line status message
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
