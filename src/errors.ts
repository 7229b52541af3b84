/**
 * Error taxonomy for linewright
 *
 * Format and configuration errors always surface to the immediate caller.
 * Sink write errors are caught per sink by the logger and reported through
 * the DispatchReport returned from every log call.
 */

/** Base class for every error raised by the library */
export class LinewrightError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }
}

/** Reasons a template or specifier can fail to render */
export type FormatErrorKind =
  | 'UnresolvedPlaceholder'
  | 'TypeMismatch'
  | 'MalformedSpecifier'
  | 'ArgumentIndexOutOfRange';

/**
 * Raised when a template cannot be rendered against its arguments
 *
 * @example
 * ```typescript
 * try {
 *   render('{missing}', []);
 * } catch (error) {
 *   if (error instanceof FormatError && error.kind === 'UnresolvedPlaceholder') {
 *     // ...
 *   }
 * }
 * ```
 */
export class FormatError extends LinewrightError {
  constructor(
    public readonly kind: FormatErrorKind,
    message: string,
    public readonly template?: string
  ) {
    super(template === undefined ? message : `${message} in template "${template}"`);
  }
}

/** Raised by strict registration when the name is already taken */
export class DuplicateNameError extends LinewrightError {
  constructor(public readonly loggerName: string) {
    super(`Logger '${loggerName}' is already registered`);
  }
}

/** Raised by registry lookups for unknown names */
export class NotFoundError extends LinewrightError {
  constructor(public readonly loggerName: string) {
    super(`Logger '${loggerName}' is not registered`);
  }
}

/** A single sink failed to accept a line */
export class SinkWriteError extends LinewrightError {
  constructor(
    public readonly sinkName: string,
    public readonly cause: unknown
  ) {
    super(`Sink '${sinkName}' write failed: ${describeCause(cause)}`);
  }
}

/** Invalid level names, sink lists or environment settings */
export class ConfigurationError extends LinewrightError {}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
