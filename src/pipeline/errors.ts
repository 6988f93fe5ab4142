/**
 * Error taxonomy for the highlight pipeline.
 *
 * Anything extending HighlightError ends a run in the `failed` state (or, for
 * ServiceError / ClipError, is caught by the stage that owns it and turned
 * into a non-fatal RunCondition).
 */

export type ErrorCode =
  | 'validation_error'
  | 'media_unavailable'
  | 'no_timestamps_found'
  | 'service_error'
  | 'clip_error'
  | 'concat_error'
  | 'command_failed';

/**
 * Base class for all pipeline errors
 */
export class HighlightError extends Error {
  code: ErrorCode;
  details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'HighlightError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `${this.name}: ${this.message} (code: ${this.code})`;
  }
}

/**
 * Bad CLI input, raised before the pipeline starts
 */
export class ValidationError extends HighlightError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'validation_error', details);
    this.name = 'ValidationError';
  }
}

/**
 * Video metadata or media could not be fetched (network, 404, private video)
 */
export class MediaUnavailableError extends HighlightError {
  url: string;

  constructor(message: string, url: string, details?: Record<string, unknown>) {
    super(message, 'media_unavailable', details);
    this.name = 'MediaUnavailableError';
    this.url = url;
  }
}

/**
 * A non-empty description yielded zero timestamp entries
 */
export class NoTimestampsFoundError extends HighlightError {
  lineCount: number;

  constructor(lineCount: number) {
    super(
      `No timestamps found in a description of ${lineCount} line(s). Expected lines like "1:23 Label" or "1:02:03 Label".`,
      'no_timestamps_found',
      { lineCount }
    );
    this.name = 'NoTimestampsFoundError';
    this.lineCount = lineCount;
  }
}

/**
 * Text-completion service failure
 */
export class ServiceError extends HighlightError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'service_error', details);
    this.name = 'ServiceError';
  }
}

/**
 * The trimmer could not materialize one range
 */
export class ClipError extends HighlightError {
  outputPath: string;

  constructor(message: string, outputPath: string, details?: Record<string, unknown>) {
    super(message, 'clip_error', details);
    this.name = 'ClipError';
    this.outputPath = outputPath;
  }
}

/**
 * The reel could not be assembled from the extracted clips
 */
export class ConcatError extends HighlightError {
  outputPath: string;

  constructor(message: string, outputPath: string, details?: Record<string, unknown>) {
    super(message, 'concat_error', details);
    this.name = 'ConcatError';
    this.outputPath = outputPath;
  }
}

/**
 * A child process exited non-zero or could not be spawned
 */
export class CommandError extends HighlightError {
  command: string;
  exitCode?: number;
  /** errno code from spawn, e.g. ENOENT when the binary is missing */
  errno?: string;
  stderr: string;

  constructor(
    message: string,
    command: string,
    opts: { exitCode?: number; errno?: string; stderr?: string } = {}
  ) {
    super(message, 'command_failed', { command, exitCode: opts.exitCode, errno: opts.errno });
    this.name = 'CommandError';
    this.command = command;
    this.exitCode = opts.exitCode;
    this.errno = opts.errno;
    this.stderr = opts.stderr ?? '';
  }
}

export function isHighlightError(e: unknown): e is HighlightError {
  return e instanceof HighlightError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
