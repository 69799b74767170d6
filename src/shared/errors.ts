/**
 * Error taxonomy for playlist resolution, segment fetching and assembly.
 */

export type PipelineErrorCode =
  // Resolution errors (abort the run)
  | "MALFORMED_PLAYLIST"
  | "NO_ELIGIBLE_VARIANT"
  | "NO_SEGMENTS_FOUND"
  | "PLAYLIST_LOOP_DETECTED"
  | "PLAYLIST_FETCH_ERROR"
  // Per-segment error (recorded, never thrown out of the fetcher)
  | "SEGMENT_FETCH_ERROR"
  // Caller errors
  | "FETCH_ABORTED"
  | "INVALID_URL"
  // Assembly errors
  | "ASSEMBLY_FAILURE"
  // Interrupted by the user
  | "CANCELLED"
  | "UNKNOWN_ERROR";

export interface PipelineErrorContext {
  /** Playlist or segment location involved */
  location?: string | undefined;
  /** Playlist hop (1 = the location the caller passed in) */
  hop?: number | undefined;
  statusCode?: number | undefined;
  details?: string | undefined;
  cause?: unknown;
}

/**
 * Failure shape returned to callers that prefer result objects over throws.
 */
export interface ErrorResult {
  success: false;
  error: string;
  errorCode: PipelineErrorCode;
  details?: string | undefined;
  location?: string | undefined;
  hop?: number | undefined;
  statusCode?: number | undefined;
}

/**
 * Error class for pipeline failures with structured error info.
 */
export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public readonly location: string | undefined;
  public readonly hop: number | undefined;
  public readonly statusCode: number | undefined;
  public readonly details: string | undefined;

  constructor(message: string, code: PipelineErrorCode, context: PipelineErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = "PipelineError";
    this.code = code;
    this.location = context.location;
    this.hop = context.hop;
    this.statusCode = context.statusCode;
    this.details = context.details;
  }

  /**
   * Returns a copy with missing context filled in. Context already on the
   * error wins, so the innermost frame's location is kept.
   */
  withContext(context: PipelineErrorContext): PipelineError {
    return new PipelineError(this.message, this.code, {
      location: this.location ?? context.location,
      hop: this.hop ?? context.hop,
      statusCode: this.statusCode ?? context.statusCode,
      details: this.details ?? context.details,
      cause: this.cause ?? context.cause,
    });
  }

  toResult(): ErrorResult {
    const result: ErrorResult = {
      success: false,
      error: this.message,
      errorCode: this.code,
    };
    if (this.details !== undefined) result.details = this.details;
    if (this.location !== undefined) result.location = this.location;
    if (this.hop !== undefined) result.hop = this.hop;
    if (this.statusCode !== undefined) result.statusCode = this.statusCode;
    return result;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Formats any thrown value as a one-line message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
