import type { FailureCode, FailureReason, PipelineStatus } from './types';

export type ErrorCode = FailureCode | 'DETECTION_TIMEOUT';

export abstract class AudiobookError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type DetectionFailure = 'timeout' | 'unreachable' | 'bad-status';

/** The LLM endpoint was slow or unreachable. Always absorbed by the detector. */
export class DetectionTimeout extends AudiobookError {
  readonly code = 'DETECTION_TIMEOUT' as const;

  constructor(readonly reason: DetectionFailure, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type SynthesisFailure =
  | 'EMPTY_TEXT'
  | 'MISSING_ASSETS'
  | 'ENGINE_UNAVAILABLE'
  | 'ENGINE_FAILED'
  | 'ENGINE_TIMEOUT'
  | 'INVALID_OUTPUT'
  | 'AUTH_FAILED'
  | 'RATE_LIMITED'
  | 'SERVER_ERROR';

const NON_RETRYABLE: ReadonlySet<SynthesisFailure> = new Set([
  'EMPTY_TEXT',
  'MISSING_ASSETS',
  'ENGINE_UNAVAILABLE',
  'AUTH_FAILED'
]);

export class SynthesisError extends AudiobookError {
  readonly code = 'SYNTHESIS_ERROR' as const;
  readonly retryable: boolean;
  /** Seconds the engine asked us to wait before retrying, if it said so. */
  readonly retryAfterSeconds?: number;
  segmentIndex?: number;

  constructor(
    readonly reason: SynthesisFailure,
    message: string,
    options?: { cause?: unknown; retryAfterSeconds?: number; segmentIndex?: number }
  ) {
    super(message, options);
    this.retryable = !NON_RETRYABLE.has(reason);
    this.retryAfterSeconds = options?.retryAfterSeconds;
    this.segmentIndex = options?.segmentIndex;
  }
}

export class FormatError extends AudiobookError {
  readonly code = 'FORMAT_ERROR' as const;

  constructor(message: string, readonly segmentIndex?: number) {
    super(segmentIndex === undefined ? message : `Segment ${segmentIndex}: ${message}`);
  }
}

export class ConfigurationError extends AudiobookError {
  readonly code = 'CONFIGURATION_ERROR' as const;
}

export class CancelledError extends AudiobookError {
  readonly code = 'CANCELLED' as const;
}

export class ChapterGenerationError extends AudiobookError {
  readonly code: FailureCode;
  readonly segmentIndex?: number;

  constructor(
    readonly chapterKey: string,
    readonly failedIn: PipelineStatus,
    readonly reason: FailureReason,
    options?: { cause?: unknown }
  ) {
    super(`Chapter ${chapterKey} failed while ${failedIn}: ${reason.message}`, options);
    this.code = reason.code;
    this.segmentIndex = reason.segmentIndex;
  }
}

export function toFailureReason(error: unknown): FailureReason {
  if (error instanceof SynthesisError) {
    return { code: error.code, message: error.message, segmentIndex: error.segmentIndex };
  }
  if (error instanceof FormatError) {
    return { code: error.code, message: error.message, segmentIndex: error.segmentIndex };
  }
  if (error instanceof ConfigurationError || error instanceof CancelledError) {
    return { code: error.code, message: error.message };
  }
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error)
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
