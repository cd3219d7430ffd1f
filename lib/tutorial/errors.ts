export type TutorialErrorCode =
  | 'GENERATION_FAILURE'
  | 'EXECUTION_ERROR'
  | 'SYNTHESIS_ERROR'
  | 'CAPTURE_ALREADY_OPEN'
  | 'RECORDING_DEVICE_BUSY'
  | 'RETRY_BUDGET_EXHAUSTED'
  | 'RUN_FAILED'
  | 'TIMELINE_INVARIANT';

export class TutorialError extends Error {
  readonly code: TutorialErrorCode;

  constructor(code: TutorialErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TutorialError';
    this.code = code;
  }
}

/** The generation capability failed or timed out. Retryable within the budget. */
export class GenerationFailure extends TutorialError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_FAILURE', message, options);
    this.name = 'GenerationFailure';
  }
}

/** The live session reported a fault while running a segment. */
export class ExecutionError extends TutorialError {
  readonly excerpt: string;

  constructor(message: string, excerpt = '') {
    super('EXECUTION_ERROR', message);
    this.name = 'ExecutionError';
    this.excerpt = excerpt;
  }
}

export class SynthesisError extends TutorialError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SYNTHESIS_ERROR', message, options);
    this.name = 'SynthesisError';
  }
}

export class CaptureAlreadyOpenError extends TutorialError {
  readonly openSegmentIndex: number;

  constructor(openSegmentIndex: number, requestedIndex: number) {
    super(
      'CAPTURE_ALREADY_OPEN',
      `Cannot open capture for segment ${requestedIndex}: segment ${openSegmentIndex} is still recording`
    );
    this.name = 'CaptureAlreadyOpenError';
    this.openSegmentIndex = openSegmentIndex;
  }
}

export class RecordingDeviceBusyError extends TutorialError {
  constructor(message = 'Recording device already has an active recording') {
    super('RECORDING_DEVICE_BUSY', message);
    this.name = 'RecordingDeviceBusyError';
  }
}

/** Run-level fatal failure; the offending segment index is attached. */
export class TutorialRunError extends TutorialError {
  readonly segmentIndex: number;

  constructor(
    code: Extract<TutorialErrorCode, 'RETRY_BUDGET_EXHAUSTED' | 'RUN_FAILED'>,
    segmentIndex: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(code, `Segment ${segmentIndex}: ${message}`, options);
    this.name = 'TutorialRunError';
    this.segmentIndex = segmentIndex;
  }
}

export class TimelineInvariantError extends TutorialError {
  constructor(message: string) {
    super('TIMELINE_INVARIANT', message);
    this.name = 'TimelineInvariantError';
  }
}

export function isTutorialError(error: unknown, code?: TutorialErrorCode): error is TutorialError {
  if (!(error instanceof TutorialError)) return false;
  return code === undefined || error.code === code;
}

/** Resource-invariant violations indicate a leak upstream and end the run. */
export function isResourceViolation(error: unknown): boolean {
  return isTutorialError(error, 'CAPTURE_ALREADY_OPEN') || isTutorialError(error, 'RECORDING_DEVICE_BUSY');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
