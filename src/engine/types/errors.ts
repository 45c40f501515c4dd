/**
 * Error types for the voice pipeline
 *
 * Ports fail with PortError. The pipeline turns a port failure into a
 * PipelineError stored on the state; only ValidationError is ever thrown
 * at callers of the pipeline.
 */

/**
 * Failure categories a port adapter can report
 */
export type PortErrorKind =
  | 'TIMEOUT'        // Call exceeded its time limit
  | 'RATE_LIMITED'   // Provider throttled the request
  | 'INVALID_INPUT'  // Provider rejected the payload
  | 'UNAVAILABLE'    // Provider unreachable or 5xx
  | 'UNKNOWN';

export type PipelineErrorKind =
  | 'MODERATION_ERROR'
  | 'TRANSLATION_ERROR'
  | 'SYNTHESIS_ERROR';

export interface PortFailure {
  kind: PortErrorKind;
  message: string;
}

/**
 * Error recorded on a failed PipelineState
 */
export interface PipelineError {
  kind: PipelineErrorKind;
  message: string;
  cause: PortFailure;
}

export class PortError extends Error {
  public readonly kind: PortErrorKind;

  constructor(kind: PortErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PortError';
    this.kind = kind;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PortError);
    }
  }

  toJSON(): PortFailure {
    return { kind: this.kind, message: this.message };
  }
}

export type ValidationField = 'inputText' | 'targetLanguage' | 'audio' | 'expectedText';

/**
 * Raised for bad caller input, before any port is invoked
 */
export class ValidationError extends Error {
  public readonly field: ValidationField;

  constructor(field: ValidationField, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValidationError);
    }
  }

  toJSON(): { field: ValidationField; message: string } {
    return { field: this.field, message: this.message };
  }
}

/**
 * Normalize anything a port rejected with into a PortError
 */
export function toPortError(error: unknown): PortError {
  if (error instanceof PortError) {
    return error;
  }
  if (error instanceof Error) {
    return new PortError('UNKNOWN', error.message, { cause: error });
  }
  return new PortError('UNKNOWN', String(error));
}

const STAGE_ERROR_PREFIX: Record<PipelineErrorKind, string> = {
  MODERATION_ERROR: 'Content moderation failed',
  TRANSLATION_ERROR: 'Translation failed',
  SYNTHESIS_ERROR: 'Speech synthesis failed',
};

export function createPipelineError(kind: PipelineErrorKind, portError: PortError): PipelineError {
  return {
    kind,
    message: `${STAGE_ERROR_PREFIX[kind]}: ${portError.message}`,
    cause: portError.toJSON(),
  };
}
