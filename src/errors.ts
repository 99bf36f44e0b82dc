import { SchemaFailure } from './types';

export type ErrorCode =
  | 'SCHEMA_UNRESOLVED'
  | 'MODEL_NOT_READY'
  | 'FRAME_DECODE'
  | 'STREAM_TRANSPORT'
  | 'CONFIG';

export class RoverVisionError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The model's outputs could not be mapped onto boxes/classes/scores/count. */
export class SchemaResolutionError extends RoverVisionError {
  readonly failure: SchemaFailure;

  constructor(failure: SchemaFailure) {
    const { boxes = -1, classes = -1, scores = -1, count = -1 } = failure.assigned;
    super(
      'SCHEMA_UNRESOLVED',
      `Failed to map model output tensors: ${failure.reason}. Indices found: B:${boxes}, C:${classes}, S:${scores}, N:${count}`,
    );
    this.failure = failure;
  }
}

export class ModelNotReadyError extends RoverVisionError {
  constructor() {
    super('MODEL_NOT_READY', 'Model not initialized');
  }
}

export class FrameDecodeError extends RoverVisionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FRAME_DECODE', message, options);
  }
}

export class StreamTransportError extends RoverVisionError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('STREAM_TRANSPORT', message, options);
    this.status = options?.status;
  }
}

export class ConfigError extends RoverVisionError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG', `Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
