export interface BoundingBox {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface ImageSize {
  width: number;
  height: number;
}

export interface Detection {
  classId: number;
  className: string;
  confidence: number;
  bbox: BoundingBox;
}

/** Detections for one processed frame, in the pixel space of the image they came from. */
export interface DetectionSet {
  readonly detections: readonly Detection[];
  readonly imageSize: ImageSize;
  readonly frameSequence: number;
  readonly inferenceMs: number;
}

export interface ImagePayload {
  readonly data: Uint8Array;
  /** Position of the frame in stream arrival order, starting at 1. */
  readonly sequence: number;
}

export interface ModelConfig {
  inputSize: number;
  confidenceThreshold: number;
  iouThreshold: number;
}

export interface PreprocessResult {
  imageData: Uint8Array;
  originalWidth: number;
  originalHeight: number;
  inputWidth: number;
  inputHeight: number;
}

// ─── Model output schema ────────────────────────────────────────────────────

export interface OutputDescriptor {
  name: string;
  shape: readonly number[];
}

export type OutputRole = 'boxes' | 'classes' | 'scores' | 'count';

export interface OutputSchema {
  readonly boxesIndex: number;
  readonly classesIndex: number;
  readonly scoresIndex: number;
  readonly countIndex: number;
  readonly maxDetections: number;
  readonly resolvedBy: 'name' | 'shape';
}

export interface SchemaFailure {
  reason: string;
  assigned: Partial<Record<OutputRole, number>>;
}

export type SchemaResult =
  | { ok: true; schema: OutputSchema }
  | { ok: false; error: SchemaFailure };

/**
 * Output of one inference call. `boxes` is flat: four floats per candidate
 * (yMin, xMin, yMax, xMax), normalized to [0, 1].
 */
export interface RawDetectionTensors {
  boxes: Float32Array;
  classes: Float32Array;
  scores: Float32Array;
  count: number;
}

/**
 * Black-box model runner. Takes one packed HxWx3 uint8 input and fills the
 * pre-allocated buffer of every requested output slot in place.
 */
export interface InferenceInvoker {
  readonly inputWidth: number;
  readonly inputHeight: number;
  readonly outputs: readonly OutputDescriptor[];
  invoke(input: Uint8Array, outputs: Map<number, Float32Array>): Promise<void>;
  release(): Promise<void>;
}

// ─── Display ────────────────────────────────────────────────────────────────

export interface RenderInstruction {
  detection: Detection;
  box: BoundingBox;
  label: string;
  labelX: number;
  labelY: number;
  labelWidth: number;
  labelHeight: number;
  color: string;
}

export interface RenderFrame {
  payload: ImagePayload;
  detections: DetectionSet | null;
  overlay: RenderInstruction[];
}

// ─── Session ────────────────────────────────────────────────────────────────

export type SchedulerState = 'idle' | 'busy' | 'cooling';

export type SessionState = 'idle' | 'connecting' | 'streaming' | 'stopped' | 'error';

export interface SessionStatus {
  state: SessionState;
  message: string;
}

export type DriveDirection = 'forward' | 'backward' | 'left' | 'right' | 'stop';

export type ServerStatus = Record<string, unknown>;

export interface SessionStats {
  framesReceived: number;
  framesDropped: number;
  inferenceRuns: number;
  decodeFailures: number;
  inferenceFailures: number;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
