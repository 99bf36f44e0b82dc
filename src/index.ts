export * from './types';
export * from './errors';
export type { AppConfig, CanvasConfig, ConfigOverrides } from './config';
export {
  AppConfigSchema,
  DEFAULT_CONFIG,
  endpointsFor,
  loadConfig,
  overridesFromEnv,
  parseCanvas,
  serverBaseUrl,
} from './config';

export type { TrimOutcome } from './services/ByteRingBuffer';
export { ByteRingBuffer, DEFAULT_MAX_BUFFER_BYTES } from './services/ByteRingBuffer';
export type { DemuxEvent, DemuxStats } from './services/FrameDemultiplexer';
export { FRAME_BOUNDARY, FrameDemultiplexer, MIN_FRAME_BYTES } from './services/FrameDemultiplexer';
export { describeOutputs, resolveSchema } from './services/ModelSchemaResolver';
export {
  clampCount,
  decodeDetections,
  DEFAULT_CONFIDENCE_THRESHOLD,
  resolveClassName,
} from './services/DetectionDecoder';
export { applyNms, boxArea, DEFAULT_IOU_THRESHOLD, iou } from './services/NmsSuppressor';
export { DEFAULT_COOLDOWN_MS, InferenceScheduler } from './services/InferenceScheduler';
export {
  BOX_COLORS,
  colorFor,
  containFit,
  estimateLabelSize,
  formatLabel,
  mapBox,
  mapDetections,
  placeLabel,
} from './services/DisplayMapper';
export { ImageProcessor } from './services/ImageProcessor';
export { OnnxInferenceInvoker } from './services/OnnxInferenceInvoker';
export type { ModelLoader } from './services/ModelService';
export { ModelService } from './services/ModelService';
export type { DebugLog } from './services/DebugLogger';
export { createSilentLogger, DebugLogger } from './services/DebugLogger';
export { DRIVE_DIRECTIONS, isDriveDirection, RoverApiClient } from './services/RoverApiClient';
export { StreamClient } from './services/StreamClient';
export { StatusPoller } from './services/StatusPoller';
export type { PerformanceSample } from './services/PerformanceCounter';
export { PerformanceCounter } from './services/PerformanceCounter';
export type { SessionListeners } from './services/DetectionSession';
export { DetectionSession } from './services/DetectionSession';
export { formatDetection, formatDetectionSet, formatOverlay } from './components/DetectionReport';
