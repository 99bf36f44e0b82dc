import { Detection, ImageSize, OutputSchema, RawDetectionTensors } from '../types';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.45;

export interface DecodeOptions {
  confidenceThreshold?: number;
  labels: readonly string[];
}

export function resolveClassName(classId: number, labels: readonly string[]): string {
  return labels[classId] ?? `ClassID ${classId}`;
}

const clamp = (value: number, max: number) => Math.min(max, Math.max(0, value));

/** Number of valid candidates, bounded by the model's capacity. */
export function clampCount(rawCount: number, maxDetections: number): number {
  if (!Number.isFinite(rawCount)) {
    return 0;
  }
  return Math.min(maxDetections, Math.max(0, Math.trunc(rawCount)));
}

/**
 * Turns raw SSD outputs into pixel-space detections for an image of
 * `imageSize`. Order follows the model's own output order.
 */
export function decodeDetections(
  tensors: RawDetectionTensors,
  schema: Pick<OutputSchema, 'maxDetections'>,
  imageSize: ImageSize,
  options: DecodeOptions,
): Detection[] {
  const threshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
  const { boxes, classes, scores } = tensors;
  const { width, height } = imageSize;
  const count = clampCount(tensors.count, schema.maxDetections);

  const detections: Detection[] = [];

  for (let i = 0; i < count; i++) {
    if (i >= scores.length || i >= classes.length || i * 4 + 3 >= boxes.length) {
      break;
    }

    const confidence = scores[i];
    if (!(confidence > threshold)) {
      continue;
    }

    // SSD box layout: [yMin, xMin, yMax, xMax], normalized
    const top = clamp(boxes[i * 4 + 0] * height, height);
    const left = clamp(boxes[i * 4 + 1] * width, width);
    const bottom = clamp(boxes[i * 4 + 2] * height, height);
    const right = clamp(boxes[i * 4 + 3] * width, width);

    if (!(right > left && bottom > top)) {
      continue;
    }

    const classId = Math.round(classes[i]);
    detections.push({
      classId,
      className: resolveClassName(classId, options.labels),
      confidence,
      bbox: { left, top, right, bottom },
    });
  }

  return detections;
}
