import { BoundingBox, Detection, DetectionSet, ImageSize, RenderInstruction } from '../types';

export interface ContainFit {
  scale: number;
  offsetX: number;
  offsetY: number;
}

export interface LabelMetrics {
  width: number;
  height: number;
}

export interface MapOptions {
  /** Size of a rendered label; defaults to a fixed-advance estimate at 11px. */
  measureLabel?: (text: string) => LabelMetrics;
  /** Space kept between a box edge and its label. */
  labelGap?: number;
}

const LABEL_FONT_SIZE = 11;
const LABEL_GAP = 3;

export const BOX_COLORS = {
  person: '#ff5252',
  unknown: '#ffab40',
  default: '#69f0ae',
} as const;

export function estimateLabelSize(text: string): LabelMetrics {
  return {
    width: Math.ceil(text.length * LABEL_FONT_SIZE * 0.6),
    height: Math.ceil(LABEL_FONT_SIZE * 1.4),
  };
}

export function formatLabel(detection: Detection): string {
  return ` ${detection.className} (${(detection.confidence * 100).toFixed(0)}%) `;
}

export function colorFor(detection: Detection): string {
  if (detection.className === 'person') {
    return BOX_COLORS.person;
  }
  if (detection.className.startsWith('ClassID')) {
    return BOX_COLORS.unknown;
  }
  return BOX_COLORS.default;
}

/** Aspect-preserving, centered ("contain") fit of `image` into `canvas`. */
export function containFit(image: ImageSize, canvas: ImageSize): ContainFit | null {
  if (image.width <= 0 || image.height <= 0 || canvas.width <= 0 || canvas.height <= 0) {
    return null;
  }
  const scale = Math.min(canvas.width / image.width, canvas.height / image.height);
  return {
    scale,
    offsetX: (canvas.width - image.width * scale) / 2,
    offsetY: (canvas.height - image.height * scale) / 2,
  };
}

export function mapBox(box: BoundingBox, fit: ContainFit): BoundingBox {
  return {
    left: box.left * fit.scale + fit.offsetX,
    top: box.top * fit.scale + fit.offsetY,
    right: box.right * fit.scale + fit.offsetX,
    bottom: box.bottom * fit.scale + fit.offsetY,
  };
}

/**
 * Places a label above `box`, or below it when there is no room above.
 * If below overflows too it goes back above, then clamps to the top edge.
 * Horizontally it is kept fully inside the canvas.
 */
export function placeLabel(
  box: BoundingBox,
  label: LabelMetrics,
  canvas: ImageSize,
  gap = LABEL_GAP,
): { x: number; y: number } {
  let y = box.top - label.height - gap;
  if (y < 0) {
    y = box.bottom + gap;
  }
  if (y + label.height > canvas.height) {
    y = box.top - label.height - gap;
  }
  if (y < 0) {
    y = 0;
  }

  let x = box.left;
  if (x + label.width > canvas.width) {
    x = canvas.width - label.width;
  }
  if (x < 0) {
    x = 0;
  }
  return { x, y };
}

/** Render instructions for `set` drawn over its frame on a `canvas`-sized surface. */
export function mapDetections(
  set: DetectionSet,
  canvas: ImageSize,
  options: MapOptions = {},
): RenderInstruction[] {
  const fit = containFit(set.imageSize, canvas);
  if (!fit || !set.detections.length) {
    return [];
  }
  const measure = options.measureLabel ?? estimateLabelSize;
  const gap = options.labelGap ?? LABEL_GAP;

  return set.detections.map(detection => {
    const box = mapBox(detection.bbox, fit);
    const label = formatLabel(detection);
    const metrics = measure(label);
    const position = placeLabel(box, metrics, canvas, gap);
    return {
      detection,
      box,
      label,
      labelX: position.x,
      labelY: position.y,
      labelWidth: metrics.width,
      labelHeight: metrics.height,
      color: colorFor(detection),
    };
  });
}
