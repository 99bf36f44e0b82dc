import { BoundingBox, Detection } from '../types';

export const DEFAULT_IOU_THRESHOLD = 0.4;

export function boxArea(box: BoundingBox): number {
  return Math.max(0, box.right - box.left) * Math.max(0, box.bottom - box.top);
}

export function iou(a: BoundingBox, b: BoundingBox): number {
  const ix1 = Math.max(a.left, b.left);
  const iy1 = Math.max(a.top, b.top);
  const ix2 = Math.min(a.right, b.right);
  const iy2 = Math.min(a.bottom, b.bottom);
  const intersection = Math.max(0, ix2 - ix1) * Math.max(0, iy2 - iy1);
  const union = boxArea(a) + boxArea(b) - intersection;
  return union > 0 ? intersection / union : 0;
}

/**
 * Greedy non-maximum suppression across all classes: a box is dropped when
 * it overlaps any higher-confidence survivor by more than `iouThreshold`,
 * whatever either box's class. Returns survivors by descending confidence.
 */
export function applyNms(detections: readonly Detection[], iouThreshold = DEFAULT_IOU_THRESHOLD): Detection[] {
  if (!detections.length) {
    return [];
  }

  const sorted = [...detections].sort((a, b) => b.confidence - a.confidence);
  const suppressed = new Array<boolean>(sorted.length).fill(false);
  const kept: Detection[] = [];

  for (let i = 0; i < sorted.length; i++) {
    if (suppressed[i]) { continue; }
    kept.push(sorted[i]);
    for (let j = i + 1; j < sorted.length; j++) {
      if (!suppressed[j] && iou(sorted[i].bbox, sorted[j].bbox) > iouThreshold) {
        suppressed[j] = true;
      }
    }
  }
  return kept;
}
