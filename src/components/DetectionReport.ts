import { Detection, DetectionSet, RenderInstruction } from '../types';

const px = (value: number) => value.toFixed(0);

export function formatDetection(det: Detection, index: number): string {
  const { left, top, right, bottom } = det.bbox;
  return `  [${index}] ${det.className} ${(det.confidence * 100).toFixed(1)}% (${px(left)},${px(top)},${px(right)},${px(bottom)})`;
}

/** Log lines for one detection set: a header, then one line per detection. */
export function formatDetectionSet(set: DetectionSet): string[] {
  const header = `frame #${set.frameSequence} ${set.imageSize.width}x${set.imageSize.height} | ${set.detections.length} objects | ${set.inferenceMs}ms`;
  if (!set.detections.length) {
    return [header, '  no detections'];
  }
  return [header, ...set.detections.map(formatDetection)];
}

export function formatOverlay(instruction: RenderInstruction): string {
  const { box } = instruction;
  return `${instruction.label.trim()} @ (${px(box.left)},${px(box.top)})-(${px(box.right)},${px(box.bottom)}) label@(${px(instruction.labelX)},${px(instruction.labelY)}) ${instruction.color}`;
}
