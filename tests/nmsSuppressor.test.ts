import { describe, expect, it } from 'vitest';
import { applyNms, boxArea, iou } from '../src/services/NmsSuppressor';
import { BoundingBox, Detection } from '../src/types';

const box = (left: number, top: number, right: number, bottom: number): BoundingBox => ({ left, top, right, bottom });

const det = (className: string, confidence: number, bbox: BoundingBox): Detection => ({
  classId: className === 'person' ? 0 : 2,
  className,
  confidence,
  bbox,
});

describe('iou', () => {
  it('is 1 for identical boxes and 0 for disjoint ones', () => {
    const a = box(0, 0, 10, 10);
    expect(iou(a, a)).toBe(1);
    expect(iou(a, box(20, 20, 30, 30))).toBe(0);
  });

  it('is symmetric', () => {
    const a = box(0, 0, 10, 10);
    const b = box(5, 0, 15, 10);
    expect(iou(a, b)).toBeCloseTo(50 / 150);
    expect(iou(b, a)).toBe(iou(a, b));
  });

  it('is 0 when both boxes are empty', () => {
    expect(iou(box(5, 5, 5, 5), box(5, 5, 5, 5))).toBe(0);
    expect(boxArea(box(10, 10, 0, 0))).toBe(0);
  });
});

describe('applyNms', () => {
  it('suppresses overlapping lower-confidence boxes across classes', () => {
    const detections = [
      det('car', 0.6, box(0, 0, 100, 100)),
      det('person', 0.9, box(5, 5, 105, 105)),
      det('car', 0.8, box(300, 300, 400, 400)),
    ];

    const kept = applyNms(detections, 0.4);

    expect(kept.map(d => [d.className, d.confidence])).toEqual([
      ['person', 0.9],
      ['car', 0.8],
    ]);
  });

  it('keeps boxes whose overlap is at or below the threshold', () => {
    const a = det('person', 0.9, box(0, 0, 10, 10));
    const b = det('person', 0.8, box(5, 0, 15, 10));

    expect(applyNms([a, b], 0.5)).toEqual([a, b]);
    expect(applyNms([a, b], 0.3)).toEqual([a]);
  });

  it('is idempotent and leaves the input untouched', () => {
    const detections = [
      det('person', 0.5, box(0, 0, 50, 50)),
      det('person', 0.7, box(10, 10, 60, 60)),
      det('car', 0.6, box(200, 0, 260, 40)),
    ];
    const snapshot = [...detections];

    const once = applyNms(detections);
    expect(applyNms(once)).toEqual(once);
    expect(detections).toEqual(snapshot);
  });

  it('returns an empty list for no input', () => {
    expect(applyNms([])).toEqual([]);
  });
});
