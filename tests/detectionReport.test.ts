import { describe, expect, it } from 'vitest';
import { formatDetectionSet, formatOverlay } from '../src/components/DetectionReport';
import { mapDetections } from '../src/services/DisplayMapper';
import { DetectionSet } from '../src/types';

const SET: DetectionSet = {
  detections: [
    { classId: 0, className: 'person', confidence: 0.931, bbox: { left: 10.4, top: 20, right: 110.6, bottom: 220 } },
  ],
  imageSize: { width: 640, height: 480 },
  frameSequence: 12,
  inferenceMs: 48,
};

describe('formatDetectionSet', () => {
  it('writes a header and one line per detection', () => {
    expect(formatDetectionSet(SET)).toEqual([
      'frame #12 640x480 | 1 objects | 48ms',
      '  [0] person 93.1% (10,20,111,220)',
    ]);
  });

  it('says so when nothing was found', () => {
    expect(formatDetectionSet({ ...SET, detections: [] })).toEqual([
      'frame #12 640x480 | 0 objects | 48ms',
      '  no detections',
    ]);
  });
});

describe('formatOverlay', () => {
  it('describes where a box and its label are drawn', () => {
    const [instruction] = mapDetections(SET, { width: 640, height: 480 });

    expect(formatOverlay(instruction)).toBe('person (93%) @ (10,20)-(111,220) label@(10,1) #ff5252');
  });
});
