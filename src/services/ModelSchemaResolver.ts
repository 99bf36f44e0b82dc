import { OutputDescriptor, OutputRole, OutputSchema, SchemaResult } from '../types';

// Suffixes seen in SSD-style detection exports (TFLite post-process op,
// TF object-detection API names, and bare `:N` output indices).
const ROLE_SUFFIXES: Record<OutputRole, readonly string[]> = {
  boxes: ['TFLite_Detection_PostProcess', 'detection_boxes', ':3'],
  classes: ['TFLite_Detection_PostProcess:1', 'detection_classes', ':2'],
  scores: ['TFLite_Detection_PostProcess:2', 'detection_scores', ':1'],
  count: ['TFLite_Detection_PostProcess:3', 'num_detections', ':0'],
};

const ROLES: readonly OutputRole[] = ['boxes', 'classes', 'scores', 'count'];

export function isBoxesShape(shape: readonly number[]): boolean {
  return shape.length === 3 && shape[0] === 1 && shape[1] >= 1 && shape[2] === 4;
}

export function isCountShape(shape: readonly number[]): boolean {
  return (
    (shape.length === 1 && shape[0] === 1) ||
    (shape.length === 2 && shape[0] === 1 && shape[1] === 1)
  );
}

export function isPerDetectionShape(shape: readonly number[]): boolean {
  return shape.length === 2 && shape[0] === 1 && shape[1] >= 1;
}

function shapeFits(role: OutputRole, shape: readonly number[]): boolean {
  switch (role) {
    case 'boxes':
      return isBoxesShape(shape);
    case 'count':
      return isCountShape(shape);
    default:
      return isPerDetectionShape(shape);
  }
}

/**
 * The role whose suffix matches the most characters of `name`. A full
 * `TFLite_Detection_PostProcess:2` beats the generic `:2`.
 */
function roleForName(name: string): OutputRole | null {
  let best: OutputRole | null = null;
  let bestLength = 0;
  for (const role of ROLES) {
    for (const suffix of ROLE_SUFFIXES[role]) {
      if (name.endsWith(suffix) && suffix.length > bestLength) {
        best = role;
        bestLength = suffix.length;
      }
    }
  }
  return best;
}

type Assignment = Partial<Record<OutputRole, number>>;

function complete(assigned: Assignment): assigned is Record<OutputRole, number> {
  return ROLES.every(role => assigned[role] !== undefined);
}

function resolveByName(outputs: readonly OutputDescriptor[]): Assignment {
  const assigned: Assignment = {};
  outputs.forEach((output, index) => {
    const role = roleForName(output.name);
    if (role && assigned[role] === undefined && shapeFits(role, output.shape)) {
      assigned[role] = index;
    }
  });
  return assigned;
}

function resolveByShape(outputs: readonly OutputDescriptor[]): Assignment {
  const assigned: Assignment = {};
  const perDetection: number[] = [];

  outputs.forEach((output, index) => {
    if (isBoxesShape(output.shape)) {
      assigned.boxes ??= index;
    } else if (isCountShape(output.shape)) {
      assigned.count ??= index;
    } else if (isPerDetectionShape(output.shape)) {
      perDetection.push(index);
    }
  });

  // Encounter order is the only signal left; most SSD exports list scores
  // before classes once the names are stripped.
  if (perDetection.length >= 2) {
    assigned.scores = perDetection[0];
    assigned.classes = perDetection[1];
  }
  return assigned;
}

function toSchema(
  outputs: readonly OutputDescriptor[],
  assigned: Record<OutputRole, number>,
  resolvedBy: OutputSchema['resolvedBy'],
): OutputSchema {
  return {
    boxesIndex: assigned.boxes,
    classesIndex: assigned.classes,
    scoresIndex: assigned.scores,
    countIndex: assigned.count,
    maxDetections: outputs[assigned.boxes].shape[1],
    resolvedBy,
  };
}

/**
 * Works out which output slot holds boxes, classes, scores and the detection
 * count. Tensor names are tried first; when they are uninformative the
 * tensors are classified by shape alone. Run once per loaded model.
 */
export function resolveSchema(outputs: readonly OutputDescriptor[]): SchemaResult {
  const byName = resolveByName(outputs);
  if (complete(byName)) {
    return { ok: true, schema: toSchema(outputs, byName, 'name') };
  }

  const byShape = resolveByShape(outputs);
  if (complete(byShape)) {
    return { ok: true, schema: toSchema(outputs, byShape, 'shape') };
  }

  return {
    ok: false,
    error: {
      reason: outputs.length < 4
        ? `model declares ${outputs.length} output tensor(s), at least 4 are needed`
        : 'no consistent boxes/classes/scores/count assignment by name or shape',
      assigned: byShape,
    },
  };
}

export function describeOutputs(outputs: readonly OutputDescriptor[]): string {
  return outputs.map((o, i) => `${i}:${o.name}[${o.shape.join(',')}]`).join(' ');
}
