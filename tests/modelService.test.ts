import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { ModelNotReadyError, SchemaResolutionError } from '../src/errors';
import { createSilentLogger } from '../src/services/DebugLogger';
import { ModelService } from '../src/services/ModelService';
import { OutputDescriptor } from '../src/types';
import { FakeInvoker, gradientJpeg, SSD_OUTPUTS } from './helpers';

const LABELS_PATH = path.resolve(__dirname, '..', 'assets', 'coco_labels.txt');

function serviceWith(outputs: readonly OutputDescriptor[]) {
  const invoker = new FakeInvoker(outputs);
  const loadModel = vi.fn(async () => invoker);
  const logger = createSilentLogger();
  const service = new ModelService({ logger, loadModel });
  return { service, invoker, loadModel, logger };
}

describe('ModelService', () => {
  it('resolves the output schema on initialize', async () => {
    const { service, loadModel } = serviceWith(SSD_OUTPUTS);

    const schema = await service.initialize('model.onnx', LABELS_PATH);

    expect(loadModel).toHaveBeenCalledWith('model.onnx', 300);
    expect(schema).toMatchObject({ boxesIndex: 0, classesIndex: 1, scoresIndex: 2, countIndex: 3, maxDetections: 3 });
    expect(service.isReady()).toBe(true);
    expect(service.getLabels()).toHaveLength(80);
  });

  it('runs decode and suppression on a frame', async () => {
    const { service, invoker } = serviceWith(SSD_OUTPUTS);
    await service.initialize('model.onnx', LABELS_PATH);

    const set = await service.detect(gradientJpeg(64, 48), 7);

    expect(invoker.inputs[0].length).toBe(8 * 8 * 3);
    expect(set.frameSequence).toBe(7);
    expect(set.imageSize).toEqual({ width: 64, height: 48 });
    expect(set.detections.map(d => d.className)).toEqual(['person', 'car']);
    expect(set.detections[0].bbox).toEqual({ left: 0, top: 0, right: 32, bottom: 24 });
    expect(set.detections[1].bbox).toEqual({ left: 32, top: 24, right: 64, bottom: 48 });
    expect(set.detections[0].confidence).toBeCloseTo(0.9);
  });

  it('honours a changed confidence threshold', async () => {
    const { service } = serviceWith(SSD_OUTPUTS);
    await service.initialize('model.onnx', LABELS_PATH);
    service.setConfidenceThreshold(0.85);

    const set = await service.detect(gradientJpeg(64, 48));

    expect(set.detections.map(d => d.className)).toEqual(['person']);
  });

  it('falls back to built-in labels when the label file is missing', async () => {
    const { service, logger } = serviceWith(SSD_OUTPUTS);
    await service.initialize('model.onnx', path.join(__dirname, 'no-such-labels.txt'));

    expect(service.getLabels()).toEqual(['person']);
    expect(logger.getLogs().some(l => l.type === 'warn' && l.message.startsWith('Label file unavailable'))).toBe(true);

    const set = await service.detect(gradientJpeg(64, 48));
    expect(set.detections.map(d => d.className)).toEqual(['person', 'ClassID 2']);
  });

  it('releases the model and stays not ready when outputs cannot be mapped', async () => {
    const { service, invoker, logger } = serviceWith(SSD_OUTPUTS.slice(0, 2));

    await expect(service.initialize('model.onnx')).rejects.toBeInstanceOf(SchemaResolutionError);

    expect(invoker.release).toHaveBeenCalledTimes(1);
    expect(service.isReady()).toBe(false);
    expect(logger.getLogs().at(-1)).toMatchObject({
      type: 'error',
      message:
        'Failed to map model output tensors: model declares 2 output tensor(s), at least 4 are needed. ' +
        'Indices found: B:0, C:-1, S:-1, N:-1',
    });
  });

  it('refuses to detect before a model is loaded', async () => {
    const { service } = serviceWith(SSD_OUTPUTS);

    await expect(service.detect(gradientJpeg(16, 16))).rejects.toBeInstanceOf(ModelNotReadyError);
  });

  it('releases the model on unload', async () => {
    const { service, invoker } = serviceWith(SSD_OUTPUTS);
    await service.initialize('model.onnx');

    await service.unload();

    expect(invoker.release).toHaveBeenCalledTimes(1);
    expect(service.isReady()).toBe(false);
    expect(service.getSchema()).toBeNull();
  });
});
