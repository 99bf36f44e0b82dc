import { readFile } from 'node:fs/promises';
import { describeError, ModelNotReadyError, SchemaResolutionError } from '../errors';
import {
  DetectionSet,
  InferenceInvoker,
  ModelConfig,
  OutputSchema,
  RawDetectionTensors,
} from '../types';
import { DebugLogger } from './DebugLogger';
import { decodeDetections, DEFAULT_CONFIDENCE_THRESHOLD } from './DetectionDecoder';
import { ImageProcessor } from './ImageProcessor';
import { describeOutputs, resolveSchema } from './ModelSchemaResolver';
import { applyNms, DEFAULT_IOU_THRESHOLD } from './NmsSuppressor';
import { OnnxInferenceInvoker } from './OnnxInferenceInvoker';

// SSD MobileNet v1 (COCO, uint8) takes 300×300 RGB
const INPUT_SIZE = 300;

const FALLBACK_LABELS = ['person'];

export type ModelLoader = (modelPath: string, inputSize: number) => Promise<InferenceInvoker>;

export interface ModelServiceOptions {
  logger: DebugLogger;
  config?: Partial<ModelConfig>;
  loadModel?: ModelLoader;
}

export class ModelService {
  private invoker: InferenceInvoker | null = null;
  private schema: OutputSchema | null = null;
  private labels: string[] = [];
  private config: ModelConfig;
  private readonly logger: DebugLogger;
  private readonly loadModel: ModelLoader;

  constructor(options: ModelServiceOptions) {
    this.logger = options.logger;
    this.loadModel = options.loadModel ?? OnnxInferenceInvoker.load;
    this.config = {
      inputSize: INPUT_SIZE,
      confidenceThreshold: DEFAULT_CONFIDENCE_THRESHOLD,
      iouThreshold: DEFAULT_IOU_THRESHOLD,
      ...options.config,
    };
  }

  /**
   * Loads the model and label table and resolves the output schema. A model
   * whose outputs cannot be mapped is released and the service stays not
   * ready; calling initialize again retries from scratch.
   */
  async initialize(modelPath: string, labelPath?: string): Promise<OutputSchema> {
    await this.unload();

    this.logger.info(`Loading detection model from: ${modelPath}`);
    const invoker = await this.loadModel(modelPath, this.config.inputSize);
    this.logger.info(
      `Model input: [1, ${invoker.inputHeight}, ${invoker.inputWidth}, 3] | outputs: ${describeOutputs(invoker.outputs)}`,
    );

    const result = resolveSchema(invoker.outputs);
    if (!result.ok) {
      const error = new SchemaResolutionError(result.error);
      this.logger.error(error.message);
      await invoker.release();
      throw error;
    }

    const { schema } = result;
    this.logger.info(
      `Output indices (by ${schema.resolvedBy}): Boxes: ${schema.boxesIndex}, Classes: ${schema.classesIndex}, ` +
        `Scores: ${schema.scoresIndex}, NumDetections: ${schema.countIndex}. Max Detections: ${schema.maxDetections}`,
    );

    this.labels = await this.loadLabels(labelPath);
    this.invoker = invoker;
    this.schema = schema;
    return schema;
  }

  async detect(jpegBytes: Uint8Array, frameSequence = 0): Promise<DetectionSet> {
    const { invoker, schema } = this;
    if (!invoker || !schema) {
      throw new ModelNotReadyError();
    }
    const t0 = Date.now();

    const preprocess = ImageProcessor.preprocess(jpegBytes, invoker.inputWidth, invoker.inputHeight);
    const tensors = await this.runModel(invoker, schema, preprocess.imageData);
    const imageSize = { width: preprocess.originalWidth, height: preprocess.originalHeight };

    const candidates = decodeDetections(tensors, schema, imageSize, {
      confidenceThreshold: this.config.confidenceThreshold,
      labels: this.labels,
    });
    const detections = applyNms(candidates, this.config.iouThreshold);

    return {
      detections,
      imageSize,
      frameSequence,
      inferenceMs: Date.now() - t0,
    };
  }

  setConfidenceThreshold(threshold: number): void {
    this.config.confidenceThreshold = threshold;
  }

  isReady(): boolean {
    return this.invoker !== null && this.schema !== null;
  }

  getSchema(): OutputSchema | null {
    return this.schema;
  }

  getLabels(): readonly string[] {
    return this.labels;
  }

  async unload(): Promise<void> {
    const invoker = this.invoker;
    this.invoker = null;
    this.schema = null;
    if (invoker) {
      await invoker.release();
    }
  }

  private async runModel(
    invoker: InferenceInvoker,
    schema: OutputSchema,
    input: Uint8Array,
  ): Promise<RawDetectionTensors> {
    const n = schema.maxDetections;
    const boxes = new Float32Array(n * 4);
    const classes = new Float32Array(n);
    const scores = new Float32Array(n);
    const count = new Float32Array(1);

    await invoker.invoke(
      input,
      new Map([
        [schema.boxesIndex, boxes],
        [schema.classesIndex, classes],
        [schema.scoresIndex, scores],
        [schema.countIndex, count],
      ]),
    );

    return { boxes, classes, scores, count: count[0] };
  }

  private async loadLabels(labelPath?: string): Promise<string[]> {
    if (!labelPath) {
      return [...FALLBACK_LABELS];
    }
    try {
      const labelContent = await readFile(labelPath, 'utf8');
      const labels = labelContent.split('\n').map(l => l.trim()).filter(Boolean);
      this.logger.info(`Labels: ${labels.length} classes from ${labelPath}`);
      return labels;
    } catch (error) {
      this.logger.warn(`Label file unavailable (${describeError(error)}), using fallback labels`);
      return [...FALLBACK_LABELS];
    }
  }
}
