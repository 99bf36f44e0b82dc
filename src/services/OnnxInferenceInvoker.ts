import { readFile } from 'node:fs/promises';
import { InferenceSession, Tensor } from 'onnxruntime-web';
import { configureRuntime } from '../utils/setup';
import { InferenceInvoker, OutputDescriptor } from '../types';

/**
 * onnxruntime-web session behind the InferenceInvoker contract. Expects a
 * uint8 NHWC input, as produced by quantized SSD exports.
 */
export class OnnxInferenceInvoker implements InferenceInvoker {
  private constructor(
    private readonly session: InferenceSession,
    readonly inputWidth: number,
    readonly inputHeight: number,
    readonly outputs: readonly OutputDescriptor[],
  ) {}

  /**
   * Loads the model and runs it once on a blank frame. The probe run is how
   * output names and shapes are discovered.
   */
  static async load(modelPath: string, inputSize: number): Promise<OnnxInferenceInvoker> {
    configureRuntime();
    const modelBytes = await readFile(modelPath);
    const session = await InferenceSession.create(new Uint8Array(modelBytes));

    const probe = await session.run({
      [session.inputNames[0]]: blankInput(inputSize, inputSize),
    });
    const outputs = session.outputNames.map(name => {
      const tensor = probe[name];
      return { name, shape: tensor ? [...tensor.dims] : [] };
    });

    return new OnnxInferenceInvoker(session, inputSize, inputSize, outputs);
  }

  get inputNames(): readonly string[] {
    return this.session.inputNames;
  }

  async invoke(input: Uint8Array, outputs: Map<number, Float32Array>): Promise<void> {
    const feeds = {
      [this.session.inputNames[0]]: new Tensor('uint8', input, [1, this.inputHeight, this.inputWidth, 3]),
    };
    const results = await this.session.run(feeds);

    for (const [slot, buffer] of outputs) {
      const name = this.session.outputNames[slot];
      const tensor = name === undefined ? undefined : results[name];
      if (!tensor) {
        throw new Error(`Model produced no output for slot ${slot} (${name ?? 'unknown'})`);
      }
      copyInto(buffer, tensor.data);
    }
  }

  async release(): Promise<void> {
    await this.session.release();
  }
}

function blankInput(width: number, height: number): Tensor {
  return new Tensor('uint8', new Uint8Array(width * height * 3), [1, height, width, 3]);
}

function copyInto(target: Float32Array, source: ArrayLike<unknown>): void {
  const n = Math.min(target.length, source.length);
  for (let i = 0; i < n; i++) {
    target[i] = Number(source[i]);
  }
}
