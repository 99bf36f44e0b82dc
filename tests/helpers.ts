import { ReadableStream, ReadableStreamDefaultController } from 'node:stream/web';
import * as jpeg from 'jpeg-js';
import { vi } from 'vitest';
import { FRAME_BOUNDARY } from '../src/services/FrameDemultiplexer';
import { FetchLike, InferenceInvoker, OutputDescriptor } from '../src/types';

export const SSD_OUTPUTS: OutputDescriptor[] = [
  { name: 'detection_boxes', shape: [1, 3, 4] },
  { name: 'detection_classes', shape: [1, 3] },
  { name: 'detection_scores', shape: [1, 3] },
  { name: 'num_detections', shape: [1] },
];

/** A person top-left, a car bottom-right, and one candidate under any sane threshold. */
const SSD_VALUES = new Map<number, number[]>([
  [0, [0, 0, 0.5, 0.5, 0.5, 0.5, 1, 1, 0, 0, 0.25, 0.25]],
  [1, [0, 2, 0]],
  [2, [0.9, 0.8, 0.2]],
  [3, [3]],
]);

export class FakeInvoker implements InferenceInvoker {
  readonly inputWidth = 8;
  readonly inputHeight = 8;
  readonly inputs: Uint8Array[] = [];
  readonly release = vi.fn(async () => undefined);

  constructor(readonly outputs: readonly OutputDescriptor[] = SSD_OUTPUTS) {}

  async invoke(input: Uint8Array, outputs: Map<number, Float32Array>): Promise<void> {
    this.inputs.push(input);
    for (const [slot, buffer] of outputs) {
      buffer.set(SSD_VALUES.get(slot) ?? []);
    }
  }
}

/** Holds every `invoke` until `open()` and records how many ran at once. */
export class GatedInvoker extends FakeInvoker {
  calls = 0;
  active = 0;
  maxActive = 0;
  private waiting: Array<() => void> = [];

  async invoke(input: Uint8Array, outputs: Map<number, Float32Array>): Promise<void> {
    this.calls += 1;
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    await new Promise<void>(resolve => this.waiting.push(resolve));
    this.active -= 1;
    await super.invoke(input, outputs);
  }

  open(): void {
    for (const resume of this.waiting.splice(0)) {
      resume();
    }
  }
}

export function gradientJpeg(width: number, height: number): Uint8Array {
  const data = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 4;
      data[i] = (x * 4) & 0xff;
      data[i + 1] = (y * 4) & 0xff;
      data[i + 2] = ((x + y) * 2) & 0xff;
      data[i + 3] = 255;
    }
  }
  return new Uint8Array(jpeg.encode({ width, height, data }, 90).data);
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/** One multipart part per frame, with the closing boundary that completes the last one. */
export function mjpeg(...frames: Uint8Array[]): Uint8Array {
  return concat(...frames.flatMap(frame => [FRAME_BOUNDARY, frame]), FRAME_BOUNDARY);
}

export const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

export interface FakeRover {
  fetchImpl: FetchLike;
  requests: string[];
  push(bytes: Uint8Array): void;
  end(): void;
  fail(error: Error): void;
}

/**
 * In-process stand-in for the rover's HTTP server. The video feed is a
 * ReadableStream the test writes into; aborting the request errors it.
 */
export function fakeRover(
  options: { statusCode?: number; status?: Record<string, unknown>; ignoreAbort?: boolean } = {},
): FakeRover {
  let controller: ReadableStreamDefaultController<Uint8Array> | null = null;
  const body = new ReadableStream<Uint8Array>({
    start(c) {
      controller = c;
    },
  });
  const requests: string[] = [];

  const fetchImpl: FetchLike = async (url, init) => {
    requests.push(`${init?.method ?? 'GET'} ${url}`);
    if (url.endsWith('/api/status')) {
      return json(options.status ?? { battery: 80 }, options.statusCode ?? 200);
    }
    if (url.endsWith('/video_feed')) {
      if (!options.ignoreAbort) {
        init?.signal?.addEventListener('abort', () => controller?.error(new Error('aborted')));
      }
      return new Response(body, {
        status: 200,
        headers: { 'Content-Type': 'multipart/x-mixed-replace; boundary=frame' },
      });
    }
    return json({ message: 'ok' });
  };

  return {
    fetchImpl,
    requests,
    push: bytes => controller?.enqueue(bytes),
    end: () => controller?.close(),
    fail: error => controller?.error(error),
  };
}
