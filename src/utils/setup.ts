import { env } from 'onnxruntime-web';

export interface RuntimeOptions {
  wasmThreads?: number;
  logLevel?: 'verbose' | 'info' | 'warning' | 'error' | 'fatal';
}

let configured = false;

/** One-time onnxruntime-web setup; later calls are ignored. */
export function configureRuntime(options: RuntimeOptions = {}): void {
  if (configured) {
    return;
  }
  configured = true;
  // Detection is throttled to a few runs per second, one at a time.
  env.wasm.numThreads = options.wasmThreads ?? 1;
  env.logLevel = options.logLevel ?? 'warning';
}
