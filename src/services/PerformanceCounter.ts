export interface PerformanceSample {
  streamFps: number;
  detectionRunsPerSecond: number;
  summary: string;
}

const WINDOW_MS = 1000;

/** Frames and detection runs counted over windows of at least one second. */
export class PerformanceCounter {
  private framesReceived = 0;
  private inferenceRuns = 0;
  private windowStart: number | null = null;

  constructor(private readonly now: () => number = Date.now) {}

  recordFrame(): void {
    this.framesReceived += 1;
  }

  recordInference(): void {
    this.inferenceRuns += 1;
  }

  /** Closes the current window once it has lasted a second; null before that. */
  sample(): PerformanceSample | null {
    const now = this.now();
    if (this.windowStart === null) {
      this.windowStart = now;
      return null;
    }
    const elapsed = now - this.windowStart;
    if (elapsed < WINDOW_MS) {
      return null;
    }

    const streamFps = Math.round((this.framesReceived * WINDOW_MS) / elapsed);
    const detectionRunsPerSecond = Math.round((this.inferenceRuns * WINDOW_MS) / elapsed);
    this.framesReceived = 0;
    this.inferenceRuns = 0;
    this.windowStart = now;

    return {
      streamFps,
      detectionRunsPerSecond,
      summary: `Stream FPS: ${streamFps}, Detection Runs/s: ${detectionRunsPerSecond}`,
    };
  }

  reset(): void {
    this.framesReceived = 0;
    this.inferenceRuns = 0;
    this.windowStart = null;
  }
}
