import { ImagePayload } from '../types';
import { ByteRingBuffer, DEFAULT_MAX_BUFFER_BYTES, TrimOutcome } from './ByteRingBuffer';
import { DebugLogger } from './DebugLogger';

// Part header written by the rover's video server before every JPEG.
export const FRAME_BOUNDARY = new TextEncoder().encode(
  '--frame\r\nContent-Type: image/jpeg\r\n\r\n',
);

// Anything shorter between two boundaries is noise, not a JPEG.
export const MIN_FRAME_BYTES = 500;

export type DemuxEvent =
  | { type: 'frame'; payload: ImagePayload }
  | { type: 'end' }
  | { type: 'error'; error: unknown };

export interface FrameDemultiplexerOptions {
  boundary?: Uint8Array;
  minFrameBytes?: number;
  maxBufferBytes?: number;
  logger?: DebugLogger;
}

export interface DemuxStats {
  framesEmitted: number;
  framesDiscarded: number;
  overflowTrims: number;
  overflowClears: number;
}

/**
 * Splits a multipart/x-mixed-replace byte stream into JPEG payloads.
 *
 * A payload is emitted only once the boundary that follows it has arrived,
 * so a frame is never handed out half-received.
 */
export class FrameDemultiplexer {
  private readonly buffer: ByteRingBuffer;
  private readonly boundary: Uint8Array;
  private readonly minFrameBytes: number;
  private readonly logger?: DebugLogger;
  private sequence = 0;
  private stats: DemuxStats = {
    framesEmitted: 0,
    framesDiscarded: 0,
    overflowTrims: 0,
    overflowClears: 0,
  };

  constructor(options: FrameDemultiplexerOptions = {}) {
    this.boundary = options.boundary ?? FRAME_BOUNDARY;
    this.minFrameBytes = options.minFrameBytes ?? MIN_FRAME_BYTES;
    this.logger = options.logger;
    this.buffer = new ByteRingBuffer({
      marker: this.boundary,
      maxBytes: options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES,
    });
  }

  /** Feed one network chunk; returns every frame it completed, in order. */
  push(chunk: Uint8Array): ImagePayload[] {
    this.noteTrim(this.buffer.append(chunk));

    const frames: ImagePayload[] = [];
    const markerLength = this.boundary.length;

    for (;;) {
      const start = this.buffer.indexOf(this.boundary, 0);
      if (start === -1) {
        break;
      }
      const next = this.buffer.indexOf(this.boundary, start + markerLength);
      if (next === -1) {
        break;
      }

      const frameLength = next - (start + markerLength);
      if (frameLength > this.minFrameBytes) {
        this.sequence += 1;
        this.stats.framesEmitted += 1;
        frames.push({
          data: this.buffer.slice(start + markerLength, next),
          sequence: this.sequence,
        });
      } else {
        this.stats.framesDiscarded += 1;
      }
      this.buffer.removeRange(0, next);
    }

    return frames;
  }

  /**
   * Drains `source` lazily. The sequence always finishes with exactly one
   * `end` or `error` event; transport failures never escape as exceptions.
   */
  async *demultiplex(source: AsyncIterable<Uint8Array>): AsyncGenerator<DemuxEvent, void, undefined> {
    try {
      for await (const chunk of source) {
        for (const payload of this.push(chunk)) {
          yield { type: 'frame', payload };
        }
      }
    } catch (error) {
      yield { type: 'error', error };
      return;
    }
    yield { type: 'end' };
  }

  get bufferedBytes(): number {
    return this.buffer.length;
  }

  getStats(): DemuxStats {
    return { ...this.stats };
  }

  reset(): void {
    this.buffer.clear();
    this.sequence = 0;
    this.stats = { framesEmitted: 0, framesDiscarded: 0, overflowTrims: 0, overflowClears: 0 };
  }

  private noteTrim(outcome: TrimOutcome): void {
    if (outcome === 'trimmed') {
      this.stats.overflowTrims += 1;
      this.logger?.warn(
        `MJPEG buffer over limit, trimmed to ${this.buffer.length} bytes starting from last boundary.`,
      );
    } else if (outcome === 'cleared') {
      this.stats.overflowClears += 1;
      this.logger?.warn('MJPEG buffer cleared due to excessive size without recognizable boundary.');
    }
  }
}
