import { describeError, StreamTransportError } from '../errors';
import { FetchLike } from '../types';
import { DebugLogger } from './DebugLogger';

export interface StreamClientConfig {
  url: string;
  /** Time allowed for the response headers to arrive. */
  headerTimeoutMs: number;
  logger: DebugLogger;
  fetchImpl?: FetchLike;
}

/**
 * HTTP reader for the rover's MJPEG feed. `open()` resolves once headers
 * arrive; the returned iterable yields raw body chunks until the server ends
 * the response or `close()` aborts it.
 */
export class StreamClient {
  private controller: AbortController | null = null;
  private readonly cfg: StreamClientConfig;
  private readonly fetchImpl: FetchLike;

  constructor(cfg: StreamClientConfig) {
    this.cfg = cfg;
    this.fetchImpl = cfg.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async open(): Promise<AsyncIterable<Uint8Array>> {
    if (this.controller) {
      throw new StreamTransportError('Video stream already open');
    }
    const controller = new AbortController();
    this.controller = controller;
    const headerTimer = setTimeout(() => controller.abort(), this.cfg.headerTimeoutMs);

    this.cfg.logger.info(`Starting video stream from: ${this.cfg.url}`);
    let res: Response;
    try {
      res = await this.fetchImpl(this.cfg.url, {
        headers: {
          'Cache-Control': 'no-cache',
          Connection: 'keep-alive',
          Accept: 'multipart/x-mixed-replace',
        },
        signal: controller.signal,
      });
    } catch (error) {
      this.controller = null;
      throw new StreamTransportError(`Video stream failed: ${describeError(error)}`, { cause: error });
    } finally {
      clearTimeout(headerTimer);
    }

    if (!res.ok || !res.body) {
      this.close();
      throw new StreamTransportError(
        `Video stream error: ${res.status} ${res.statusText}`.trim(),
        { status: res.status },
      );
    }

    this.cfg.logger.info('Video stream HTTP connection successful.');
    return this.chunks(res.body, controller);
  }

  close(): void {
    this.controller?.abort();
    this.controller = null;
  }

  private async *chunks(
    body: NonNullable<Response['body']>,
    controller: AbortController,
  ): AsyncGenerator<Uint8Array, void, undefined> {
    const reader = body.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          return;
        }
        if (value instanceof Uint8Array && value.length > 0) {
          yield value;
        }
      }
    } finally {
      if (this.controller === controller) {
        this.controller = null;
      }
      controller.abort();
    }
  }
}
