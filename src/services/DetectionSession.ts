import { AppConfig, endpointsFor } from '../config';
import { describeError, FrameDecodeError } from '../errors';
import {
  DetectionSet,
  DriveDirection,
  FetchLike,
  ImagePayload,
  RenderFrame,
  SchedulerState,
  ServerStatus,
  SessionState,
  SessionStats,
  SessionStatus,
} from '../types';
import { Mailbox } from '../utils/Mailbox';
import { DebugLogger } from './DebugLogger';
import { mapDetections } from './DisplayMapper';
import { DemuxEvent, FrameDemultiplexer } from './FrameDemultiplexer';
import { InferenceScheduler } from './InferenceScheduler';
import { ModelService } from './ModelService';
import { PerformanceCounter, PerformanceSample } from './PerformanceCounter';
import { RoverApiClient } from './RoverApiClient';
import { StatusPoller } from './StatusPoller';
import { StreamClient } from './StreamClient';

export interface SessionListeners {
  onStatus?: (status: SessionStatus) => void;
  /** Called on every display tick with the most recent frame. */
  onRender?: (frame: RenderFrame) => void;
  onDetections?: (set: DetectionSet) => void;
  onServerStatus?: (status: ServerStatus) => void;
  onPerformance?: (sample: PerformanceSample) => void;
}

export interface DetectionSessionOptions {
  config: AppConfig;
  modelService: ModelService;
  logger: DebugLogger;
  listeners?: SessionListeners;
  fetchImpl?: FetchLike;
}

const emptyStats = (): SessionStats => ({
  framesReceived: 0,
  framesDropped: 0,
  inferenceRuns: 0,
  decodeFailures: 0,
  inferenceFailures: 0,
});

/**
 * One connection to the rover: reads the MJPEG feed, shows every frame,
 * and runs detection on the frames the scheduler admits.
 *
 * The stream consumer is the only writer of frame and detection state.
 * Detection runs post their results to a mailbox that the consumer and the
 * display tick drain, so a finished run never writes into the session
 * directly. Each connection gets an id and its own demultiplexer; work
 * belonging to an older id is ignored when it completes. The scheduler
 * outlives connections, so a detection run left over from a previous
 * connection keeps new frames out until it settles.
 */
export class DetectionSession {
  private readonly config: AppConfig;
  private readonly modelService: ModelService;
  private readonly logger: DebugLogger;
  private readonly listeners: SessionListeners;
  private readonly fetchImpl?: FetchLike;
  private readonly api: RoverApiClient;
  private readonly scheduler: InferenceScheduler;
  private readonly results = new Mailbox<DetectionSet>();
  private readonly perf = new PerformanceCounter();

  private status: SessionStatus = { state: 'idle', message: 'Disconnected.' };
  private connectionId = 0;
  private stream: StreamClient | null = null;
  private demuxer: FrameDemultiplexer | null = null;
  private poller: StatusPoller | null = null;
  private displayTimer: NodeJS.Timeout | null = null;
  private consumer: Promise<void> | null = null;

  private detectionEnabled: boolean;
  private latestFrame: ImagePayload | null = null;
  private detections: DetectionSet | null = null;
  private serverStatus: ServerStatus | null = null;
  private stats = emptyStats();

  constructor(options: DetectionSessionOptions) {
    this.config = options.config;
    this.modelService = options.modelService;
    this.logger = options.logger;
    this.listeners = options.listeners ?? {};
    this.fetchImpl = options.fetchImpl;
    this.detectionEnabled = options.config.detection.enabled;

    const endpoints = endpointsFor(this.config);
    this.api = new RoverApiClient({
      statusUrl: endpoints.status,
      controlBaseUrl: endpoints.control,
      statusTimeoutMs: this.config.statusTimeoutMs,
      controlTimeoutMs: this.config.controlTimeoutMs,
      logger: this.logger,
      fetchImpl: this.fetchImpl,
    });
    this.scheduler = new InferenceScheduler({
      cooldownMs: this.config.detection.cooldownMs,
      onTaskError: error => this.logger.error(`Detection task failed: ${describeError(error)}`),
    });
  }

  /**
   * Checks the server, opens the video feed and starts consuming it.
   * Resolves once streaming has started; transport failures reject.
   */
  async connect(): Promise<void> {
    this.disconnect();
    const id = this.connectionId;
    const endpoints = endpointsFor(this.config);

    this.setStatus('connecting', `Connecting to ${endpoints.base}...`);
    try {
      const serverStatus = await this.api.fetchStatus(this.config.connectTimeoutMs);
      if (id !== this.connectionId) {
        return;
      }
      this.logger.info(`Rover server connected. Status: ${JSON.stringify(serverStatus)}`);
      this.publishServerStatus(serverStatus);
      this.setStatus('connecting', 'Connected. Starting video...');

      const stream = new StreamClient({
        url: endpoints.video,
        headerTimeoutMs: this.config.videoHeaderTimeoutMs,
        logger: this.logger,
        fetchImpl: this.fetchImpl,
      });
      this.stream = stream;
      const chunks = await stream.open();
      if (id !== this.connectionId) {
        stream.close();
        return;
      }

      const demuxer = new FrameDemultiplexer({
        maxBufferBytes: this.config.stream.maxBufferBytes,
        minFrameBytes: this.config.stream.minFrameBytes,
        logger: this.logger,
      });
      this.demuxer = demuxer;
      this.scheduler.setEnabled(this.detectionEnabled);
      this.results.reopen();
      this.perf.reset();
      this.stats = emptyStats();
      this.startDisplayTimer();
      this.startStatusPolling();

      this.setStatus('streaming', 'Video stream active.');
      this.consumer = this.consume(demuxer.demultiplex(chunks), id);
    } catch (error) {
      if (id === this.connectionId) {
        this.teardown();
        this.setStatus('error', `Connection failed: ${describeError(error)}`);
      }
      throw error;
    }
  }

  /** Stops the feed, timers and polling. Safe to call at any time. */
  disconnect(): void {
    const wasActive = this.status.state === 'connecting' || this.status.state === 'streaming';
    this.teardown();
    if (wasActive) {
      this.setStatus('idle', 'Disconnected.');
    }
  }

  /** Resolves when the current stream consumer has finished. */
  async closed(): Promise<void> {
    await this.consumer;
  }

  /**
   * Turns detection on or off. Turning it on needs a loaded model; turning
   * it off clears the current detections.
   */
  setDetectionEnabled(enabled: boolean): boolean {
    if (enabled && !this.modelService.isReady()) {
      this.logger.warn('Detection model not initialized!');
      return false;
    }
    this.detectionEnabled = enabled;
    this.scheduler.setEnabled(enabled);
    if (!enabled) {
      this.detections = null;
      this.results.drain();
    }
    this.logger.info(enabled ? 'Detection ON' : 'Detection OFF');
    return true;
  }

  isDetectionEnabled(): boolean {
    return this.detectionEnabled;
  }

  async sendCommand(direction: DriveDirection): Promise<boolean> {
    if (this.status.state !== 'streaming') {
      this.logger.warn('Not connected to server');
      return false;
    }
    return this.api.sendCommand(direction);
  }

  getStatus(): SessionStatus {
    return this.status;
  }

  getLatestFrame(): ImagePayload | null {
    return this.latestFrame;
  }

  getDetections(): DetectionSet | null {
    this.applyResults();
    return this.detections;
  }

  getServerStatus(): ServerStatus | null {
    return this.serverStatus;
  }

  getStats(): SessionStats {
    return { ...this.stats };
  }

  getSchedulerState(): SchedulerState {
    return this.scheduler.state;
  }

  /** Builds what the display should show right now. */
  renderFrame(): RenderFrame | null {
    this.applyResults();
    if (!this.latestFrame) {
      return null;
    }
    const canvas = this.config.canvas;
    return {
      payload: this.latestFrame,
      detections: this.detections,
      overlay: canvas && this.detections ? mapDetections(this.detections, canvas) : [],
    };
  }

  private async consume(events: AsyncIterable<DemuxEvent>, id: number): Promise<void> {
    try {
      for await (const event of events) {
        if (id !== this.connectionId) {
          return;
        }
        if (event.type === 'frame') {
          this.handleFrame(event.payload, id);
        } else if (event.type === 'end') {
          this.logger.info('Video stream ended by server.');
          this.teardown();
          this.setStatus('stopped', 'Video stream ended.');
        } else {
          this.logger.error(`Video stream error: ${describeError(event.error)}`);
          this.teardown();
          this.setStatus('error', `Video stream error: ${describeError(event.error)}`);
        }
      }
    } catch (error) {
      this.logger.error(`Error processing video stream: ${describeError(error)}`);
      if (id === this.connectionId) {
        this.teardown();
        this.setStatus('error', `Video stream error: ${describeError(error)}`);
      }
    }
  }

  private handleFrame(payload: ImagePayload, id: number): void {
    this.applyResults();
    this.latestFrame = payload;
    this.stats.framesReceived += 1;
    this.perf.recordFrame();

    if (!this.detectionEnabled || !this.modelService.isReady()) {
      return;
    }
    if (this.scheduler.submit(() => this.runDetection(payload, id))) {
      this.stats.inferenceRuns += 1;
      this.perf.recordInference();
    } else {
      this.stats.framesDropped += 1;
    }
  }

  private async runDetection(payload: ImagePayload, id: number): Promise<void> {
    try {
      const set = await this.modelService.detect(payload.data, payload.sequence);
      if (id !== this.connectionId) {
        return;
      }
      this.results.post(set);
      this.logger.detection(
        `Processed frame #${payload.sequence}. Found ${set.detections.length} objects (NMS) in ${set.inferenceMs}ms.`,
      );
    } catch (error) {
      if (id !== this.connectionId) {
        return;
      }
      if (error instanceof FrameDecodeError) {
        this.stats.decodeFailures += 1;
        this.logger.error(`Frame #${payload.sequence} skipped: ${error.message}`);
      } else {
        this.stats.inferenceFailures += 1;
        this.logger.error(`Detection error: ${describeError(error)}`);
      }
    }
  }

  /** Adopts the newest finished detection run, if any. */
  private applyResults(): void {
    const latest = this.results.takeLatest();
    if (!latest || !this.detectionEnabled) {
      return;
    }
    this.detections = latest;
    this.listeners.onDetections?.(latest);
  }

  private startDisplayTimer(): void {
    this.displayTimer = setInterval(() => {
      const frame = this.renderFrame();
      if (!frame) {
        return;
      }
      this.listeners.onRender?.(frame);
      const sample = this.perf.sample();
      if (sample) {
        this.listeners.onPerformance?.(sample);
      }
    }, this.config.displayIntervalMs);
  }

  private startStatusPolling(): void {
    this.poller = new StatusPoller({
      client: this.api,
      intervalMs: this.config.statusPollIntervalMs,
      logger: this.logger,
      onStatus: status => this.publishServerStatus(status),
    });
    this.poller.start();
  }

  private publishServerStatus(status: ServerStatus): void {
    this.serverStatus = status;
    this.listeners.onServerStatus?.(status);
  }

  /** Releases everything tied to the current connection. */
  private teardown(): void {
    this.connectionId += 1;
    this.stream?.close();
    this.stream = null;
    this.scheduler.reset();
    this.poller?.stop();
    this.poller = null;
    if (this.displayTimer) {
      clearInterval(this.displayTimer);
      this.displayTimer = null;
    }
    this.demuxer?.reset();
    this.demuxer = null;
    this.results.close();
    this.latestFrame = null;
    this.detections = null;
    this.serverStatus = null;
  }

  private setStatus(state: SessionState, message: string): void {
    this.status = { state, message };
    this.listeners.onStatus?.(this.status);
  }
}
