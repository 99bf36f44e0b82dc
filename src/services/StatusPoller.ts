import { describeError } from '../errors';
import { ServerStatus } from '../types';
import { DebugLogger } from './DebugLogger';
import { RoverApiClient } from './RoverApiClient';

export interface StatusPollerOptions {
  client: RoverApiClient;
  intervalMs: number;
  logger: DebugLogger;
  onStatus: (status: ServerStatus) => void;
}

/** Periodic status fetch while connected. Failed polls are logged and skipped. */
export class StatusPoller {
  private timer: NodeJS.Timeout | null = null;
  private pending: Promise<void> | null = null;
  private latest: ServerStatus | null = null;

  constructor(private readonly options: StatusPollerOptions) {}

  start(): void {
    this.stop();
    this.poll();
    this.timer = setInterval(() => this.poll(), this.options.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getLatest(): ServerStatus | null {
    return this.latest;
  }

  /** Resolves once the poll currently in flight, if any, has settled. */
  async settled(): Promise<void> {
    await this.pending;
  }

  private poll(): void {
    if (this.pending) {
      return;
    }
    this.pending = this.options.client
      .fetchStatus()
      .then(
        status => {
          if (this.timer) {
            this.latest = status;
            this.options.onStatus(status);
          }
        },
        (error: unknown) => {
          this.options.logger.warn(`Error fetching server status: ${describeError(error)}`);
        },
      )
      .finally(() => {
        this.pending = null;
      });
  }
}
