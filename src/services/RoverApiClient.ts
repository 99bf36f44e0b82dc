import { z } from 'zod';
import { describeError, StreamTransportError } from '../errors';
import { DriveDirection, FetchLike, ServerStatus } from '../types';
import { DebugLogger } from './DebugLogger';

export const DRIVE_DIRECTIONS: readonly DriveDirection[] = ['forward', 'backward', 'left', 'right', 'stop'];

const ServerStatusSchema = z.record(z.unknown());

const ControlResponseSchema = z.object({
  message: z.string().optional(),
}).passthrough();

export interface RoverApiClientConfig {
  statusUrl: string;
  controlBaseUrl: string;
  statusTimeoutMs: number;
  controlTimeoutMs: number;
  logger: DebugLogger;
  fetchImpl?: FetchLike;
}

export function isDriveDirection(value: string): value is DriveDirection {
  return DRIVE_DIRECTIONS.some(direction => direction === value);
}

/** Status and drive endpoints of the rover's HTTP server. */
export class RoverApiClient {
  private readonly cfg: RoverApiClientConfig;
  private readonly fetchImpl: FetchLike;

  constructor(cfg: RoverApiClientConfig) {
    this.cfg = cfg;
    this.fetchImpl = cfg.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /** GET the status blob. Throws StreamTransportError on any failure. */
  async fetchStatus(timeoutMs = this.cfg.statusTimeoutMs): Promise<ServerStatus> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.cfg.statusUrl, { signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      throw new StreamTransportError(`Status request failed: ${describeError(error)}`, { cause: error });
    }
    if (!res.ok) {
      throw new StreamTransportError(`Server returned status: ${res.status}`, { status: res.status });
    }

    const parsed = ServerStatusSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new StreamTransportError('Status response is not a JSON object');
    }
    return parsed.data;
  }

  /**
   * Fire-and-forget drive command. Resolves to whether the server accepted
   * it; failures are logged, never thrown.
   */
  async sendCommand(direction: DriveDirection): Promise<boolean> {
    const url = `${this.cfg.controlBaseUrl}/${direction}`;
    try {
      const res = await this.fetchImpl(url, {
        method: 'POST',
        signal: AbortSignal.timeout(this.cfg.controlTimeoutMs),
      });
      if (!res.ok) {
        this.cfg.logger.warn(`Control command ${direction} failed: ${res.status}`);
        return false;
      }
      const body = ControlResponseSchema.safeParse(await res.json().catch(() => ({})));
      const message = body.success ? body.data.message : undefined;
      this.cfg.logger.info(`Control: ${direction}. Server: ${message ?? 'ok'}`);
      return true;
    } catch (error) {
      this.cfg.logger.warn(`Control command ${direction} exception: ${describeError(error)}`);
      return false;
    }
  }
}
