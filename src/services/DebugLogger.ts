import { FetchLike } from '../types';

export interface DebugLog {
  time: string;
  message: string;
  type: 'info' | 'warn' | 'error' | 'detection';
}

export type LogListener = (log: DebugLog) => void;

export interface DebugLoggerOptions {
  maxLogs?: number;
  /** Endpoint that receives every entry as a JSON POST. */
  remoteUrl?: string;
  /** Mirror entries to the process console. Defaults to true. */
  console?: boolean;
  fetchImpl?: FetchLike;
  now?: () => Date;
}

const MAX_DEBUG_LOGS = 200;

export function formatLogTime(now: Date): string {
  return [
    now.getHours().toString().padStart(2, '0'),
    now.getMinutes().toString().padStart(2, '0'),
    now.getSeconds().toString().padStart(2, '0'),
  ].join(':') + '.' + now.getMilliseconds().toString().padStart(3, '0');
}

/**
 * In-memory log ring shared by the services. Keeps the most recent
 * `maxLogs` entries, echoes them to the console, and optionally forwards
 * each one to a remote log collector.
 */
export class DebugLogger {
  private logs: DebugLog[] = [];
  private readonly listeners = new Set<LogListener>();
  private readonly maxLogs: number;
  private readonly remoteUrl?: string;
  private readonly mirrorToConsole: boolean;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;
  private remoteFailures = 0;

  constructor(options: DebugLoggerOptions = {}) {
    this.maxLogs = options.maxLogs ?? MAX_DEBUG_LOGS;
    this.remoteUrl = options.remoteUrl;
    this.mirrorToConsole = options.console ?? true;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
  }

  log(message: string, type: DebugLog['type'] = 'info'): void {
    const entry: DebugLog = { time: formatLogTime(this.now()), message, type };

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    if (this.mirrorToConsole) {
      const line = `[${entry.time}] ${message}`;
      if (type === 'error') {
        console.error(line);
      } else if (type === 'warn') {
        console.warn(line);
      } else {
        console.log(line);
      }
    }

    for (const listener of this.listeners) {
      listener(entry);
    }

    if (this.remoteUrl) {
      this.sendRemoteLog(this.remoteUrl, entry);
    }
  }

  info(message: string): void {
    this.log(message, 'info');
  }

  warn(message: string): void {
    this.log(message, 'warn');
  }

  error(message: string): void {
    this.log(message, 'error');
  }

  detection(message: string): void {
    this.log(message, 'detection');
  }

  getLogs(): readonly DebugLog[] {
    return this.logs;
  }

  getRemoteFailures(): number {
    return this.remoteFailures;
  }

  subscribe(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // Fire-and-forget. Failures are counted rather than logged, which would recurse.
  private sendRemoteLog(url: string, entry: DebugLog): void {
    this.fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(entry),
    }).catch(() => {
      this.remoteFailures += 1;
    });
  }
}

export function createSilentLogger(): DebugLogger {
  return new DebugLogger({ console: false });
}
