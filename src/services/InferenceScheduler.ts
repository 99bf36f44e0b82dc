import { SchedulerState } from '../types';

export const DEFAULT_COOLDOWN_MS = 150;

export interface InferenceSchedulerOptions {
  cooldownMs?: number;
  /** Called when an admitted task rejects. The scheduler still moves on to cooling. */
  onTaskError?: (error: unknown) => void;
  onStateChange?: (state: SchedulerState) => void;
}

/**
 * Single-flight, rate-limited gate in front of the detector.
 *
 *   idle --submit--> busy --task settles--> cooling --cooldownMs--> idle
 *
 * Frames submitted while busy or cooling are dropped. `reset()` cancels a
 * pending cooldown but keeps the gate closed while a task is still running;
 * that task reopens it when it settles, skipping the cooldown.
 */
export class InferenceScheduler {
  private current: SchedulerState = 'idle';
  private enabled = true;
  private generation = 0;
  private cooldownTimer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private readonly cooldownMs: number;
  private readonly onTaskError?: (error: unknown) => void;
  private readonly onStateChange?: (state: SchedulerState) => void;
  private admitted = 0;
  private dropped = 0;

  constructor(options: InferenceSchedulerOptions = {}) {
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.onTaskError = options.onTaskError;
    this.onStateChange = options.onStateChange;
  }

  get state(): SchedulerState {
    return this.current;
  }

  get admittedCount(): number {
    return this.admitted;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  canAdmit(): boolean {
    return this.isEnabled() && this.current === 'idle';
  }

  /**
   * Starts `task` if the gate is open and returns true; otherwise drops the
   * request and returns false. Never waits for the task.
   */
  submit(task: () => Promise<void>): boolean {
    if (!this.canAdmit()) {
      this.dropped += 1;
      return false;
    }

    this.admitted += 1;
    this.transition('busy');
    const generation = this.generation;

    this.inFlight = this.runTask(task).then(
      () => this.finish(generation),
      (error: unknown) => {
        this.finish(generation);
        this.onTaskError?.(error);
      },
    );
    return true;
  }

  /** Resolves once the task admitted last has settled. */
  async drain(): Promise<void> {
    await this.inFlight;
  }

  /** Starts over for a new stream without ever overlapping the running task. */
  reset(): void {
    this.generation += 1;
    this.clearCooldown();
    if (this.current !== 'busy') {
      this.transition('idle');
    }
  }

  private runTask(task: () => Promise<void>): Promise<void> {
    try {
      return task();
    } catch (error) {
      return Promise.reject(error);
    }
  }

  private finish(generation: number): void {
    if (generation !== this.generation) {
      if (this.current === 'busy') {
        this.transition('idle');
      }
      return;
    }
    this.transition('cooling');
    this.cooldownTimer = setTimeout(() => {
      this.cooldownTimer = null;
      if (generation === this.generation) {
        this.transition('idle');
      }
    }, this.cooldownMs);
  }

  private clearCooldown(): void {
    if (this.cooldownTimer) {
      clearTimeout(this.cooldownTimer);
      this.cooldownTimer = null;
    }
  }

  private transition(next: SchedulerState): void {
    if (this.current === next) {
      return;
    }
    this.current = next;
    this.onStateChange?.(next);
  }
}
