/**
 * Periodic Task
 *
 * Runs an async job immediately and then on a fixed interval on the
 * event loop. A tick that is still running when the next one is due is
 * skipped. Errors escaping the job are logged; the task keeps running.
 */

import { v4 as uuidv4 } from 'uuid';
import { errorMessage, log, LogLevel } from '../utils/logger';

export class PeriodicTask {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;

  constructor(
    readonly name: string,
    private intervalMs: number,
    private job: (tickId: string) => Promise<void>
  ) {}

  start(): void {
    if (this.timer) {
      return;
    }
    log(LogLevel.INFO, 'Periodic task started', { task: this.name, interval_ms: this.intervalMs });
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    void this.tick();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log(LogLevel.INFO, 'Periodic task stopped', { task: this.name });
    }
  }

  isStarted(): boolean {
    return this.timer !== null;
  }

  /**
   * Run the job once unless a previous run is still in flight
   *
   * @returns false when the tick was skipped
   */
  async tick(): Promise<boolean> {
    if (this.running) {
      log(LogLevel.DEBUG, 'Previous tick still running, skipping', { task: this.name });
      return false;
    }

    this.running = true;
    const tickId = uuidv4();
    const startTime = Date.now();
    try {
      await this.job(tickId);
      log(LogLevel.DEBUG, 'Tick finished', {
        task: this.name,
        tick_id: tickId,
        duration_ms: Date.now() - startTime,
      });
    } catch (error) {
      log(LogLevel.ERROR, 'Tick failed', {
        task: this.name,
        tick_id: tickId,
        duration_ms: Date.now() - startTime,
        error: errorMessage(error),
      });
    } finally {
      this.running = false;
    }
    return true;
  }
}
