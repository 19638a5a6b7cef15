/**
 * Interval timer for a periodic pass.
 *
 * A run that is still in flight when the timer fires again is not started
 * twice. Each run executes inside a job context so its log lines share a
 * job_id, and a failing run is logged without stopping the timer.
 */

import { withJobContext } from '@barwatch/logger';
import type { Logger } from '@barwatch/logger';
import { errorMessage, isBarwatchError } from '@barwatch/contracts';

export class PeriodicJob {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;
  private skipped = 0;

  constructor(
    readonly name: string,
    private intervalMs: number,
    private run: () => Promise<void>,
    private logger: Logger
  ) {}

  get isScheduled(): boolean {
    return this.timer !== null;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  /** Ticks dropped because the previous run had not finished */
  get skippedTicks(): number {
    return this.skipped;
  }

  start(): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => {
      if (this.running !== null) {
        this.skipped++;
        this.logger.debug('Previous run still in progress, skipping tick', { job: this.name });
        return;
      }
      void this.runNow();
    }, this.intervalMs);
  }

  /**
   * Runs once now unless a run is already in flight.
   *
   * @returns false if a run was already in flight
   */
  async runNow(): Promise<boolean> {
    if (this.running !== null) {
      return false;
    }
    const run = this.execute();
    this.running = run;
    try {
      await run;
    } finally {
      this.running = null;
    }
    return true;
  }

  /** Clears the timer and waits for a run in flight */
  async stop(): Promise<void> {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running !== null) {
      await this.running;
    }
  }

  private async execute(): Promise<void> {
    try {
      await withJobContext(this.name, this.run);
    } catch (error) {
      this.logger.error('Periodic job failed', {
        job: this.name,
        error_code: isBarwatchError(error) ? error.code : undefined,
        error: errorMessage(error),
      });
    }
  }
}
