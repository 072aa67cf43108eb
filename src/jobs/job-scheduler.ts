import { describeError } from '../errors';

export interface ScheduledJob {
  name: string;
  run(): Promise<unknown>;
}

/**
 * Runs the registered jobs in order on a fixed interval. A tick that starts
 * while the previous one is still running is skipped.
 */
export class JobScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private jobs: readonly ScheduledJob[],
    private intervalMs: number
  ) {}

  start(): void {
    if (this.timer) {
      return;
    }
    console.log('[Scheduler] Started', { jobs: this.jobs.map(job => job.name), intervalMs: this.intervalMs });
    this.timer = setInterval(() => {
      this.runOnce().catch(error => {
        console.error('[Scheduler] Tick failed', { error: describeError(error) });
      });
    }, this.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.log('[Scheduler] Stopped');
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Runs every job once. Returns false when a previous run is still in
   * progress. A failing job is logged and the next one still runs.
   */
  async runOnce(): Promise<boolean> {
    if (this.running) {
      console.warn('[Scheduler] Previous run still in progress, skipping tick');
      return false;
    }
    this.running = true;
    try {
      for (const job of this.jobs) {
        try {
          await job.run();
        } catch (error) {
          console.error('[Scheduler] Job failed', { job: job.name, error: describeError(error) });
        }
      }
      return true;
    } finally {
      this.running = false;
    }
  }
}
