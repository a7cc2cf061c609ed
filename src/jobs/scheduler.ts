import { Cron } from 'croner';

/** A job and the cron pattern it runs on, in the server's local time. */
export interface ScheduledJob {
  name: string;
  cron: string;
  run: () => Promise<unknown>;
}

/**
 * Runs each job on its cron pattern. `protect` keeps a slow run from
 * overlapping the next tick of the same job.
 */
export class JobScheduler {
  private readonly crons = new Map<string, Cron>();

  constructor(private readonly jobs: ScheduledJob[]) {}

  start() {
    if (this.crons.size > 0) {
      console.warn('[Jobs] scheduler is already running');
      return;
    }
    for (const job of this.jobs) {
      const cron = new Cron(job.cron, { protect: true }, async () => {
        console.log(`[Jobs] running ${job.name}`);
        try {
          await job.run();
        } catch (err) {
          console.error(`[Jobs] ${job.name} failed:`, err);
        }
      });
      this.crons.set(job.name, cron);
    }
    console.log(`[Jobs] scheduler started with ${this.crons.size} job(s)`);
  }

  stop() {
    if (this.crons.size === 0) return;
    for (const cron of this.crons.values()) cron.stop();
    this.crons.clear();
    console.log('[Jobs] scheduler stopped');
  }

  isActive(): boolean {
    return this.crons.size > 0;
  }

  /** When each job fires next; empty while stopped. */
  nextRuns(): Record<string, Date> {
    const runs: Record<string, Date> = {};
    for (const [name, cron] of this.crons) {
      const next = cron.nextRun();
      if (next) runs[name] = next;
    }
    return runs;
  }
}
