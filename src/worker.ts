import { config } from './config';
import db from './db';
import { createKnexRepositories } from './repositories';
import { jobContext } from './services';
import { scheduledJobs } from './jobs';
import { JobScheduler } from './jobs/scheduler';

if (!config.enableJobs) {
  console.log('[Jobs] ENABLE_JOBS is false - worker not started');
  process.exit(0);
}

const jobs = scheduledJobs(jobContext(createKnexRepositories(db)));
const scheduler = new JobScheduler(jobs);
scheduler.start();

const nextRuns = scheduler.nextRuns();
for (const job of jobs) {
  console.log(`[Jobs] ${job.name}: '${job.cron}', next at ${nextRuns[job.name]?.toISOString() ?? 'never'}`);
}

const shutdown = async (signal: string) => {
  console.log(`[Jobs] ${signal} received, shutting down`);
  scheduler.stop();
  await db.destroy();
  process.exit(0);
};
process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
