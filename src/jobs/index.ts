import type { ScheduledJob } from './scheduler';
import { JobContext } from './job.context';
import { markNoShows, sendAppointmentReminders, sendVetDailySchedules } from './appointment.jobs';
import { checkExpiringLots, checkStockLevels, sendInventoryValuation } from './inventory.jobs';

interface JobDefinition {
  /** cron pattern, local time */
  cron: string;
  run: (ctx: JobContext) => Promise<object>;
}

export const JOBS = {
  'appointment-reminders': { cron: '0 9 * * *', run: sendAppointmentReminders },
  'no-show-sweep': { cron: '0 * * * *', run: markNoShows },
  'vet-daily-schedule': { cron: '0 7 * * *', run: sendVetDailySchedules },
  'low-stock': { cron: '0 8 * * *', run: checkStockLevels },
  'expiry-scan': { cron: '0 10 * * 1', run: checkExpiringLots },
  'inventory-valuation': { cron: '30 8 1 * *', run: sendInventoryValuation },
} satisfies Record<string, JobDefinition>;

export type JobName = keyof typeof JOBS;

export const JOB_NAMES = Object.keys(JOBS).filter(isJobName);

export function isJobName(value: string): value is JobName {
  return Object.prototype.hasOwnProperty.call(JOBS, value);
}

export function runJob(name: JobName, ctx: JobContext): Promise<object> {
  const job: JobDefinition = JOBS[name];
  return job.run(ctx);
}

export function scheduledJobs(ctx: JobContext): ScheduledJob[] {
  return JOB_NAMES.map((name) => ({
    name,
    cron: JOBS[name].cron,
    run: () => runJob(name, ctx),
  }));
}
