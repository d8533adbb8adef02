import { describe, it, expect } from 'vitest';
import { buildJobs, getScheduleInfo, runJob, startScheduler, stopScheduler, type ScheduledJob } from '../src/scheduler/jobs.js';

const GROUP = 'https://www.facebook.com/groups/g';

function manualJob(name: string) {
  let release = (): void => {};
  const job: ScheduledJob = {
    name,
    cron: '* * * * *',
    enabled: true,
    runner: () => new Promise<void>(resolve => { release = () => resolve(); }),
  };
  return { job, release: () => release() };
}

describe('Scheduler', () => {
  it('should build one job per group', () => {
    const jobs = buildJobs([GROUP, `${GROUP}2`]);
    expect(jobs.map(job => job.name)).toEqual([`Group ${GROUP}`, `Group ${GROUP}2`]);
    expect(jobs.every(job => job.enabled)).toBe(true);
  });

  it('should skip a run while the previous one is still active', async () => {
    const { job, release } = manualJob('overlap');

    const first = runJob(job);
    expect(await runJob(job)).toBe(false);

    release();
    expect(await first).toBe(true);
  });

  it('should report a failing runner without throwing', async () => {
    const job: ScheduledJob = {
      name: 'broken',
      cron: '* * * * *',
      enabled: true,
      runner: async () => { throw new Error('boom'); },
    };

    expect(await runJob(job)).toBe(false);
  });

  it('should list the scheduled jobs', () => {
    startScheduler([GROUP]);
    try {
      expect(getScheduleInfo()).toEqual([{ name: `Group ${GROUP}`, cron: '0 */6 * * *', enabled: true }]);
    } finally {
      stopScheduler();
    }
  });
});
