import cron, { type ScheduledTask } from 'node-cron';
import { config } from '../config.js';
import { logger } from '../core/logger.js';
import { exportPosts } from '../outputs/exporter.js';
import { getPosts } from '../db/queries.js';
import { GroupScraper } from '../scrapers/group.js';

export interface ScheduledJob {
  name: string;
  cron: string;
  runner: () => Promise<void>;
  enabled: boolean;
  task?: ScheduledTask;
}

function groupJob(groupUrl: string): ScheduledJob {
  return {
    name: `Group ${groupUrl}`,
    cron: config.cron,
    runner: async () => {
      const scraper = new GroupScraper(groupUrl);
      const result = await scraper.run();
      // Refresh the exported files from everything stored so far
      await exportPosts(getPosts(), { outputDir: config.output.dir, formats: config.output.formats });
      if (result.errors.length > 0) {
        throw new Error(result.errors.join('; '));
      }
    },
    enabled: true,
  };
}

const jobs: ScheduledJob[] = [];
const runningJobs = new Set<string>();

export function buildJobs(groupUrls: string[] = config.groupUrls): ScheduledJob[] {
  return groupUrls.map(groupJob);
}

export async function runJob(job: ScheduledJob): Promise<boolean> {
  if (runningJobs.has(job.name)) {
    logger.warn(`[Scheduler] Skipping ${job.name} (previous run still active)`);
    return false;
  }

  runningJobs.add(job.name);
  logger.info(`[Scheduler] Running: ${job.name}`);
  try {
    await job.runner();
    logger.info(`[Scheduler] Completed: ${job.name}`);
    return true;
  } catch (error) {
    logger.error(`[Scheduler] Failed: ${job.name}`, { error });
    return false;
  } finally {
    runningJobs.delete(job.name);
  }
}

export function startScheduler(groupUrls: string[] = config.groupUrls): void {
  logger.info('Starting scheduler...');

  if (groupUrls.length === 0) {
    logger.warn('No GROUP_URLS configured; nothing to schedule');
  }

  jobs.splice(0, jobs.length, ...buildJobs(groupUrls));

  for (const job of jobs) {
    if (!job.enabled) {
      logger.warn(`Skipping ${job.name} (missing required configuration)`);
      continue;
    }

    if (!cron.validate(job.cron)) {
      logger.error(`Invalid cron expression for ${job.name}: ${job.cron}`);
      continue;
    }

    job.task = cron.schedule(job.cron, () => {
      void runJob(job);
    });

    logger.info(`Scheduled: ${job.name} (${job.cron})`);
  }

  logger.info('Scheduler started successfully');
}

export function stopScheduler(): void {
  for (const job of jobs) {
    if (job.task) {
      job.task.stop();
    }
  }
  logger.info('Scheduler stopped');
}

export function getScheduleInfo(): Array<{ name: string; cron: string; enabled: boolean }> {
  return jobs.map(job => ({
    name: job.name,
    cron: job.cron,
    enabled: job.enabled,
  }));
}
