import fs from 'fs';
import path from 'path';
import { config, hasUsableSessionCookie } from '../config.js';
import { describeError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import {
  clearGroupCursor,
  countPosts,
  getGroupCursor,
  logScrapeEnd,
  logScrapeStart,
  saveGroupCursor,
  upsertPosts,
} from '../db/queries.js';
import { scrapeGroup, type GroupScrapeRun, type RunDeps, type RunOptions } from '../pipeline/run.js';
import type { Post, RunSummary, SessionContext, TerminalReason } from '../pipeline/types.js';

export interface ScraperResult {
  items: Post[];
  newItems: number;
  summary: RunSummary | null;
  errors: string[];
}

export interface GroupScraperOptions {
  session?: SessionContext;
  run?: RunOptions;
  deps?: Omit<RunDeps, 'resumeFrom' | 'onCheckpoint'>;
  resume?: boolean;
  flushSize?: number;
}

// Reasons after which the stored checkpoint no longer points anywhere useful
const EXHAUSTED: ReadonlySet<TerminalReason> = new Set(['EndOfFeed', 'EmptyStreak', 'StaleStreak', 'NotFound']);

export function defaultRunOptions(): RunOptions {
  return {
    maxPosts: config.scrape.maxPosts,
    maxPages: config.scrape.maxPages,
    perPageDelayMs: config.scrape.perPageDelayMs,
    includeComments: config.scrape.includeComments,
    emptyPageLimit: config.scrape.emptyPageLimit,
    stalePageLimit: config.scrape.stalePageLimit,
    emitMode: config.scrape.emitMode,
    retry: config.retry,
  };
}

export function defaultSession(): SessionContext {
  return { cookie: config.sessionCookie, userAgent: config.userAgent };
}

/**
 * Lifecycle around one group run: resume from the stored checkpoint,
 * stream emissions into the store in batches, persist checkpoints and log
 * the outcome.
 */
export class GroupScraper {
  private logId = 0;
  private readonly flushSize: number;

  constructor(private readonly groupUrl: string, private readonly options: GroupScraperOptions = {}) {
    this.flushSize = options.flushSize ?? 25;
  }

  async run(): Promise<ScraperResult> {
    const errors: string[] = [];
    let items: Post[] = [];
    let buffer: Post[] = [];
    let newItems = 0;
    let summary: RunSummary | null = null;
    let run: GroupScrapeRun | null = null;

    const flush = (): void => {
      if (buffer.length === 0) return;
      newItems += upsertPosts(this.groupUrl, buffer);
      buffer = [];
    };

    // Count-only increases are never emitted, so the canonical set is written once more at the end
    const settle = (): void => {
      if (run) {
        items = run.canonicalPosts();
        buffer = [...items];
      }
      flush();
    };

    logger.info(`Starting group scrape: ${this.groupUrl}`);
    this.logId = logScrapeStart(this.groupUrl);

    const session = this.options.session ?? defaultSession();
    if (!this.options.session && !hasUsableSessionCookie()) {
      logger.warn('No usable session cookie configured; the feed will likely reject the request');
    }

    const resumeFrom = this.options.resume === false ? undefined : getGroupCursor(this.groupUrl) ?? undefined;
    if (resumeFrom) {
      logger.info(`Resuming ${this.groupUrl} from page ${resumeFrom.pagesConsumed + 1}`);
    }

    try {
      run = scrapeGroup(this.groupUrl, session, this.options.run ?? defaultRunOptions(), {
        proxy: config.proxy,
        ...this.options.deps,
        resumeFrom,
        onCheckpoint: cursor => {
          flush();
          saveGroupCursor(cursor);
        },
      });

      for await (const emission of run) {
        buffer.push(emission.post);
        if (buffer.length >= this.flushSize) flush();
      }
      settle();

      summary = run.summary;
      if (summary.terminalReason && EXHAUSTED.has(summary.terminalReason)) {
        clearGroupCursor(this.groupUrl);
      }

      const failed = summary.terminalReason === 'AuthExpired' || summary.terminalReason === 'RetryBudgetExhausted';
      if (failed) errors.push(`Run ended with ${summary.terminalReason}`);
      logScrapeEnd(this.logId, failed ? 'failed' : 'success', summary, newItems, errors[0]);

      logger.info(`Group scrape complete: ${items.length} found, ${newItems} new, ${countPosts(this.groupUrl)} stored (${summary.terminalReason})`);
    } catch (error) {
      const errorMessage = describeError(error);
      errors.push(errorMessage);
      settle();
      summary = run?.summary ?? null;
      logScrapeEnd(this.logId, 'failed', summary ?? emptySummary(this.groupUrl), newItems, errorMessage);
      logger.error(`Group scrape failed: ${errorMessage}`);
    }

    return { items, newItems, summary, errors };
  }
}

function emptySummary(groupUrl: string): RunSummary {
  return {
    groupUrl,
    pagesFetched: 0,
    postsEmitted: 0,
    updatesEmitted: 0,
    partialPages: 0,
    terminalReason: null,
    failures: [],
    cursor: { groupUrl, token: null, pagesConsumed: 0, emptyStreak: 0, staleStreak: 0 },
    startedAt: new Date().toISOString(),
    completedAt: null,
  };
}

// Arguments first, then GROUP_URLS, then one url per line in data/input_urls.txt
export function resolveGroupUrls(args: string[], inputFile: string = path.join(config.paths.data, 'input_urls.txt')): string[] {
  if (args.length > 0) return args;
  if (config.groupUrls.length > 0) return config.groupUrls;
  if (!fs.existsSync(inputFile)) return [];
  return fs
    .readFileSync(inputFile, 'utf-8')
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}
