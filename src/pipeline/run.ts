import { z } from 'zod';
import { ConfigError, ParseError, describeError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { DEFAULT_RETRY_POLICY, RetryController, sleep as defaultSleep } from '../core/retry.js';
import { CursorManager, createCursor, isTerminal } from './cursor.js';
import { PageFetcher, type PageSource } from './fetcher.js';
import { MergeEngine } from './merge.js';
import { parseFeed } from './parser.js';
import type {
  Cursor,
  FailureKind,
  Post,
  PostEmission,
  ProxyDescriptor,
  RawPage,
  RunSummary,
  SessionContext,
  TerminalReason,
} from './types.js';

export const RunOptionsSchema = z.object({
  maxPosts: z.number().int().positive().default(100),
  maxPages: z.number().int().positive().default(10),
  perPageDelayMs: z.number().int().nonnegative().default(0),
  includeComments: z.boolean().default(true),
  emptyPageLimit: z.number().int().positive().default(3),
  stalePageLimit: z.number().int().positive().default(3),
  emitMode: z.enum(['incremental', 'final']).default('incremental'),
  retry: z.object({
    maxAttempts: z.number().int().positive().default(DEFAULT_RETRY_POLICY.maxAttempts),
    baseDelayMs: z.number().nonnegative().default(DEFAULT_RETRY_POLICY.baseDelayMs),
    capDelayMs: z.number().nonnegative().default(DEFAULT_RETRY_POLICY.capDelayMs),
    jitterMs: z.number().nonnegative().default(DEFAULT_RETRY_POLICY.jitterMs),
  }).default({}),
});

export type RunOptions = z.input<typeof RunOptionsSchema>;
export type ResolvedRunOptions = z.output<typeof RunOptionsSchema>;

export interface RunDeps {
  fetcher?: PageSource;
  retry?: RetryController;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  proxy?: ProxyDescriptor;
  resumeFrom?: Cursor;
  signal?: AbortSignal;
  onCheckpoint?: (cursor: Cursor) => void | Promise<void>;
  now?: () => number;
}

export function resolveRunOptions(groupUrl: string, options: RunOptions): ResolvedRunOptions {
  const url = z.string().url().safeParse(groupUrl);
  if (!url.success) {
    throw new ConfigError(`Invalid group URL: ${groupUrl}`, ['groupUrl: must be an absolute URL']);
  }

  const parsed = RunOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid run options: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

function withoutComments(post: Post): Post {
  return { ...post, topComments: [] };
}

/**
 * One group scrape as a lazy sequence of post emissions.
 *
 * Iterating starts a fresh run (new Seen-Set, cursor seeded from
 * `resumeFrom` when given); iterating again restarts it. `summary` describes
 * the latest run and `canonicalPosts()` its Seen-Set.
 */
export class GroupScrapeRun implements AsyncIterable<PostEmission> {
  private readonly fetcher: PageSource;
  private readonly retry: RetryController;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private engine = new MergeEngine();
  private current: RunSummary;

  constructor(
    private readonly groupUrl: string,
    private readonly session: SessionContext,
    private readonly options: ResolvedRunOptions,
    private readonly deps: RunDeps = {}
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
    this.fetcher = deps.fetcher ?? new PageFetcher();
    this.retry = deps.retry ?? new RetryController(options.retry, { sleep: this.sleep, random: deps.random });
    this.current = this.freshSummary();
  }

  get summary(): RunSummary {
    return structuredClone(this.current);
  }

  canonicalPosts(): Post[] {
    return this.engine.snapshot();
  }

  private startCursor(): Cursor {
    const resume = this.deps.resumeFrom;
    return resume ? { ...resume, groupUrl: this.groupUrl } : createCursor(this.groupUrl);
  }

  private freshSummary(): RunSummary {
    return {
      groupUrl: this.groupUrl,
      pagesFetched: 0,
      postsEmitted: 0,
      updatesEmitted: 0,
      partialPages: 0,
      terminalReason: null,
      failures: [],
      cursor: this.startCursor(),
      startedAt: new Date(this.now()).toISOString(),
      completedAt: null,
    };
  }

  // New urls beyond the cap are dropped; known urls still merge
  private admit(engine: MergeEngine, candidates: Post[]): Post[] {
    const fresh = new Set<string>();
    return candidates.filter(post => {
      if (engine.has(post.url) || fresh.has(post.url)) return true;
      if (engine.size + fresh.size >= this.options.maxPosts) return false;
      fresh.add(post.url);
      return true;
    });
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<PostEmission, void, undefined> {
    const engine = new MergeEngine();
    const summary = this.freshSummary();
    const cursors = new CursorManager(this.options, summary.cursor.pagesConsumed);
    const { signal, proxy, onCheckpoint } = this.deps;
    // One clock reading per run keeps relative timestamps stable across pages
    const parsedAt = this.now();
    this.engine = engine;
    this.current = summary;

    let cursor = summary.cursor;
    let terminal: TerminalReason | null = null;

    const fail = (kind: FailureKind, page: number, message: string): void => {
      summary.failures.push({ kind, page, message });
      logger.warn(`Page ${page} of ${this.groupUrl}: ${kind}: ${message}`);
    };

    logger.info(`Scraping ${this.groupUrl}`, {
      resumeFrom: cursor.token ?? (cursor.pagesConsumed || undefined),
      emitMode: this.options.emitMode,
    });

    try {
      for (;;) {
        if (signal?.aborted) {
          terminal = 'Cancelled';
          break;
        }

        const pageNumber = cursor.pagesConsumed + 1;
        const requested = cursor;
        const outcome = await this.retry.execute(
          () => this.fetcher.fetchPage(requested, this.session, proxy),
          { signal, context: `${this.groupUrl} page ${pageNumber}` }
        );

        if (outcome.state === 'Cancelled') {
          terminal = 'Cancelled';
          break;
        }

        let page: RawPage | null = null;
        let candidates: Post[] = [];

        if (outcome.state === 'Failed') {
          const { failure } = outcome;
          if (outcome.exhausted) {
            fail('RetryBudgetExhausted', pageNumber, outcome.error?.message ?? failure.message);
            terminal = 'RetryBudgetExhausted';
            break;
          }
          if (failure.kind === 'AuthExpired' || failure.kind === 'NotFound') {
            fail(failure.kind, pageNumber, failure.message);
            terminal = failure.kind;
            break;
          }
          fail(failure.kind, pageNumber, failure.message);
        } else {
          summary.pagesFetched++;
          try {
            const parsed = parseFeed(outcome.page.payload, { now: parsedAt });
            page = outcome.page;
            candidates = parsed.posts;
            if (parsed.partial) {
              summary.partialPages++;
              logger.debug(`Page ${pageNumber} parsed partially`, { defects: parsed.defects });
            }
          } catch (error) {
            if (!(error instanceof ParseError)) throw error;
            fail('ParseError', pageNumber, describeError(error));
          }
        }

        if (signal?.aborted) {
          terminal = 'Cancelled';
          break;
        }

        const admitted = this.admit(engine, candidates);
        const shaped = this.options.includeComments ? admitted : admitted.map(withoutComments);
        const emissions = engine.reconcile(shaped);
        const created = emissions.filter(e => e.kind === 'created').length;

        if (this.options.emitMode === 'incremental') {
          for (const emission of emissions) {
            if (emission.kind === 'created') summary.postsEmitted++;
            else summary.updatesEmitted++;
            yield emission;
          }
        }

        logger.info(`Page ${pageNumber}: ${candidates.length} posts, ${created} new, ${emissions.length - created} updated`);

        const next = cursors.advance(cursor, page, { candidates: candidates.length, newIdentities: created });
        if (isTerminal(next)) {
          cursor = next.cursor;
          summary.cursor = cursor;
          if (next.reason === 'CursorStall') {
            fail('CursorStall', pageNumber, `Cursor token did not advance (${cursor.token})`);
          }
          // The page cap stops this run, not the feed; the next run resumes from here
          if (next.reason === 'MaxPages') {
            await onCheckpoint?.(structuredClone(cursor));
          }
          terminal = next.reason;
          break;
        }

        cursor = next;
        summary.cursor = cursor;
        await onCheckpoint?.(structuredClone(cursor));

        if (engine.size >= this.options.maxPosts) {
          terminal = 'MaxPosts';
          break;
        }

        if (this.options.perPageDelayMs > 0) {
          await this.sleep(this.options.perPageDelayMs);
        }
      }

      if (this.options.emitMode === 'final') {
        for (const post of engine.snapshot()) {
          summary.postsEmitted++;
          yield { kind: 'created', post };
        }
      }
    } finally {
      summary.terminalReason = terminal;
      summary.completedAt = new Date(this.now()).toISOString();
      logger.info(`Finished ${this.groupUrl}: ${terminal ?? 'abandoned'}`, {
        pages: summary.pagesFetched,
        posts: summary.postsEmitted,
        updates: summary.updatesEmitted,
        failures: summary.failures.length,
      });
    }
  }
}

export function scrapeGroup(
  groupUrl: string,
  session: SessionContext,
  options: RunOptions = {},
  deps: RunDeps = {}
): GroupScrapeRun {
  return new GroupScrapeRun(groupUrl, session, resolveRunOptions(groupUrl, options), deps);
}
