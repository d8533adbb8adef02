import { parseArgs } from 'util';
import { config } from '../config.js';
import { closeProxyAgents } from '../core/http.js';
import { logger } from '../core/logger.js';
import { exportPosts } from '../outputs/exporter.js';
import type { Post } from '../pipeline/types.js';
import { GroupScraper, defaultRunOptions, resolveGroupUrls } from './group.js';

const USAGE = `Usage: npm run scrape -- [groupUrl...] [options]

Options:
  --max-posts <n>        Maximum distinct posts per group
  --max-pages <n>        Maximum pages per group
  --output-dir <dir>     Where exported files are written
  --output-formats <f>   Comma separated: json,csv,xlsx
  --fresh                Ignore stored checkpoints and start from the top
  -h, --help             Show this message`;

function positiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} expects a positive integer, got "${value}"`);
  }
  return parsed;
}

async function runScrape(argv: string[], signal: AbortSignal): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'max-posts': { type: 'string' },
      'max-pages': { type: 'string' },
      'output-dir': { type: 'string' },
      'output-formats': { type: 'string' },
      fresh: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const groups = resolveGroupUrls(positionals);
  if (groups.length === 0) {
    console.log(USAGE);
    logger.error('No group URLs given (arguments, GROUP_URLS or data/input_urls.txt)');
    return 1;
  }

  const defaults = defaultRunOptions();
  const runOptions = {
    ...defaults,
    maxPosts: positiveInt(values['max-posts'], '--max-posts') ?? defaults.maxPosts,
    maxPages: positiveInt(values['max-pages'], '--max-pages') ?? defaults.maxPages,
  };
  const formats = values['output-formats']?.split(',') ?? config.output.formats;
  const outputDir = values['output-dir'] ?? config.output.dir;

  const allPosts: Post[] = [];
  let failures = 0;

  for (const groupUrl of groups) {
    if (signal.aborted) break;

    logger.info(`\n${'='.repeat(50)}`);
    logger.info(`Scraping group: ${groupUrl}`);
    logger.info('='.repeat(50));

    const scraper = new GroupScraper(groupUrl, {
      run: runOptions,
      resume: !values.fresh,
      deps: { signal },
    });
    const result = await scraper.run();
    allPosts.push(...result.items);
    if (result.errors.length > 0) failures++;
  }

  if (allPosts.length === 0) {
    logger.warn('No posts were scraped. Nothing to export.');
  } else {
    await exportPosts(allPosts, { outputDir, formats });
  }

  return failures === groups.length ? 1 : 0;
}

// CLI entry point
const controller = new AbortController();

process.on('SIGINT', () => {
  logger.warn('Interrupt received; finishing the current page and stopping');
  controller.abort();
});

runScrape(process.argv.slice(2), controller.signal)
  .then(async code => {
    await closeProxyAgents();
    logger.info('Scrape completed');
    process.exit(code);
  })
  .catch(async error => {
    await closeProxyAgents();
    logger.error(`Scrape failed: ${error}`);
    process.exit(1);
  });
