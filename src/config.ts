import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

dotenv.config();

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const rootPath = path.join(__dirname, '..');

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/129.0.0.0 Safari/537.36';

// Helper for CSV
const csv = (defaultValue: string = '') =>
  z.string()
   .default(defaultValue)
   .transform(val => val ? val.split(',').map(s => s.trim()).filter(Boolean) : []);

// Helper for Boolean
const bool = (defaultValue: string) =>
  z.enum(['true', 'false'])
   .default(defaultValue as 'true' | 'false')
   .transform(val => val === 'true');

// Helper for integers coming from the environment
const int = (defaultValue: number, min = 0) =>
  z.coerce.number().int().min(min).default(defaultValue);

// Configuration Schema
const configSchema = z.object({
  // Session
  sessionCookie: z.string().default(''),
  userAgent: z.string().default(DEFAULT_USER_AGENT),
  requestTimeoutMs: int(15000, 1),

  // Single Proxy
  proxy: z.object({
    host: z.string(),
    port: z.string(),
    username: z.string().optional(),
    password: z.string().optional(),
  }).optional(),

  // Groups
  groupUrls: csv(''),

  // Run limits
  scrape: z.object({
    maxPosts: int(100, 1),
    maxPages: int(10, 1),
    perPageDelayMs: int(1500),
    includeComments: bool('true'),
    emptyPageLimit: int(3, 1),
    stalePageLimit: int(3, 1),
    emitMode: z.enum(['incremental', 'final']).default('incremental'),
  }),

  // Retry / backoff
  retry: z.object({
    maxAttempts: int(5, 1),
    baseDelayMs: int(1000),
    capDelayMs: int(30000),
    jitterMs: int(500),
  }),

  // Output
  output: z.object({
    dir: z.string().default(path.join(rootPath, 'data')),
    formats: csv('json,csv,xlsx'),
  }),

  // Scheduler
  cron: z.string().default('0 */6 * * *'),

  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  logToFile: bool('true'),

  // Paths
  paths: z.object({
    root: z.string().default(rootPath),
    data: z.string().default(path.join(rootPath, 'data')),
    logs: z.string().default(path.join(rootPath, 'logs')),
    database: z.string().default(path.join(rootPath, 'data', 'feed.db')),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

// Empty strings in .env mean "use the default"
const env = (name: string): string | undefined => {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value;
};

// Validate Environment
const rawConfig = {
  sessionCookie: env('SESSION_COOKIE'),
  userAgent: env('USER_AGENT'),
  requestTimeoutMs: env('REQUEST_TIMEOUT_MS'),

  proxy: env('PROXY_HOST') ? {
    host: env('PROXY_HOST'),
    port: env('PROXY_PORT') ?? '8080',
    username: env('PROXY_USERNAME'),
    password: env('PROXY_PASSWORD'),
  } : undefined,

  groupUrls: env('GROUP_URLS'),

  scrape: {
    maxPosts: env('MAX_POSTS'),
    maxPages: env('MAX_PAGES'),
    perPageDelayMs: env('PER_PAGE_DELAY_MS'),
    includeComments: env('INCLUDE_COMMENTS'),
    emptyPageLimit: env('EMPTY_PAGE_LIMIT'),
    stalePageLimit: env('STALE_PAGE_LIMIT'),
    emitMode: env('EMIT_MODE'),
  },

  retry: {
    maxAttempts: env('RETRY_MAX_ATTEMPTS'),
    baseDelayMs: env('RETRY_BASE_DELAY_MS'),
    capDelayMs: env('RETRY_CAP_DELAY_MS'),
    jitterMs: env('RETRY_JITTER_MS'),
  },

  output: {
    dir: env('OUTPUT_DIR'),
    formats: env('OUTPUT_FORMATS'),
  },

  cron: env('SCRAPE_CRON'),

  logLevel: env('LOG_LEVEL'),
  logToFile: env('LOG_TO_FILE'),

  paths: {
    database: env('DATABASE_PATH'),
  },
};

const parsed = configSchema.safeParse(rawConfig);

if (!parsed.success) {
  console.error('❌ Invalid Configuration:', JSON.stringify(parsed.error.format(), null, 2));
  process.exit(1);
}

const validated = parsed.data;

// Transform Proxy Object for App Consumption
export const config = {
  ...validated,
  proxy: validated.proxy ? {
    server: `http://${validated.proxy.host}:${validated.proxy.port}`,
    username: validated.proxy.username,
    password: validated.proxy.password,
  } : undefined,
};

export function hasUsableSessionCookie(): boolean {
  const cookie = config.sessionCookie.trim();
  return cookie.length > 0 && !cookie.includes('your_session_cookie_here');
}
