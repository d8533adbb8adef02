import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { config } from '../config.js';
import { logger } from '../core/logger.js';

const dbPath = config.paths.database;
const inMemory = dbPath === ':memory:';

// Ensure data directory exists
if (!inMemory) {
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export const db = new Database(dbPath);

if (!inMemory) {
  db.pragma('journal_mode = WAL');
}

export const schema = `
-- Resume checkpoints, one per group
CREATE TABLE IF NOT EXISTS group_cursors (
  group_url TEXT PRIMARY KEY,
  token TEXT,
  page_index INTEGER NOT NULL DEFAULT 0,
  updated_at TEXT DEFAULT CURRENT_TIMESTAMP
);

-- Canonical posts across runs
CREATE TABLE IF NOT EXISTS posts (
  url TEXT PRIMARY KEY,
  group_url TEXT NOT NULL,
  created_at INTEGER NOT NULL DEFAULT 0,
  author_id TEXT,
  author_name TEXT,
  author_url TEXT,
  text TEXT,
  attachments TEXT NOT NULL DEFAULT '[]',
  reaction_count INTEGER NOT NULL DEFAULT 0,
  share_count INTEGER NOT NULL DEFAULT 0,
  comment_count INTEGER NOT NULL DEFAULT 0,
  top_comments TEXT NOT NULL DEFAULT '[]',
  first_seen_at TEXT DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT DEFAULT CURRENT_TIMESTAMP
);

-- Scrape run logs
CREATE TABLE IF NOT EXISTS scrape_logs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  group_url TEXT NOT NULL,
  status TEXT NOT NULL,
  terminal_reason TEXT,
  pages_fetched INTEGER DEFAULT 0,
  posts_emitted INTEGER DEFAULT 0,
  updates_emitted INTEGER DEFAULT 0,
  items_new INTEGER DEFAULT 0,
  failures TEXT,
  error TEXT,
  started_at TEXT NOT NULL,
  completed_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_posts_group ON posts(group_url);
CREATE INDEX IF NOT EXISTS idx_posts_created ON posts(created_at);
CREATE INDEX IF NOT EXISTS idx_logs_group ON scrape_logs(group_url);
`;

// Tables are created on import so prepared statements can bind against them
db.exec(schema);

export function initializeDatabase(): void {
  db.exec(schema);
  logger.info(`Database initialized at: ${dbPath}`);
}
