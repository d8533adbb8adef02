import fs from 'fs';
import path from 'path';
import ExcelJS from 'exceljs';
import { logger } from '../core/logger.js';
import type { Post } from '../pipeline/types.js';

export type ExportFormat = 'json' | 'csv' | 'xlsx';

export const CSV_COLUMNS = [
  'createdAt',
  'url',
  'user.id',
  'user.name',
  'user.url',
  'text',
  'reactionCount',
  'shareCount',
  'commentCount',
  'attachments',
  'topComments',
] as const;

export interface ExportOptions {
  outputDir: string;
  baseFilename?: string;
  formats: string[];
}

function quote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

// Nested lists travel as JSON strings in their cell
export function flattenPost(post: Post): Array<string | number> {
  return [
    post.createdAt,
    post.url,
    post.user.id,
    post.user.name,
    post.user.url,
    post.text,
    post.reactionCount,
    post.shareCount,
    post.commentCount,
    JSON.stringify(post.attachments),
    JSON.stringify(post.topComments),
  ];
}

export function toCsv(posts: Post[]): string {
  const rows = posts.map(post =>
    flattenPost(post)
      .map(cell => (typeof cell === 'number' ? String(cell) : quote(cell)))
      .join(',')
  );
  return [CSV_COLUMNS.join(','), ...rows].join('\r\n') + '\r\n';
}

export function toJson(posts: Post[]): string {
  return JSON.stringify(posts, null, 2);
}

// One sheet, the CSV header as its first row
export async function writeXlsx(posts: Post[], filePath: string): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('Posts');
  sheet.addRow([...CSV_COLUMNS]);
  for (const post of posts) sheet.addRow(flattenPost(post));
  await workbook.xlsx.writeFile(filePath);
}

function isExportFormat(format: string): format is ExportFormat {
  return format === 'json' || format === 'csv' || format === 'xlsx';
}

/**
 * Writes the posts once per requested format and returns the written paths.
 * Unsupported formats are skipped with a warning.
 */
export async function exportPosts(posts: Post[], options: ExportOptions): Promise<string[]> {
  if (posts.length === 0) {
    logger.warn('No posts provided to exporter; skipping export');
    return [];
  }

  const baseFilename = options.baseFilename ?? 'group_posts';
  const formats = Array.from(new Set(options.formats.map(f => f.trim().toLowerCase()).filter(Boolean)));
  const written: string[] = [];

  if (!fs.existsSync(options.outputDir)) {
    fs.mkdirSync(options.outputDir, { recursive: true });
  }

  for (const format of formats) {
    if (!isExportFormat(format)) {
      logger.warn(`Unsupported export format skipped: ${format}`);
      continue;
    }

    const filePath = path.join(options.outputDir, `${baseFilename}.${format}`);
    if (format === 'xlsx') {
      await writeXlsx(posts, filePath);
    } else {
      fs.writeFileSync(filePath, format === 'json' ? toJson(posts) : toCsv(posts), 'utf-8');
    }
    written.push(filePath);
    logger.info(`Exported ${posts.length} posts to ${filePath}`);
  }

  return written;
}
