import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import ExcelJS from 'exceljs';
import { CSV_COLUMNS, exportPosts, toCsv } from '../src/outputs/exporter.js';
import type { Post } from '../src/pipeline/types.js';

const post: Post = {
  createdAt: 1700000000,
  url: 'https://www.facebook.com/groups/g/posts/1/',
  user: { id: 'u1', name: 'Ana "A" Lee', url: 'https://www.facebook.com/ana' },
  text: 'Hi, all',
  attachments: [],
  reactionCount: 3,
  shareCount: 1,
  commentCount: 0,
  topComments: [],
};

const tempDirs: string[] = [];

function tempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'feed-export-'));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

describe('toCsv', () => {
  it('should quote text cells and leave numbers bare', () => {
    expect(toCsv([post])).toBe(
      CSV_COLUMNS.join(',') + '\r\n'
      + '1700000000,"https://www.facebook.com/groups/g/posts/1/","u1","Ana ""A"" Lee",'
      + '"https://www.facebook.com/ana","Hi, all",3,1,0,"[]","[]"\r\n'
    );
  });

  it('should embed nested lists as JSON', () => {
    const withMedia: Post = {
      ...post,
      attachments: [{ type: 'link', url: 'https://example.com/a' }],
    };
    const row = toCsv([withMedia]).split('\r\n')[1];
    expect(row.endsWith(',"[{""type"":""link"",""url"":""https://example.com/a""}]","[]"')).toBe(true);
  });
});

describe('exportPosts', () => {
  it('should write one file per supported format', async () => {
    const dir = tempDir();

    const written = await exportPosts([post], { outputDir: dir, formats: ['JSON', 'csv', 'json', 'pdf'] });

    expect(written).toEqual([path.join(dir, 'group_posts.json'), path.join(dir, 'group_posts.csv')]);
    expect(JSON.parse(fs.readFileSync(written[0], 'utf-8'))).toEqual([post]);
    expect(fs.readFileSync(written[1], 'utf-8')).toBe(toCsv([post]));
  });

  it('should write a workbook with the CSV columns', async () => {
    const dir = tempDir();

    const written = await exportPosts([post], { outputDir: dir, formats: ['xlsx'] });
    expect(written).toEqual([path.join(dir, 'group_posts.xlsx')]);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(written[0]);
    const sheet = workbook.getWorksheet('Posts');
    expect(sheet?.rowCount).toBe(2);
    expect(sheet?.getRow(1).getCell(1).value).toBe('createdAt');
    expect(sheet?.getRow(1).getCell(11).value).toBe('topComments');
    expect(sheet?.getRow(2).getCell(1).value).toBe(1700000000);
    expect(sheet?.getRow(2).getCell(4).value).toBe('Ana "A" Lee');
    expect(sheet?.getRow(2).getCell(7).value).toBe(3);
  });

  it('should create the output directory and honor the base name', async () => {
    const dir = path.join(tempDir(), 'nested', 'out');

    const written = await exportPosts([post], { outputDir: dir, baseFilename: 'run_1', formats: ['csv'] });

    expect(written).toEqual([path.join(dir, 'run_1.csv')]);
    expect(fs.existsSync(written[0])).toBe(true);
  });

  it('should write nothing when there are no posts', async () => {
    const dir = path.join(tempDir(), 'empty');
    expect(await exportPosts([], { outputDir: dir, formats: ['json'] })).toEqual([]);
    expect(fs.existsSync(dir)).toBe(false);
  });
});
