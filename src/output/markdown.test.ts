import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  convertBundleToMarkdown,
  createMarkdownContent,
  formatMarkdownMetadata,
  nextAvailablePath,
  sanitizeFilename,
  stripSiteSuffix,
} from './markdown.js';
import type { ArticleRecord } from './records.js';
import { SITE_URL, silentLogger } from '../test-support/fixtures.js';

const ctx = { logger: silentLogger, siteUrl: SITE_URL };

function record(overrides: Partial<ArticleRecord['metadata']> = {}, rest: Partial<ArticleRecord> = {}): ArticleRecord {
  return {
    metadata: {
      url: 'https://www.tempo.co/politik/rapat-1',
      title: 'Rapat Kabinet | tempo.co',
      category: 'politik',
      is_free: true,
      publication_date_raw: '',
      publication_date: '',
      publication_time: '',
      timezone: '',
      author: '',
      ...overrides,
    },
    content: [],
    tags: [],
    images: [],
    ...rest,
  };
}

describe('stripSiteSuffix', () => {
  it('drops the site suffix and anything after it', () => {
    expect(stripSiteSuffix('Rapat Kabinet | tempo.co')).toBe('Rapat Kabinet');
    expect(stripSiteSuffix('Rapat Kabinet')).toBe('Rapat Kabinet');
  });
});

describe('sanitizeFilename', () => {
  it('builds a lower-case hyphenated stem', () => {
    expect(sanitizeFilename('Rapat Kabinet: Presiden Minta Laporan | tempo.co')).toBe(
      'rapat-kabinet-presiden-minta-laporan'
    );
  });

  it('keeps dots and trims separators at the ends', () => {
    expect(sanitizeFilename('Harga B.B.M. Naik')).toBe('harga-b.b.m.-naik');
    expect(sanitizeFilename('---Judul___')).toBe('judul');
  });

  it('falls back when nothing usable remains', () => {
    expect(sanitizeFilename('!!!')).toBe('untitled-article');
  });

  it('caps the stem length', () => {
    expect(sanitizeFilename('a'.repeat(150))).toHaveLength(100);
  });
});

describe('formatMarkdownMetadata', () => {
  it('renders the metadata block of a premium article', () => {
    const premium = record(
      {
        url: '/hukum/sidang-2',
        category: 'hukum',
        is_free: false,
        publication_date: '2024-03-05',
        publication_time: '14:30:00',
      },
      { tags: ['Sepak Bola', 'KPK!', '!!'] }
    );

    expect(formatMarkdownMetadata(premium, SITE_URL)).toBe(
      [
        'Category: hukum',
        'Published at: 2024/03/05 14:30:00',
        'Tags: #premium #SepakBola #KPK',
        'URL: https://www.tempo.co/hukum/sidang-2',
      ].join('\n')
    );
  });

  it('leaves the published line empty without both date and time', () => {
    const partial = record({ publication_date: '2024-03-05' });

    expect(formatMarkdownMetadata(partial, SITE_URL).split('\n')).toEqual([
      'Category: politik',
      'Published at: ',
      'Tags: #free',
      'URL: https://www.tempo.co/politik/rapat-1',
    ]);
  });
});

describe('createMarkdownContent', () => {
  it('writes metadata, heading and non-empty paragraphs', () => {
    const withContent = record({}, { content: ['  Paragraf satu. ', '', '   ', 'Paragraf dua.'] });

    expect(createMarkdownContent(withContent, SITE_URL)).toBe(
      `${formatMarkdownMetadata(withContent, SITE_URL)}\n\n# Rapat Kabinet\n\nParagraf satu.\n\nParagraf dua.\n`
    );
  });
});

describe('files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'markdown-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('numbers colliding file names', async () => {
    expect(await nextAvailablePath(dir, 'judul')).toBe(join(dir, 'judul.md'));

    await writeFile(join(dir, 'judul.md'), '');
    await writeFile(join(dir, 'judul-1.md'), '');

    expect(await nextAvailablePath(dir, 'judul')).toBe(join(dir, 'judul-2.md'));
  });

  it('converts every category file of a bundle', async () => {
    const input = join(dir, 'bundle');
    const output = join(dir, 'md');
    const summary = { url: '/politik/rapat-1', title: 'Rapat Kabinet | tempo.co', category: 'politik', is_free: true };

    await mkdir(input);
    await writeFile(join(input, 'metadata.json'), JSON.stringify({ type: 'index', total_articles: 3 }));
    await writeFile(
      join(input, 'politik.json'),
      JSON.stringify({ politik: [summary, { ...summary, url: '/politik/rapat-2' }, { broken: true }] })
    );
    await writeFile(join(input, 'hukum.json'), JSON.stringify({ lainnya: [] }));
    await writeFile(join(input, 'catatan.txt'), 'bukan json');

    const total = await convertBundleToMarkdown(input, output, ctx);

    expect(total).toBe(2);
    expect(await readdir(output)).toEqual(['politik']);
    expect((await readdir(join(output, 'politik'))).sort()).toEqual(['rapat-kabinet-1.md', 'rapat-kabinet.md']);
    expect(await readFile(join(output, 'politik', 'rapat-kabinet-1.md'), 'utf-8')).toBe(
      [
        'Category: politik',
        'Published at: ',
        'Tags: #free',
        'URL: /politik/rapat-2',
        '',
        '# Rapat Kabinet',
        '',
      ].join('\n')
    );
  });

  it('treats records without an access flag as free', async () => {
    const input = join(dir, 'bundle');
    const output = join(dir, 'md');
    await mkdir(input);
    await writeFile(
      join(input, 'ekonomi.json'),
      JSON.stringify({ ekonomi: [{ url: '/ekonomi/harga-beras', title: 'Harga Beras', category: 'ekonomi' }] })
    );

    expect(await convertBundleToMarkdown(input, output, ctx)).toBe(1);
    expect(await readFile(join(output, 'ekonomi', 'harga-beras.md'), 'utf-8')).toBe(
      [
        'Category: ekonomi',
        'Published at: ',
        'Tags: #free',
        'URL: /ekonomi/harga-beras',
        '',
        '# Harga Beras',
        '',
      ].join('\n')
    );
  });

  it('returns zero when the bundle holds no category files', async () => {
    await writeFile(join(dir, 'metadata.json'), '{}');

    expect(await convertBundleToMarkdown(dir, join(dir, 'md'), ctx)).toBe(0);
  });
});
