/**
 * Markdown projector
 *
 * Converts a categorized bundle written by the JSON writer into one Markdown
 * file per article, grouped in one directory per category. Runs on saved
 * output and never touches the network.
 */

import { access, mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import { toAbsoluteUrl } from '../utils/url-builder.js';
import {
  articleMetadataRecordSchema,
  articleRecordSchema,
  articleSummaryRecordSchema,
  type ArticleRecord,
} from './records.js';

export const SITE_TITLE_SUFFIX = ' | tempo.co';
export const FALLBACK_FILENAME = 'untitled-article';
export const MAX_FILENAME_LENGTH = 100;

// Records written without an access flag count as free
const sourceSummarySchema = articleSummaryRecordSchema.extend({ is_free: z.boolean().default(true) });
const sourceRecordSchema = articleRecordSchema.extend({
  metadata: articleMetadataRecordSchema.extend({ is_free: z.boolean().default(true) }),
});

/** Full records, or metadata-only projections lifted into the full shape */
export const markdownSourceSchema = z.union([
  sourceRecordSchema,
  sourceSummarySchema.transform(
    (summary): ArticleRecord => ({
      metadata: {
        ...summary,
        publication_date_raw: '',
        publication_date: '',
        publication_time: '',
        timezone: '',
        author: '',
      },
      content: [],
      tags: [],
      images: [],
    })
  ),
]);

export interface MarkdownContext {
  logger: Logger;
  siteUrl: string;
}

export function stripSiteSuffix(title: string): string {
  const index = title.indexOf(SITE_TITLE_SUFFIX);
  return index === -1 ? title : title.slice(0, index);
}

/**
 * Filesystem-safe lower-case file stem derived from an article title
 */
export function sanitizeFilename(title: string): string {
  const filename = stripSiteSuffix(title)
    .replace(/[^a-zA-Z0-9\s\-_.]/g, ' ')
    .replace(/[\s\-_]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_FILENAME_LENGTH);

  return (filename || FALLBACK_FILENAME).toLowerCase();
}

function formatTags(record: ArticleRecord): string {
  const tags = [record.metadata.is_free ? '#free' : '#premium'];
  for (const tag of record.tags) {
    const cleaned = tag.replace(/[^a-zA-Z0-9_-]/g, '');
    if (cleaned) {
      tags.push(`#${cleaned}`);
    }
  }
  return tags.join(' ');
}

export function formatMarkdownMetadata(record: ArticleRecord, siteUrl: string): string {
  const { category, publication_date, publication_time, is_free } = record.metadata;

  let { url } = record.metadata;
  if (!is_free && url && !url.startsWith('http')) {
    url = toAbsoluteUrl(url.startsWith('/') ? url : `/${url}`, siteUrl);
  }

  const publishedAt =
    publication_date && publication_time
      ? `${publication_date.replace(/-/g, '/')} ${publication_time}`
      : '';

  return [
    `Category: ${category}`,
    `Published at: ${publishedAt}`,
    `Tags: ${formatTags(record)}`,
    `URL: ${url}`,
  ].join('\n');
}

export function createMarkdownContent(record: ArticleRecord, siteUrl: string): string {
  const lines = [formatMarkdownMetadata(record, siteUrl), '', `# ${stripSiteSuffix(record.metadata.title)}`, ''];

  for (const paragraph of record.content) {
    const text = paragraph.trim();
    if (text) {
      lines.push(text, '');
    }
  }

  return lines.join('\n');
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * First free `<stem>.md`, `<stem>-1.md`, `<stem>-2.md`, ... in a directory
 */
export async function nextAvailablePath(directory: string, stem: string): Promise<string> {
  let candidate = join(directory, `${stem}.md`);
  for (let counter = 1; await pathExists(candidate); counter++) {
    candidate = join(directory, `${stem}-${counter}.md`);
  }
  return candidate;
}

/**
 * Convert one `<category>.json` file; returns the number of files written
 */
export async function convertCategoryFile(
  filePath: string,
  outputDir: string,
  ctx: MarkdownContext
): Promise<number> {
  const { logger } = ctx;
  const category = basename(filePath, '.json');

  let data: unknown;
  try {
    data = JSON.parse(await readFile(filePath, 'utf-8'));
  } catch (error) {
    logger.error({ error, path: filePath }, 'Error reading category file');
    return 0;
  }

  const document = z.record(z.unknown()).safeParse(data);
  const entries = z.array(z.unknown()).safeParse(document.success ? document.data[category] : undefined);
  if (!entries.success) {
    logger.warn({ path: filePath, category }, 'Expected a list of articles under the category key');
    return 0;
  }

  const categoryDir = join(outputDir, category);
  await mkdir(categoryDir, { recursive: true });

  let written = 0;
  for (const [index, entry] of entries.data.entries()) {
    const parsed = markdownSourceSchema.safeParse(entry);
    if (!parsed.success) {
      logger.warn({ path: filePath, index, issues: parsed.error.issues.length }, 'Skipping malformed article');
      continue;
    }

    const record = parsed.data;
    const target = await nextAvailablePath(categoryDir, sanitizeFilename(record.metadata.title));
    await writeFile(target, createMarkdownContent(record, ctx.siteUrl), 'utf-8');
    logger.debug({ path: target }, 'Created Markdown file');
    written++;
  }

  return written;
}

/**
 * Convert every category file of a bundle directory (metadata.json excluded)
 */
export async function convertBundleToMarkdown(
  inputDir: string,
  outputDir: string,
  ctx: MarkdownContext
): Promise<number> {
  const { logger } = ctx;

  const files = (await readdir(inputDir))
    .filter((name) => name.endsWith('.json') && name !== 'metadata.json')
    .sort();

  if (files.length === 0) {
    logger.warn({ inputDir }, 'No category files found to convert');
    return 0;
  }

  await mkdir(outputDir, { recursive: true });

  let total = 0;
  for (const file of files) {
    const count = await convertCategoryFile(join(inputDir, file), outputDir, ctx);
    logger.info({ file, count }, 'Converted category file');
    total += count;
  }

  logger.info({ total, outputDir }, 'Markdown conversion complete');
  return total;
}
