/**
 * JSON output writer
 *
 * Index runs produce either one document (flat, or grouped by category) or a
 * categorized bundle: one `<category>.json` per category plus `metadata.json`
 * in a directory. Single-article runs always produce one flat document.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { Logger } from 'pino';
import type { ArticleContent, ScrapingOptions } from '../types/index.js';
import {
  toArticleRecord,
  toScrapingOptionsRecord,
  toSummaryRecord,
  type ArticleRecord,
  type ArticleSummaryRecord,
  type IndexMetadata,
} from './records.js';

export type OutputTarget =
  | { kind: 'single-document'; filePath: string; groupByCategory: boolean }
  | { kind: 'categorized-bundle'; directory: string };

export interface WriterContext {
  logger: Logger;
  now: Date;
}

const pad = (value: number) => String(value).padStart(2, '0');

/** Local time as `YYYYMMDD_HHMMSS`, used in default output names */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** Local time as `YYYY/MM/DD HH:MM:SS`, recorded in output metadata */
export function formatMetadataTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}/${pad(date.getMonth() + 1)}/${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Decide where an index run writes, once, before anything is written
 */
export function resolveIndexOutputTarget(
  options: Pick<ScrapingOptions, 'categorize' | 'singleFile' | 'outputName'>,
  outputDir: string,
  now: Date
): OutputTarget {
  const baseName = options.outputName ?? `indeks_${formatFileTimestamp(now)}`;

  if (options.categorize && !options.singleFile) {
    return { kind: 'categorized-bundle', directory: join(outputDir, baseName) };
  }

  return {
    kind: 'single-document',
    filePath: join(outputDir, `${baseName}.json`),
    groupByCategory: options.categorize,
  };
}

export function resolveArticleOutputPath(outputDir: string, outputName: string | undefined, now: Date): string {
  return join(outputDir, `${outputName ?? `article_${formatFileTimestamp(now)}`}.json`);
}

/**
 * Group items by key, categories in order of first appearance
 */
export function groupByCategory<T>(items: readonly T[], categoryOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const category = categoryOf(item);
    const group = groups.get(category);
    if (group) {
      group.push(item);
    } else {
      groups.set(category, [item]);
    }
  }
  return groups;
}

export function buildIndexMetadata(
  options: ScrapingOptions,
  totalArticles: number,
  now: Date,
  categories?: Record<string, number>
): IndexMetadata {
  return {
    type: 'index',
    timestamp: formatMetadataTimestamp(now),
    scraping_options: toScrapingOptionsRecord(options),
    total_articles: totalArticles,
    ...(categories ? { categories } : {}),
  };
}

/**
 * Write index run output to the resolved target and return its path
 */
export async function writeIndexOutput(
  articles: readonly ArticleContent[],
  options: ScrapingOptions,
  target: OutputTarget,
  ctx: WriterContext
): Promise<string> {
  const toRecord = (article: ArticleContent): ArticleRecord | ArticleSummaryRecord =>
    options.extractContent ? toArticleRecord(article) : toSummaryRecord(article);

  if (target.kind === 'single-document' && !target.groupByCategory) {
    const document = {
      metadata: buildIndexMetadata(options, articles.length, ctx.now),
      articles: articles.map(toRecord),
    };
    await writeJson(target.filePath, document, ctx.logger);
    ctx.logger.info({ count: articles.length, path: target.filePath }, 'Saved articles');
    return target.filePath;
  }

  const groups = groupByCategory(articles, (article) => article.metadata.category);
  // fromEntries defines own keys, so a category such as "__proto__" survives
  const counts: Record<string, number> = Object.fromEntries(
    [...groups].map(([category, items]) => [category, items.length] as const)
  );
  const grouped: Record<string, Array<ArticleRecord | ArticleSummaryRecord>> = Object.fromEntries(
    [...groups].map(([category, items]) => [category, items.map(toRecord)] as const)
  );
  const metadata = buildIndexMetadata(options, articles.length, ctx.now, counts);

  if (target.kind === 'single-document') {
    await writeJson(target.filePath, { metadata, articles: grouped }, ctx.logger);
    ctx.logger.info(
      { count: articles.length, categories: groups.size, path: target.filePath },
      'Saved categorized articles'
    );
    return target.filePath;
  }

  for (const [category, items] of groups) {
    await writeJson(join(target.directory, `${category}.json`), { [category]: items.map(toRecord) }, ctx.logger);
  }
  await writeJson(join(target.directory, 'metadata.json'), metadata, ctx.logger);

  ctx.logger.info(
    { count: articles.length, categories: groups.size, path: target.directory },
    'Saved categorized bundle'
  );
  return target.directory;
}

/**
 * Write a single article as one flat document, ignoring categorization
 */
export async function writeArticleOutput(
  article: ArticleContent,
  filePath: string,
  ctx: Pick<WriterContext, 'logger'>
): Promise<string> {
  await writeJson(filePath, toArticleRecord(article), ctx.logger);
  ctx.logger.info({ path: filePath }, 'Saved article');
  return filePath;
}

async function writeJson(filePath: string, data: unknown, logger: Logger): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  } catch (error) {
    logger.error({ error, path: filePath }, 'Error saving JSON file');
    throw error;
  }
}
