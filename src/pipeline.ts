/**
 * Main Pipeline
 *
 * Drives an index run:
 * 1. Build the listing URL for each page
 * 2. Fetch and parse the listing into stubs
 * 3. Apply the access filter
 * 4. Optionally extract full content per stub
 * 5. Write the collected articles
 *
 * Everything runs sequentially, with a delay between listing pages.
 */

import {
  extractArticleContent,
  extractContentForArticles,
  filterArticlesByAccess,
  scrapeIndexPage,
  stubToArticle,
  type ScraperContext,
} from './scraper/index.js';
import {
  resolveArticleOutputPath,
  resolveIndexOutputTarget,
  writeArticleOutput,
  writeIndexOutput,
} from './output/index.js';
import { buildIndexUrl } from './utils/url-builder.js';
import { sleep } from './utils/retry.js';
import { ArticleNotFoundError } from './utils/errors.js';
import type { ArticleContent, ScrapingOptions } from './types/index.js';

export interface PipelineContext extends ScraperContext {
  indexUrl: string;
  outputDir: string;
  now?: () => Date;
  delay?: (ms: number) => Promise<void>;
}

export interface IndexScrapeResult {
  articles: ArticleContent[];
  pagesProcessed: number;
  outputPath: string;
}

export interface ArticleRunOptions {
  useAuth?: boolean;
  outputName?: string;
}

export interface ArticleRunResult {
  article: ArticleContent;
  outputPath: string;
}

/**
 * Walk the listing pages and accumulate articles, without writing anything
 */
export async function collectIndexArticles(
  options: ScrapingOptions,
  ctx: PipelineContext
): Promise<{ articles: ArticleContent[]; pagesProcessed: number }> {
  const { logger, indexUrl, delay = sleep } = ctx;
  const articles: ArticleContent[] = [];
  let pagesProcessed = 0;

  for (let page = options.startPage; page <= options.endPage; page++) {
    const url = buildIndexUrl(indexUrl, {
      page,
      startDate: options.startDate,
      endDate: options.endDate,
      rubric: options.rubric,
    });

    const stubs = filterArticlesByAccess(await scrapeIndexPage(url, page, options.articlePerPage, ctx));
    pagesProcessed++;

    if (options.extractContent) {
      articles.push(...(await extractContentForArticles(stubs, options.useAuth, ctx)));
    } else {
      articles.push(...stubs.map((stub) => stubToArticle(stub)));
    }

    if (page < options.endPage) {
      logger.info({ delaySeconds: options.delaySeconds }, 'Waiting before next request');
      await delay(options.delaySeconds * 1000);
    }
  }

  return { articles, pagesProcessed };
}

/**
 * Full index run: collect, then write to the target chosen up front
 */
export async function runIndexScrape(
  options: ScrapingOptions,
  ctx: PipelineContext
): Promise<IndexScrapeResult> {
  const { logger, now = () => new Date() } = ctx;
  const startTime = Date.now();

  logger.info({ options }, 'Starting index scrape');

  const { articles, pagesProcessed } = await collectIndexArticles(options, ctx);

  const writtenAt = now();
  const target = resolveIndexOutputTarget(options, ctx.outputDir, writtenAt);
  const outputPath = await writeIndexOutput(articles, options, target, { logger, now: writtenAt });

  logger.info(
    { pagesProcessed, articles: articles.length, outputPath, durationMs: Date.now() - startTime },
    'Index scrape completed'
  );

  return { articles, pagesProcessed, outputPath };
}

/**
 * Extract and save one article. A missing article is an error for this run.
 */
export async function runArticleExtraction(
  url: string,
  options: ArticleRunOptions,
  ctx: PipelineContext
): Promise<ArticleRunResult> {
  const { logger, now = () => new Date() } = ctx;

  const extraction = await extractArticleContent(url, options.useAuth ?? false, ctx);
  if (extraction.status === 'not_found') {
    throw new ArticleNotFoundError(url, extraction.reason);
  }

  const outputPath = resolveArticleOutputPath(ctx.outputDir, options.outputName, now());
  await writeArticleOutput(extraction.article, outputPath, { logger });

  return { article: extraction.article, outputPath };
}
