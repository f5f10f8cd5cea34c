/**
 * Article Content Extractor
 *
 * Fetches one article page and parses it into full content
 */

import type { ArticleExtraction, ScraperContext } from './types.js';

export async function extractArticleContent(
  url: string,
  useCredential: boolean,
  ctx: ScraperContext
): Promise<ArticleExtraction> {
  const { fetcher, parser, logger } = ctx;

  logger.info({ url }, 'Fetching article');

  const result = await fetcher.fetchPage(url, useCredential);
  if (!result.ok) {
    logger.error({ url, status: result.status }, 'Error fetching article');
    return { status: 'not_found', reason: 'transport', httpStatus: result.status };
  }

  const article = parser.parseArticle(result.html, url);
  if (!article) {
    logger.warn({ url }, 'Article element not found');
    return { status: 'not_found', reason: 'structure', httpStatus: result.status };
  }

  logger.debug(
    { url, paragraphs: article.content.length, tags: article.tags.length, images: article.images.length },
    'Article extracted'
  );

  return { status: 'found', article };
}
