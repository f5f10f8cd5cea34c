/**
 * Access-tier handling
 *
 * Listing runs keep every stub. Only content extraction looks at the tier:
 * premium articles are fetched when the run is authenticated, otherwise they
 * get a sentinel paragraph instead of content.
 */

import { toAbsoluteUrl } from '../utils/url-builder.js';
import { extractArticleContent } from './article-extractor.js';
import type { ArticleContent, ArticleStub } from '../types/index.js';
import type { ScraperContext } from './types.js';

export const NON_FREE_SENTINEL =
  '[Content not available: Non-free article and no authentication provided]';

export const NOT_FOUND_SENTINEL =
  '[Content not available: Article structure not found (likely photo/video archive)]';

/**
 * Listing stage filter. Keeps every stub regardless of tier; callers wanting
 * only free articles filter the result themselves.
 */
export function filterArticlesByAccess(stubs: readonly ArticleStub[]): ArticleStub[] {
  return [...stubs];
}

export function canExtractContent(stub: ArticleStub, authenticated: boolean): boolean {
  return stub.isFree || authenticated;
}

/**
 * Article record for a stub whose content was not (or could not be) fetched
 */
export function stubToArticle(stub: ArticleStub, content: string[] = []): ArticleContent {
  return {
    metadata: {
      url: stub.url,
      title: stub.title,
      category: stub.category,
      isFree: stub.isFree,
      publicationDateRaw: '',
      publicationDate: '',
      publicationTime: '',
      timezone: '',
      author: '',
    },
    content,
    tags: [],
    images: [],
  };
}

/**
 * Extract full content for each stub in order, one request at a time
 */
export async function extractContentForArticles(
  stubs: readonly ArticleStub[],
  authenticated: boolean,
  ctx: ScraperContext
): Promise<ArticleContent[]> {
  const { logger, siteUrl } = ctx;
  const articles: ArticleContent[] = [];

  for (const [index, stub] of stubs.entries()) {
    logger.info(
      { article: index + 1, total: stubs.length, url: stub.url },
      'Extracting article content'
    );

    if (!canExtractContent(stub, authenticated)) {
      logger.info({ url: stub.url }, 'Article is not free and no authentication provided');
      articles.push(stubToArticle(stub, [NON_FREE_SENTINEL]));
      continue;
    }

    const extraction = await extractArticleContent(toAbsoluteUrl(stub.url, siteUrl), authenticated, ctx);

    if (extraction.status === 'found') {
      // The listing marker decides the tier for listed articles
      const { article } = extraction;
      articles.push({ ...article, metadata: { ...article.metadata, isFree: stub.isFree } });
    } else {
      logger.warn(
        { url: stub.url, reason: extraction.reason, status: extraction.httpStatus },
        'Failed to extract content (likely photo/video archive)'
      );
      articles.push(stubToArticle(stub, [NOT_FOUND_SENTINEL]));
    }
  }

  return articles;
}
