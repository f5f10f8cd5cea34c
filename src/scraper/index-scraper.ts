/**
 * Index page scraper
 *
 * Fetches one listing page and returns its article stubs
 */

import { LISTING_SELECTORS } from './selectors.js';
import type { ArticleStub } from '../types/index.js';
import type { ScraperContext } from './types.js';

/**
 * Scrape a single listing page. Fetch failures and a missing listing
 * container are logged and yield an empty list.
 */
export async function scrapeIndexPage(
  url: string,
  pageNum: number,
  articlePerPage: number,
  ctx: ScraperContext
): Promise<ArticleStub[]> {
  const { fetcher, parser, logger } = ctx;

  logger.info({ url, page: pageNum }, 'Fetching index page');

  const result = await fetcher.fetchPage(url, false);
  if (!result.ok) {
    logger.error({ url, page: pageNum, status: result.status }, 'Error fetching index page');
    return [];
  }

  const listing = parser.parseListing(result.html, articlePerPage);
  if (!listing.containerFound) {
    logger.warn(
      { page: pageNum, selector: LISTING_SELECTORS.container },
      'Listing container not found'
    );
    return [];
  }

  logger.info(
    { page: pageNum, found: listing.stubs.length, limit: articlePerPage },
    'Found articles on page'
  );

  return listing.stubs;
}
