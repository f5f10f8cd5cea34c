/**
 * Scraper Types
 */

import type { Logger } from 'pino';
import type { ArticleContent, ArticleStub } from '../types/index.js';

export interface FetchResult {
  html: string;
  /** True for a 2xx response */
  ok: boolean;
  /** Last HTTP status seen, 0 when no response arrived */
  status: number;
}

/**
 * Fetches raw markup. Retries are the implementation's business.
 */
export interface PageFetcher {
  fetchPage(url: string, useCredential: boolean): Promise<FetchResult>;
}

export interface ListingPage {
  /** False when the listing container is missing from the markup */
  containerFound: boolean;
  stubs: ArticleStub[];
}

/**
 * Turns fetched markup into records; the HTML library stays behind this
 */
export interface MarkupParser {
  /** Up to `limit` stubs in document order */
  parseListing(html: string, limit: number): ListingPage;
  /** Null when the page has no article container */
  parseArticle(html: string, url: string): ArticleContent | null;
}

/**
 * Collaborators every scraping step needs
 */
export interface ScraperContext {
  fetcher: PageFetcher;
  parser: MarkupParser;
  logger: Logger;
  siteUrl: string;
}

/**
 * Outcome of extracting one article. Both miss reasons reach callers as the
 * same "not found" outcome; the reason is kept for logging.
 */
export type ArticleExtraction =
  | { status: 'found'; article: ArticleContent }
  | { status: 'not_found'; reason: 'structure' | 'transport'; httpStatus?: number };
