/**
 * Scraper Module
 *
 * Listing and article extraction behind the PageFetcher and MarkupParser seams
 */

// Listing pages
export { scrapeIndexPage } from './index-scraper.js';

// Article pages
export { extractArticleContent } from './article-extractor.js';

// Access tiers
export {
  filterArticlesByAccess,
  canExtractContent,
  extractContentForArticles,
  stubToArticle,
  NON_FREE_SENTINEL,
  NOT_FOUND_SENTINEL,
} from './access-filter.js';

// Transport and parsing
export { HttpClient, RETRY_STATUSES, type HttpClientOptions } from './http-client.js';
export { createCheerioParser } from './parser.js';

export type {
  ArticleExtraction,
  FetchResult,
  ListingPage,
  MarkupParser,
  PageFetcher,
  ScraperContext,
} from './types.js';
