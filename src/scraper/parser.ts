import { parseArticleHtml } from './article-parser.js';
import { parseListingHtml } from './listing-parser.js';
import type { MarkupParser } from './types.js';

/**
 * MarkupParser backed by cheerio
 */
export function createCheerioParser(siteUrl: string): MarkupParser {
  return {
    parseListing: (html, limit) => parseListingHtml(html, limit, siteUrl),
    parseArticle: (html, url) => parseArticleHtml(html, url, siteUrl),
  };
}
