/**
 * Listing page parser
 *
 * Each listing item carries its link at container > div > figure >
 * figcaption > p > a. Items missing any step are skipped.
 */

import * as cheerio from 'cheerio';
import { categoryFromUrl } from '../utils/url-builder.js';
import { LISTING_SELECTORS } from './selectors.js';
import type { ArticleStub } from '../types/index.js';
import type { ListingPage } from './types.js';

export function parseListingHtml(html: string, limit: number, siteUrl: string): ListingPage {
  const $ = cheerio.load(html);
  const container = $(LISTING_SELECTORS.container).first();

  if (container.length === 0) {
    return { containerFound: false, stubs: [] };
  }

  const stubs: ArticleStub[] = [];

  for (const item of container.children(LISTING_SELECTORS.item).toArray()) {
    if (stubs.length >= limit) {
      break;
    }

    const link = $(item)
      .find(LISTING_SELECTORS.figure)
      .first()
      .find(LISTING_SELECTORS.figcaption)
      .first()
      .find(LISTING_SELECTORS.paragraph)
      .first()
      .find(LISTING_SELECTORS.link)
      .first();

    const href = link.attr('href');
    if (!href) {
      continue;
    }

    stubs.push({
      url: href,
      title: link.text().trim(),
      category: categoryFromUrl(href, siteUrl),
      // No premium marker means the article is free
      isFree: link.find(LISTING_SELECTORS.premiumMarker).length === 0,
    });
  }

  return { containerFound: true, stubs };
}
