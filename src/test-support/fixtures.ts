/**
 * Shared test fixtures: markup builders and an in-memory PageFetcher
 */

import { createLogger } from '../utils/logger.js';
import { createCheerioParser } from '../scraper/parser.js';
import type { FetchResult, PageFetcher, ScraperContext } from '../scraper/types.js';
import type { ArticleContent, ScrapingOptions } from '../types/index.js';

export const SITE_URL = 'https://www.tempo.co';
export const INDEX_URL = `${SITE_URL}/indeks`;

export const silentLogger = createLogger({ level: 'silent' });

const PREMIUM_MARKER = '<span class="inline-flex bg-primary-main p-[1.7px] rounded-[1px]"><svg></svg></span>';

export interface ListingItemFixture {
  href: string;
  title: string;
  premium?: boolean;
}

export function listingItem({ href, title, premium = false }: ListingItemFixture): string {
  return (
    '<div><figure><img src="/thumb.jpg" alt="">' +
    `<figcaption><p><a href="${href}">${title} ${premium ? PREMIUM_MARKER : ''}</a></p></figcaption>` +
    '</figure></div>'
  );
}

export function listingPage(items: string[]): string {
  return (
    '<html><head><title>Indeks</title></head><body><main>' +
    `<div class="flex flex-col divide-y divide-neutral-500">${items.join('')}</div>` +
    '</main></body></html>'
  );
}

export interface ArticleFixture {
  title?: string;
  publishedTime?: string;
  publishDate?: string;
  author?: string;
  paragraphs?: string[];
  tags?: string[];
  images?: Array<{ src: string; alt?: string }>;
  premium?: boolean;
}

export function articlePage(fixture: ArticleFixture = {}): string {
  const {
    title = 'Judul Artikel | tempo.co',
    publishedTime,
    publishDate,
    author,
    paragraphs = [],
    tags = [],
    images = [],
    premium = false,
  } = fixture;

  const meta = [
    publishedTime === undefined ? '' : `<meta property="article:published_time" content="${publishedTime}">`,
    publishDate === undefined ? '' : `<meta name="publish-date" content="${publishDate}">`,
    author === undefined ? '' : `<meta name="author" content="${author}">`,
  ].join('');

  const imgs = images
    .map(({ src, alt }) => (alt === undefined ? `<img src="${src}">` : `<img src="${src}" alt="${alt}">`))
    .join('');

  return (
    `<html><head><title>${title}</title>${meta}</head><body>` +
    '<article class="grow space-y-6 overflow-x-clip z-10">' +
    (premium ? PREMIUM_MARKER : '') +
    imgs +
    `<div id="content-wrapper">${paragraphs.map((p) => `<p>${p}</p>`).join('')}</div>` +
    `<div id="article-tags">${tags.map((t) => `<a href="/tag/x">${t}</a>`).join('')}</div>` +
    '</article></body></html>'
  );
}

/**
 * PageFetcher serving canned responses; unknown URLs answer 404
 */
export class FakeFetcher implements PageFetcher {
  readonly requests: Array<{ url: string; useCredential: boolean }> = [];
  private readonly pages = new Map<string, FetchResult>();

  page(url: string, html: string, status = 200): this {
    this.pages.set(url, { html, ok: status >= 200 && status < 300, status });
    return this;
  }

  async fetchPage(url: string, useCredential: boolean): Promise<FetchResult> {
    this.requests.push({ url, useCredential });
    return this.pages.get(url) ?? { html: 'Not Found', ok: false, status: 404 };
  }
}

export function createTestContext(fetcher: PageFetcher): ScraperContext {
  return {
    fetcher,
    parser: createCheerioParser(SITE_URL),
    logger: silentLogger,
    siteUrl: SITE_URL,
  };
}

export function scrapingOptions(overrides: Partial<ScrapingOptions> = {}): ScrapingOptions {
  return {
    startPage: 1,
    endPage: 1,
    articlePerPage: 20,
    delaySeconds: 0,
    extractContent: false,
    categorize: false,
    singleFile: false,
    useAuth: false,
    ...overrides,
  };
}

export function article(url: string, category: string, overrides: Partial<ArticleContent> = {}): ArticleContent {
  return {
    metadata: {
      url,
      title: `Judul ${url}`,
      category,
      isFree: true,
      publicationDateRaw: '',
      publicationDate: '',
      publicationTime: '',
      timezone: '',
      author: '',
    },
    content: [],
    tags: [],
    images: [],
    ...overrides,
  };
}
