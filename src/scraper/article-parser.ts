/**
 * Article page parser
 */

import * as cheerio from 'cheerio';
import { parsePublicationDateTime } from '../utils/date-parser.js';
import { categoryFromUrl } from '../utils/url-builder.js';
import { ADS_LOGO_SRC, ARTICLE_SELECTORS, EDITOR_PICK_MARKER } from './selectors.js';
import type { ArticleContent, ArticleImage } from '../types/index.js';

/**
 * Parse an article page fetched from `url`.
 * Returns null when the article container is absent (photo and video pages).
 */
export function parseArticleHtml(html: string, url: string, siteUrl: string): ArticleContent | null {
  const $ = cheerio.load(html);
  const article = $(ARTICLE_SELECTORS.container).first();

  if (article.length === 0) {
    return null;
  }

  const title = $(ARTICLE_SELECTORS.title).first().text().trim();

  // The first meta tag found wins, even if it has no content
  const publishedTime = $(ARTICLE_SELECTORS.publishedTimeMeta).first();
  const dateMeta = publishedTime.length > 0 ? publishedTime : $(ARTICLE_SELECTORS.publishDateMeta).first();
  const publicationDateRaw = dateMeta.attr('content') ?? '';
  const publication = parsePublicationDateTime(publicationDateRaw);

  const author = $(ARTICLE_SELECTORS.authorMeta).first().attr('content') ?? '';

  const content: string[] = [];
  for (const wrapper of article.find(ARTICLE_SELECTORS.contentWrapper).toArray()) {
    for (const paragraph of $(wrapper).find(ARTICLE_SELECTORS.paragraph).toArray()) {
      const text = $(paragraph).text().trim();
      if (text && !text.startsWith(EDITOR_PICK_MARKER)) {
        content.push(text);
      }
    }
  }

  const tags = article
    .find(ARTICLE_SELECTORS.tagsContainer)
    .first()
    .find(ARTICLE_SELECTORS.tagLink)
    .toArray()
    .map((tag) => $(tag).text().trim())
    .filter((tag) => tag.length > 0);

  const images: ArticleImage[] = [];
  for (const img of article.find(ARTICLE_SELECTORS.image).toArray()) {
    const src = $(img).attr('src') ?? '';
    if (src && src !== ADS_LOGO_SRC) {
      images.push({ src, alt: $(img).attr('alt') ?? '' });
    }
  }

  return {
    metadata: {
      url,
      title,
      category: categoryFromUrl(url, siteUrl),
      isFree: article.find(ARTICLE_SELECTORS.premiumMarker).length === 0,
      publicationDateRaw,
      publicationDate: publication.date,
      publicationTime: publication.time,
      timezone: publication.timezone,
      author,
    },
    content,
    tags,
    images,
  };
}
