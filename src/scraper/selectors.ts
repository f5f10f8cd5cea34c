/**
 * Markup selectors for the news site
 *
 * Class selectors match the whole class attribute, so a container only
 * matches when its class list is exactly the one below.
 */

export const LISTING_SELECTORS = {
  container: 'div[class="flex flex-col divide-y divide-neutral-500"]',
  item: 'div',
  figure: 'figure',
  figcaption: 'figcaption',
  paragraph: 'p',
  link: 'a',
  premiumMarker: 'span[class="inline-flex bg-primary-main p-[1.7px] rounded-[1px]"]',
} as const;

export const ARTICLE_SELECTORS = {
  container: 'article[class="grow space-y-6 overflow-x-clip z-10"]',
  title: 'title',
  publishedTimeMeta: 'meta[property="article:published_time"]',
  publishDateMeta: 'meta[name="publish-date"]',
  authorMeta: 'meta[name="author"]',
  contentWrapper: 'div#content-wrapper',
  paragraph: 'p',
  tagsContainer: 'div#article-tags',
  tagLink: 'a',
  image: 'img',
  premiumMarker: 'span[class="inline-flex bg-primary-main p-[1.7px] rounded-[1px]"]',
} as const;

/** Paragraphs starting with this are "editor's pick" callouts, not body text */
export const EDITOR_PICK_MARKER = 'Pilihan Editor:';

/** House advertising logo shown inside articles */
export const ADS_LOGO_SRC = '/img/logo-tempo-ads.svg';
