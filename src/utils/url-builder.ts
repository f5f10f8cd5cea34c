/**
 * Listing URL construction
 */

import { shiftIsoDate } from './date-parser.js';

export interface IndexUrlParams {
  page: number;
  startDate?: string;
  endDate?: string;
  rubric?: string;
}

/**
 * Build a listing page URL. A rubric filter wins over dates; a single date is
 * widened to a one-day window. The rubric is passed through unescaped.
 */
export function buildIndexUrl(indexUrl: string, params: IndexUrlParams): string {
  const { page, startDate, endDate, rubric } = params;
  let url = `${indexUrl}?page=${page}`;

  if (rubric) {
    url += `&category=rubrik&rubric_slug=${rubric}`;
  } else if (startDate && endDate) {
    url += `&category=date&start_date=${startDate}&end_date=${endDate}`;
  } else if (startDate) {
    url += `&category=date&start_date=${startDate}&end_date=${shiftIsoDate(startDate, 1)}`;
  } else if (endDate) {
    url += `&category=date&start_date=${shiftIsoDate(endDate, -1)}&end_date=${endDate}`;
  }

  return url;
}

/** Category used when a URL path has no segments */
export const DEFAULT_CATEGORY = 'indeks';

/**
 * Prefix root-relative URLs with the site origin; anything else is returned as is
 */
export function toAbsoluteUrl(url: string, siteUrl: string): string {
  if (url.startsWith('/')) {
    return siteUrl.replace(/\/+$/, '') + url;
  }
  return url;
}

/**
 * First non-empty path segment of an article URL
 */
export function categoryFromUrl(url: string, siteUrl: string): string {
  let pathname: string;
  try {
    pathname = new URL(toAbsoluteUrl(url, siteUrl), siteUrl).pathname;
  } catch {
    return DEFAULT_CATEGORY;
  }

  return pathname.split('/').find((segment) => segment.length > 0) ?? DEFAULT_CATEGORY;
}
