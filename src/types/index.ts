/**
 * Core types for the index scraper
 */

/**
 * Lightweight article reference taken from one listing page
 */
export interface ArticleStub {
  readonly url: string;
  readonly title: string;
  readonly category: string;
  readonly isFree: boolean;
}

export interface ArticleImage {
  src: string;
  alt: string;
}

export interface ArticleMetadata {
  url: string;
  title: string;
  category: string;
  isFree: boolean;
  /** Timestamp exactly as the page carries it */
  publicationDateRaw: string;
  /** `YYYY-MM-DD`, or empty */
  publicationDate: string;
  /** `HH:MM:00`, or empty */
  publicationTime: string;
  /** Raw zone token such as `WIB`, or empty */
  timezone: string;
  author: string;
}

export interface ArticleContent {
  metadata: ArticleMetadata;
  content: string[];
  tags: string[];
  images: ArticleImage[];
}

export interface PublicationDateTime {
  date: string;
  time: string;
  timezone: string;
}

/**
 * Validated run configuration for an index scrape
 */
export interface ScrapingOptions {
  readonly startPage: number;
  readonly endPage: number;
  readonly articlePerPage: number;
  readonly startDate?: string;
  readonly endDate?: string;
  readonly rubric?: string;
  readonly delaySeconds: number;
  readonly extractContent: boolean;
  readonly categorize: boolean;
  /** Categorized output as one document instead of a directory bundle */
  readonly singleFile: boolean;
  readonly useAuth: boolean;
  readonly outputName?: string;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}
