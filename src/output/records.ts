/**
 * Persisted JSON shapes
 *
 * Field names here are what downstream tooling reads; keep them stable.
 */

import { z } from 'zod';
import type { ArticleContent, ScrapingOptions } from '../types/index.js';

export const imageRecordSchema = z.object({
  src: z.string(),
  alt: z.string(),
});

export const articleSummaryRecordSchema = z.object({
  url: z.string(),
  title: z.string(),
  category: z.string(),
  is_free: z.boolean(),
});

export const articleMetadataRecordSchema = articleSummaryRecordSchema.extend({
  publication_date_raw: z.string().default(''),
  publication_date: z.string().default(''),
  publication_time: z.string().default(''),
  timezone: z.string().default(''),
  author: z.string().default(''),
});

export const articleRecordSchema = z.object({
  metadata: articleMetadataRecordSchema,
  content: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
  images: z.array(imageRecordSchema).default([]),
});

export type ArticleSummaryRecord = z.infer<typeof articleSummaryRecordSchema>;
export type ArticleRecord = z.infer<typeof articleRecordSchema>;

export interface ScrapingOptionsRecord {
  extract_content: boolean;
  start_page: number;
  end_page: number;
  start_date: string;
  end_date: string;
  rubric: string;
  article_per_page: number;
  categorize: boolean;
}

export interface IndexMetadata {
  type: 'index';
  timestamp: string;
  scraping_options: ScrapingOptionsRecord;
  total_articles: number;
  categories?: Record<string, number>;
}

export function toArticleRecord(article: ArticleContent): ArticleRecord {
  const { metadata } = article;
  return {
    metadata: {
      url: metadata.url,
      title: metadata.title,
      category: metadata.category,
      is_free: metadata.isFree,
      publication_date_raw: metadata.publicationDateRaw,
      publication_date: metadata.publicationDate,
      publication_time: metadata.publicationTime,
      timezone: metadata.timezone,
      author: metadata.author,
    },
    content: [...article.content],
    tags: [...article.tags],
    images: article.images.map(({ src, alt }) => ({ src, alt })),
  };
}

export function toSummaryRecord(article: ArticleContent): ArticleSummaryRecord {
  const { url, title, category, isFree } = article.metadata;
  return { url, title, category, is_free: isFree };
}

export function toScrapingOptionsRecord(options: ScrapingOptions): ScrapingOptionsRecord {
  return {
    extract_content: options.extractContent,
    start_page: options.startPage,
    end_page: options.endPage,
    start_date: options.startDate ?? '',
    end_date: options.endDate ?? '',
    rubric: options.rubric ?? '',
    article_per_page: options.articlePerPage,
    categorize: options.categorize,
  };
}
