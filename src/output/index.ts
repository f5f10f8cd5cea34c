/**
 * Output Module
 *
 * JSON writer for live runs and the Markdown projector for saved bundles
 */

export {
  resolveIndexOutputTarget,
  resolveArticleOutputPath,
  writeIndexOutput,
  writeArticleOutput,
  buildIndexMetadata,
  groupByCategory,
  formatFileTimestamp,
  formatMetadataTimestamp,
  type OutputTarget,
  type WriterContext,
} from './json-writer.js';

export {
  convertBundleToMarkdown,
  convertCategoryFile,
  createMarkdownContent,
  formatMarkdownMetadata,
  sanitizeFilename,
  type MarkdownContext,
} from './markdown.js';

export type { ArticleRecord, ArticleSummaryRecord, IndexMetadata, ScrapingOptionsRecord } from './records.js';
