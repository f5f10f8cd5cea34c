#!/usr/bin/env node
/**
 * Index Scraper
 *
 * Fetches a news site's article index and articles into JSON, and converts
 * saved categorized output to Markdown.
 *
 * Usage:
 *   node dist/index.js indeks --start-page 1 --end-page 3 --extract-content
 *   node dist/index.js article --url https://www.tempo.co/politik/some-article
 *   node dist/index.js markdown data/output/indeks_20250912_152200 data/markdown
 */

import { config } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { ArticleNotFoundError, ValidationError } from './utils/errors.js';
import { parseCliArgs, USAGE, type CliCommand } from './cli.js';
import { runArticleExtraction, runIndexScrape, type PipelineContext } from './pipeline.js';
import { HttpClient, createCheerioParser } from './scraper/index.js';
import { convertBundleToMarkdown } from './output/index.js';

const logger = createLogger({
  level: config.logging.level,
  pretty: config.logging.pretty,
  file: config.logging.file,
});

function createPipelineContext(): PipelineContext {
  return {
    logger,
    siteUrl: config.site.url,
    indexUrl: config.site.indexUrl,
    outputDir: config.output.dir,
    fetcher: new HttpClient({
      logger,
      userAgent: config.http.userAgent,
      timeoutMs: config.http.timeoutMs,
      sessionCookie: config.http.sessionCookie,
      retry: config.retry,
    }),
    parser: createCheerioParser(config.site.url),
  };
}

async function execute(command: Exclude<CliCommand, { command: 'help' }>): Promise<void> {
  switch (command.command) {
    case 'indeks': {
      const result = await runIndexScrape(command.options, createPipelineContext());
      logger.info({ output: result.outputPath }, 'Index scraping completed');
      break;
    }

    case 'article': {
      const result = await runArticleExtraction(
        command.url,
        { useAuth: command.useAuth, outputName: command.outputName },
        createPipelineContext()
      );
      logger.info({ output: result.outputPath }, 'Article extraction completed');
      break;
    }

    case 'markdown': {
      const total = await convertBundleToMarkdown(command.inputDir, command.outputDir, {
        logger,
        siteUrl: config.site.url,
      });
      logger.info({ total, output: command.outputDir }, 'Markdown conversion completed');
      break;
    }
  }
}

async function main(): Promise<void> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ValidationError) {
      for (const problem of error.problems) {
        logger.error(problem);
      }
      process.stderr.write(`\n${USAGE}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  if (command.command === 'help') {
    process.stdout.write(USAGE);
    return;
  }

  logger.info({ env: config.app.env, command: command.command }, 'Starting application');
  await execute(command);
}

main().catch((error: unknown) => {
  if (error instanceof ArticleNotFoundError) {
    logger.error({ url: error.url }, error.message);
  } else {
    logger.fatal({ error }, 'Application failed');
  }
  process.exitCode = 1;
});
