/**
 * Command line parsing
 *
 * Usage:
 *   indeks-scraper indeks [--start-page N] [--end-page N] [--delay N] ...
 *   indeks-scraper article --url URL [--output-name NAME] [--use-auth]
 *   indeks-scraper markdown <input-dir> <output-dir>
 */

import { z } from 'zod';
import { ValidationError } from './utils/errors.js';
import { parseScrapingOptions } from './utils/validators.js';
import type { ScrapingOptions } from './types/index.js';

export type CliCommand =
  | { command: 'help' }
  | { command: 'indeks'; options: ScrapingOptions }
  | { command: 'article'; url: string; outputName?: string; useAuth: boolean }
  | { command: 'markdown'; inputDir: string; outputDir: string };

export const USAGE = `Usage: indeks-scraper <command> [options]

Commands:
  indeks      Scrape article index pages
  article     Extract content from a single article
  markdown    Convert a categorized JSON bundle to Markdown files

indeks options:
  --start-page N          Starting page number (default: 1)
  --end-page N            Ending page number (default: 3)
  --delay N               Delay between pages in seconds (default: 1)
  --start-date YYYY-MM-DD Start date
  --end-date YYYY-MM-DD   End date
  --article-per-page N    Maximum articles per page (default: 20)
  --extract-content       Extract full content for each article
  --rubric SLUG           Rubric to filter by (overrides dates)
  --categorize            Split output by category into a directory
  --single-file           With --categorize, write one grouped document instead
  --use-auth              Send the session cookie when fetching articles
  --output-name NAME      Output name without extension

article options:
  --url URL               Article URL (required)
  --output-name NAME      Output name without extension
  --use-auth              Send the session cookie

markdown arguments:
  <input-dir>             Directory written by "indeks --categorize"
  <output-dir>            Directory for the Markdown files
`;

interface FlagSpec {
  values: readonly string[];
  booleans: readonly string[];
}

interface ParsedFlags {
  values: Map<string, string>;
  booleans: Set<string>;
  positionals: string[];
}

const INDEKS_FLAGS: FlagSpec = {
  values: ['start-page', 'end-page', 'delay', 'start-date', 'end-date', 'article-per-page', 'rubric', 'output-name'],
  booleans: ['extract-content', 'categorize', 'single-file', 'use-auth'],
};

const ARTICLE_FLAGS: FlagSpec = {
  values: ['url', 'output-name'],
  booleans: ['use-auth'],
};

const MARKDOWN_FLAGS: FlagSpec = { values: [], booleans: [] };

/**
 * Accepts `--name value`, `--name=value` and bare boolean `--flag`
 */
function parseFlags(args: readonly string[], spec: FlagSpec): ParsedFlags {
  const parsed: ParsedFlags = { values: new Map(), booleans: new Set(), positionals: [] };
  const problems: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (!arg.startsWith('--')) {
      parsed.positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

    if (spec.booleans.includes(name)) {
      if (eq !== -1) {
        problems.push(`--${name} does not take a value`);
      }
      parsed.booleans.add(name);
    } else if (spec.values.includes(name)) {
      const value = eq === -1 ? args[++i] : arg.slice(eq + 1);
      if (value === undefined || (eq === -1 && value.startsWith('--'))) {
        problems.push(`--${name} requires a value`);
        continue;
      }
      parsed.values.set(name, value);
    } else {
      problems.push(`Unknown option: --${name}`);
    }
  }

  if (problems.length > 0) {
    throw new ValidationError(problems);
  }

  return parsed;
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

const articleArgsSchema = z.object({
  url: z.string({ required_error: '--url is required' }).url('--url must be an absolute URL'),
});

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;

  if (command === undefined || command === '--help' || command === '-h' || command === 'help') {
    return { command: 'help' };
  }

  switch (command) {
    case 'indeks': {
      const flags = parseFlags(rest, INDEKS_FLAGS);
      if (flags.positionals.length > 0) {
        throw new ValidationError([`Unexpected argument: ${flags.positionals[0]}`]);
      }

      const options = parseScrapingOptions({
        startPage: toNumber(flags.values.get('start-page')),
        endPage: toNumber(flags.values.get('end-page')),
        delaySeconds: toNumber(flags.values.get('delay')),
        articlePerPage: toNumber(flags.values.get('article-per-page')),
        startDate: flags.values.get('start-date'),
        endDate: flags.values.get('end-date'),
        rubric: flags.values.get('rubric'),
        outputName: flags.values.get('output-name'),
        extractContent: flags.booleans.has('extract-content'),
        categorize: flags.booleans.has('categorize'),
        singleFile: flags.booleans.has('single-file'),
        useAuth: flags.booleans.has('use-auth'),
      });

      return { command: 'indeks', options };
    }

    case 'article': {
      const flags = parseFlags(rest, ARTICLE_FLAGS);
      const result = articleArgsSchema.safeParse({ url: flags.values.get('url') });
      if (!result.success) {
        throw new ValidationError(result.error.issues.map((issue) => issue.message));
      }

      return {
        command: 'article',
        url: result.data.url,
        outputName: flags.values.get('output-name'),
        useAuth: flags.booleans.has('use-auth'),
      };
    }

    case 'markdown': {
      const { positionals } = parseFlags(rest, MARKDOWN_FLAGS);
      const [inputDir, outputDir] = positionals;
      if (inputDir === undefined || outputDir === undefined || positionals.length > 2) {
        throw new ValidationError(['markdown expects <input-dir> <output-dir>']);
      }
      return { command: 'markdown', inputDir, outputDir };
    }

    default:
      throw new ValidationError([`Unknown command: ${command}`]);
  }
}
