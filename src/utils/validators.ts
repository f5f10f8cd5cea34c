/**
 * Input validation for scrape runs
 *
 * Everything here runs before the first request goes out.
 */

import { z } from 'zod';
import type { ScrapingOptions } from '../types/index.js';
import { isValidIsoDate, shiftIsoDate } from './date-parser.js';
import { ValidationError } from './errors.js';

export const MAX_PAGE_SPREAD = 50;

export type ValidationResult = { valid: true } | { valid: false; message: string };

const VALID: ValidationResult = { valid: true };

export function validateDateFormat(value: string | undefined, label: string): ValidationResult {
  if (value === undefined || isValidIsoDate(value)) {
    return VALID;
  }
  return { valid: false, message: `${label} must be in YYYY-MM-DD format` };
}

export function validateDateRange(startDate?: string, endDate?: string): ValidationResult {
  if (startDate && endDate && startDate > endDate) {
    return { valid: false, message: 'start-date cannot be later than end-date' };
  }
  return VALID;
}

export function validatePageRange(startPage: number, endPage: number): ValidationResult {
  if (startPage < 1) {
    return { valid: false, message: 'start-page must be at least 1' };
  }
  if (endPage < startPage) {
    return { valid: false, message: 'end-page cannot be lower than start-page' };
  }
  if (endPage - startPage > MAX_PAGE_SPREAD) {
    return {
      valid: false,
      message: `Page range spans more than ${MAX_PAGE_SPREAD} pages; limit the scrape to be respectful to the server`,
    };
  }
  return VALID;
}

/**
 * Fill in a missing date so a lone start or end date becomes a one-day window
 */
export function processDates(
  startDate?: string,
  endDate?: string
): { startDate?: string; endDate?: string } {
  if (startDate && !endDate) {
    return { startDate, endDate: shiftIsoDate(startDate, 1) };
  }
  if (endDate && !startDate) {
    return { startDate: shiftIsoDate(endDate, -1), endDate };
  }
  return { startDate, endDate };
}

const isoDate = (label: string) =>
  z
    .string()
    .optional()
    .superRefine((value, ctx) => {
      const format = validateDateFormat(value, label);
      if (!format.valid) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: format.message });
      }
    });

const integer = (label: string, min: number) =>
  z
    .number({ invalid_type_error: `${label} must be a number` })
    .int(`${label} must be an integer`)
    .min(min, `${label} must be at least ${min}`);

export const scrapingOptionsSchema = z
  .object({
    startPage: integer('start-page', 1).default(1),
    endPage: integer('end-page', 1).default(3),
    articlePerPage: integer('article-per-page', 1).default(20),
    delaySeconds: z
      .number({ invalid_type_error: 'delay must be a number' })
      .min(0, 'delay cannot be negative')
      .default(1),
    startDate: isoDate('start-date'),
    endDate: isoDate('end-date'),
    rubric: z.string().min(1, 'rubric cannot be empty').optional(),
    extractContent: z.boolean().default(false),
    categorize: z.boolean().default(false),
    singleFile: z.boolean().default(false),
    useAuth: z.boolean().default(false),
    outputName: z.string().min(1, 'output-name cannot be empty').optional(),
  })
  .superRefine((options, ctx) => {
    const pages = validatePageRange(options.startPage, options.endPage);
    if (!pages.valid) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: pages.message, path: ['endPage'] });
    }

    const dates = validateDateRange(options.startDate, options.endDate);
    if (!dates.valid) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: dates.message, path: ['startDate'] });
    }
  });

export type ScrapingOptionsInput = z.input<typeof scrapingOptionsSchema>;

/**
 * Validate raw run settings into frozen ScrapingOptions, reporting every
 * problem at once
 */
export function parseScrapingOptions(input: ScrapingOptionsInput): ScrapingOptions {
  const result = scrapingOptionsSchema.safeParse(input);

  if (!result.success) {
    throw new ValidationError(result.error.issues.map((issue) => issue.message));
  }

  const dates = processDates(result.data.startDate, result.data.endDate);
  return Object.freeze({ ...result.data, ...dates });
}
