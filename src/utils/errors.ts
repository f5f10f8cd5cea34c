/**
 * Raised for bad user input, before any network activity
 */
export class ValidationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(problems.join('; '));
    this.name = 'ValidationError';
    this.problems = problems;
  }
}

/**
 * Raised when a single-article run finds nothing to save
 */
export class ArticleNotFoundError extends Error {
  readonly url: string;

  constructor(url: string, reason: string) {
    super(`Article not found (${reason}): ${url}`);
    this.name = 'ArticleNotFoundError';
    this.url = url;
  }
}
