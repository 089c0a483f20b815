/**
 * Error taxonomy for the SPL scraper.
 * Everything thrown by lib/spl is a ScraperError so the entry point can
 * report it with a single handler.
 */

export class ScraperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The request never produced a response (DNS, reset, timeout). */
export class NetworkError extends ScraperError {
  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The server answered with a non-2xx status. */
export class HttpError extends ScraperError {
  constructor(
    readonly status: number,
    readonly url: string,
    statusText = ''
  ) {
    super(`HTTP ${status}${statusText ? `: ${statusText}` : ''} (${url})`);
  }
}

export class ParseError extends ScraperError {}

export class FileWriteError extends ScraperError {
  constructor(
    readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to write ${filePath}${reason}`, options);
  }
}

export class UsageError extends ScraperError {}
