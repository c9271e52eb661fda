export type CrawlerErrorCode =
  | "PARSE_FAILED"
  | "STORAGE_ERROR"
  | "CONFIG_ERROR";

export interface CrawlerErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

/**
 * Error with a `code` callers can branch on. Rate limiting and fetch failures
 * are ordinary results of the fetch engine and never surface as errors.
 */
export class CrawlerError extends Error {
  readonly code: CrawlerErrorCode;
  readonly details: Record<string, unknown> | undefined;

  constructor(code: CrawlerErrorCode, message: string, options: CrawlerErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CrawlerError";
    this.code = code;
    this.details = options.details;
  }
}

export function isCrawlerError(err: unknown): err is CrawlerError {
  return err instanceof CrawlerError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
