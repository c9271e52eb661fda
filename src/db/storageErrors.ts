import { CrawlerError, errorMessage, isCrawlerError } from "../errors";

/** Runs a store operation, reporting any driver failure as STORAGE_ERROR. */
export async function withStorageErrors<T>(
  operation: string,
  details: Record<string, unknown>,
  work: () => Promise<T>
): Promise<T> {
  try {
    return await work();
  } catch (error) {
    if (isCrawlerError(error)) throw error;
    throw new CrawlerError("STORAGE_ERROR", `${operation} failed: ${errorMessage(error)}`, {
      cause: error,
      details
    });
  }
}
