export interface HttpGetRequest {
  url: string;
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface HttpResponse {
  statusCode: number;
  /** Case-insensitive header lookup. */
  header(name: string): string | null;
  body: string;
}

export interface HttpClient {
  /** Rejects on transport errors and timeouts; resolves for every HTTP status. */
  get(request: HttpGetRequest): Promise<HttpResponse>;
}

export class HttpTimeoutError extends Error {
  constructor(readonly url: string, readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "HttpTimeoutError";
  }
}

/** Global fetch with an abort-based timeout covering headers and body. */
export class FetchHttpClient implements HttpClient {
  async get(request: HttpGetRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: "GET",
        headers: request.headers,
        signal: controller.signal,
        redirect: "follow"
      });
      const body = await response.text();
      return {
        statusCode: response.status,
        header: (name) => response.headers.get(name),
        body
      };
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new HttpTimeoutError(request.url, request.timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
