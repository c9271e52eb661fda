import type { HttpClient, HttpGetRequest, HttpResponse } from "../../src/fetch/httpClient";

export interface ScriptedResponse {
  statusCode: number;
  headers?: Record<string, string>;
  body?: string;
}

export type ScriptedReply = ScriptedResponse | Error;

export function response(statusCode: number, body = "", headers: Record<string, string> = {}): ScriptedResponse {
  return { statusCode, body, headers };
}

function toHttpResponse(scripted: ScriptedResponse): HttpResponse {
  const headers = new Map(
    Object.entries(scripted.headers ?? {}).map(([name, value]): [string, string] => [name.toLowerCase(), value])
  );
  return {
    statusCode: scripted.statusCode,
    header: (name) => headers.get(name.toLowerCase()) ?? null,
    body: scripted.body ?? ""
  };
}

/** Replies from a per-URL queue; the last reply for a URL repeats once the queue is drained. */
export class FakeHttpClient implements HttpClient {
  readonly requests: HttpGetRequest[] = [];
  private readonly replies = new Map<string, ScriptedReply[]>();

  on(url: string, ...replies: ScriptedReply[]): this {
    this.replies.set(url, [...(this.replies.get(url) ?? []), ...replies]);
    return this;
  }

  callsTo(url: string): HttpGetRequest[] {
    return this.requests.filter((request) => request.url === url);
  }

  async get(request: HttpGetRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const queue = this.replies.get(request.url);
    if (!queue || queue.length === 0) {
      return toHttpResponse({ statusCode: 404, body: "not found" });
    }
    const reply = queue.length > 1 ? queue.shift() : queue[0];
    if (reply === undefined) {
      throw new Error(`no reply scripted for ${request.url}`);
    }
    if (reply instanceof Error) throw reply;
    return toHttpResponse(reply);
  }
}
