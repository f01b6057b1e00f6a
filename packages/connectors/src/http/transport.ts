import type { FetchRequest, HttpResponse, HttpTransport } from "@issuecorpus/shared";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface FetchTransportOptions {
  userAgent: string;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export function buildRequestUrl(request: FetchRequest): string {
  const url = new URL(request.endpoint);
  for (const [key, value] of Object.entries(request.params)) {
    url.searchParams.set(key, String(value));
  }
  if (request.fields && request.fields.length > 0) {
    url.searchParams.set("fields", request.fields.join(","));
  }
  return url.toString();
}

/**
 * One GET per call, bounded by timeoutMs. Every HTTP status comes back as a
 * response; timeouts and network failures throw.
 */
export function createFetchTransport(options: FetchTransportOptions): HttpTransport {
  const fetchImpl: FetchLike = options.fetchImpl ?? fetch;

  return async (request) => {
    const url = buildRequestUrl(request);
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      const res = await fetchImpl(url, {
        method: "GET",
        headers: {
          "user-agent": options.userAgent,
          accept: "application/json",
        },
        signal: controller.signal,
      });
      const body = await res.text();
      const response: HttpResponse = { status: res.status, headers: res.headers, body };
      return response;
    } catch (err) {
      if (controller.signal.aborted) {
        throw new TimeoutError(`GET ${url}`, options.timeoutMs);
      }
      throw err;
    } finally {
      clearTimeout(timeoutId);
    }
  };
}
