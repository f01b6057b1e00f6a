export type QueryValue = string | number;

/**
 * One GET against the tracker API. Treated as immutable once built.
 */
export interface FetchRequest {
  readonly endpoint: string;
  readonly params: Readonly<Record<string, QueryValue>>;
  readonly fields?: readonly string[];
}

/**
 * What a transport hands back for a single network call. Non-2xx statuses are
 * returned here, not thrown; only transport-level failures throw.
 */
export interface HttpResponse {
  status: number;
  headers: Headers;
  body: string;
}

export type HttpTransport = (request: FetchRequest) => Promise<HttpResponse>;

export interface PageResult<T> {
  items: T[];
  /** Server-reported total, or null when the response carries none. */
  total: number | null;
  /** Offset of the next page, or null once the listing is exhausted. */
  nextOffset: number | null;
}

export interface RawIssueSummary {
  key: string;
  raw: Record<string, unknown>;
}

/**
 * Read side of an issue tracker as the scrape stage sees it.
 */
export interface IssueSource {
  listProjectIssues(projectKey: string, pageSize: number): AsyncIterable<RawIssueSummary>;
  fetchIssueDetail(issueKey: string): Promise<Record<string, unknown>>;
}
