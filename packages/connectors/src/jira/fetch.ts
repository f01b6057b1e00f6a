import {
  FetchError,
  type FetchRequest,
  type HttpTransport,
  type IssueSource,
  type RawIssueSummary,
  type ScraperEnv,
} from "@issuecorpus/shared";

import { createFetchTransport, type FetchLike } from "../http/transport";
import { RetryExecutor } from "../http/retry";
import { DETAIL_FIELDS, type JiraClientConfig, projectJql, SEARCH_FIELDS } from "./config";
import { PaginatedFetcher } from "./paginate";

export interface JiraClientOptions extends JiraClientConfig {
  transport: HttpTransport;
  executor: RetryExecutor;
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (value && typeof value === "object" && !Array.isArray(value)) return value as Record<string, unknown>;
  return null;
}

/**
 * Read-only client for the Jira REST API (v2). No auth: public projects only.
 */
export class JiraClient implements IssueSource {
  private readonly baseUrl: string;
  private readonly transport: HttpTransport;
  private readonly executor: RetryExecutor;

  constructor(options: JiraClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.transport = options.transport;
    this.executor = options.executor;
  }

  searchRequest(projectKey: string, startAt: number, maxResults: number): FetchRequest {
    return {
      endpoint: `${this.baseUrl}/search`,
      params: { jql: projectJql(projectKey), startAt, maxResults },
      fields: SEARCH_FIELDS,
    };
  }

  detailRequest(issueKey: string): FetchRequest {
    return {
      endpoint: `${this.baseUrl}/issue/${encodeURIComponent(issueKey)}`,
      params: { expand: "comments" },
      fields: DETAIL_FIELDS,
    };
  }

  /** A fresh fetcher per call, so each listing starts at offset 0. */
  listProjectIssues(projectKey: string, pageSize: number): AsyncGenerator<RawIssueSummary, void, undefined> {
    const fetcher = new PaginatedFetcher({
      executor: this.executor,
      transport: this.transport,
      buildRequest: (key, offset, size) => this.searchRequest(key, offset, size),
    });
    return fetcher.fetchAll(projectKey, pageSize);
  }

  /**
   * Full issue including comments. Every failure surfaces as an
   * item_fetch_failed FetchError whose lastKind names the underlying cause.
   */
  async fetchIssueDetail(issueKey: string): Promise<Record<string, unknown>> {
    const request = this.detailRequest(issueKey);
    const result = await this.executor.execute(() => this.transport(request), `issue ${issueKey}`);
    if (!result.ok) {
      throw new FetchError("item_fetch_failed", `Failed to fetch details for issue ${issueKey}: ${result.error.message}`, {
        status: result.error.status,
        body: result.error.body,
        attempts: result.error.attempts,
        lastKind: result.error.kind,
        cause: result.error,
      });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(result.response.body);
    } catch (err) {
      throw new FetchError("item_fetch_failed", `Issue ${issueKey} detail is not JSON`, {
        status: result.response.status,
        body: result.response.body,
        attempts: result.attempts,
        lastKind: "malformed_response",
        cause: err,
      });
    }

    const obj = asRecord(payload);
    if (!obj) {
      throw new FetchError("item_fetch_failed", `Issue ${issueKey} detail is not an object`, {
        status: result.response.status,
        body: result.response.body,
        attempts: result.attempts,
        lastKind: "malformed_response",
      });
    }
    return obj;
  }
}

export interface JiraClientOverrides {
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

export function createJiraClient(env: ScraperEnv, overrides: JiraClientOverrides = {}): JiraClient {
  return new JiraClient({
    baseUrl: env.jiraBaseUrl,
    transport: createFetchTransport({
      userAgent: env.userAgent,
      timeoutMs: env.httpTimeoutMs,
      fetchImpl: overrides.fetchImpl,
    }),
    executor: new RetryExecutor({ policy: env.retry, sleep: overrides.sleep }),
  });
}
