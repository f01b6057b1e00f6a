import {
  createLogger,
  FetchError,
  type FetchRequest,
  type HttpTransport,
  type PageResult,
  type RawIssueSummary,
} from "@issuecorpus/shared";

import type { RetryExecutor } from "../http/retry";
import { assertPageSize } from "./config";

const log = createLogger({ component: "paginate" });

export interface PaginatedFetcherOptions {
  executor: RetryExecutor;
  transport: HttpTransport;
  buildRequest: (projectKey: string, offset: number, pageSize: number) => FetchRequest;
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (value && typeof value === "object" && !Array.isArray(value)) return value as Record<string, unknown>;
  return null;
}

function asCount(value: unknown): number | null {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : null;
}

/**
 * Decode one search response. nextOffset advances by the number of issues the
 * server returned, including any entry we drop for lacking a key, and is null
 * once the page is empty or the reported total is reached.
 */
export function decodeSearchPage(body: string, offset: number): PageResult<RawIssueSummary> {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (err) {
    throw new FetchError("malformed_response", `Search response is not JSON: ${body.slice(0, 200)}`, {
      body,
      cause: err,
    });
  }

  const obj = asRecord(payload);
  if (!obj || !Array.isArray(obj.issues)) {
    throw new FetchError("malformed_response", "Search response has no issues array", { body });
  }

  const items: RawIssueSummary[] = [];
  for (const entry of obj.issues) {
    const raw = asRecord(entry);
    const key = raw && typeof raw.key === "string" && raw.key.length > 0 ? raw.key : null;
    if (!raw || !key) {
      log.debug({ offset }, "Skipping search entry without a key");
      continue;
    }
    items.push({ key, raw });
  }

  const total = asCount(obj.total);
  const returned = obj.issues.length;
  const next = offset + returned;
  const exhausted = returned === 0 || (total !== null && next >= total);

  return { items, total, nextOffset: exhausted ? null : next };
}

/**
 * Walks a project's listing page by page. Holds only its offset in memory, so
 * one instance serves one walk; build another to start over.
 */
export class PaginatedFetcher {
  private started = false;
  private offset = 0;

  constructor(private readonly options: PaginatedFetcherOptions) {}

  get currentOffset(): number {
    return this.offset;
  }

  fetchAll(projectKey: string, pageSize: number): AsyncGenerator<RawIssueSummary, void, undefined> {
    if (this.started) {
      throw new Error("PaginatedFetcher is not restartable; construct a new fetcher");
    }
    assertPageSize(pageSize);
    this.started = true;
    return this.pages(projectKey, pageSize);
  }

  private async *pages(projectKey: string, pageSize: number): AsyncGenerator<RawIssueSummary, void, undefined> {
    const { executor, transport, buildRequest } = this.options;

    for (;;) {
      const request = buildRequest(projectKey, this.offset, pageSize);
      const result = await executor.execute(() => transport(request), `search ${projectKey}@${this.offset}`);
      if (!result.ok) throw result.error;

      const page = decodeSearchPage(result.response.body, this.offset);
      log.info(
        { project: projectKey, offset: this.offset, returned: page.items.length, total: page.total },
        "Fetched page",
      );

      for (const item of page.items) {
        yield item;
      }

      if (page.nextOffset === null) return;
      this.offset = page.nextOffset;
    }
  }
}
