import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { createJiraClient, normalizeJiraIssue } from "@issuecorpus/connectors";
import {
  CorruptCheckpointError,
  FetchError,
  type IssueSource,
  type NormalizedIssue,
  type RawIssueSummary,
  type ScraperEnv,
} from "@issuecorpus/shared";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CheckpointStore } from "../checkpoint/store";
import { type NormalizeFn, scrapeProjects } from "./scrape";

interface FakeSourceOptions {
  /** Detail fetches that throw item_fetch_failed. */
  failingDetails?: string[];
  /** Project key -> number of summaries yielded before the listing fails. */
  failingListings?: Record<string, number>;
}

class FakeSource implements IssueSource {
  readonly listCalls: string[] = [];
  readonly detailCalls: string[] = [];

  constructor(
    private readonly listings: Record<string, string[]>,
    private readonly options: FakeSourceOptions = {},
  ) {}

  async *listProjectIssues(projectKey: string): AsyncGenerator<RawIssueSummary, void, undefined> {
    this.listCalls.push(projectKey);
    const failAfter = this.options.failingListings?.[projectKey];
    const keys = this.listings[projectKey] ?? [];
    for (const [index, key] of keys.entries()) {
      if (failAfter === index) {
        throw new FetchError("retries_exhausted", `search ${projectKey}@${index} failed after 5 attempts (last: HTTP 503)`, {
          status: 503,
          lastKind: "server_error",
        });
      }
      yield { key, raw: { key } };
    }
  }

  async fetchIssueDetail(issueKey: string): Promise<Record<string, unknown>> {
    this.detailCalls.push(issueKey);
    if (this.options.failingDetails?.includes(issueKey)) {
      throw new FetchError("item_fetch_failed", `Failed to fetch details for issue ${issueKey}`, {
        lastKind: "retries_exhausted",
      });
    }
    return { key: issueKey, fields: { summary: `Summary of ${issueKey}` } };
  }
}

const normalize: NormalizeFn = (raw, context) => normalizeJiraIssue(raw, context);

function issueKeys(count: number, project: string): string[] {
  return Array.from({ length: count }, (_, i) => `${project}-${i + 1}`);
}

function readOutput(path: string): NormalizedIssue[] {
  return readFileSync(path, "utf8")
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line) => JSON.parse(line));
}

describe("scrapeProjects", () => {
  let dir: string;
  let outputPath: string;
  let checkpointPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "issuecorpus-scrape-"));
    outputPath = join(dir, "issues.jsonl");
    checkpointPath = `${outputPath}.checkpoint.json`;
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("emits only the issues missing from the checkpoint", async () => {
    const seed = CheckpointStore.load(checkpointPath, outputPath);
    seed.markProcessed("ABC-1");
    seed.markProcessed("ABC-2");
    const source = new FakeSource({ ABC: ["ABC-1", "ABC-2", "ABC-3"] });

    const result = await scrapeProjects({ projects: ["ABC"], source, normalize, outputPath, pageSize: 50 });

    expect(source.detailCalls).toEqual(["ABC-3"]);
    expect(readOutput(outputPath).map((r) => r.issue_key)).toEqual(["ABC-3"]);
    expect(CheckpointStore.load(checkpointPath, outputPath).keys()).toEqual(["ABC-1", "ABC-2", "ABC-3"]);
    expect(result.perProject).toEqual([
      { project: "ABC", status: "done", listed: 3, emitted: 1, skipped: 2, failed: 0 },
    ]);
    expect(result.checkpointPath).toBe(checkpointPath);
  });

  it("emits nothing when rerun over unchanged data", async () => {
    const listings = { ABC: ["ABC-1", "ABC-2"] };
    await scrapeProjects({ projects: ["ABC"], source: new FakeSource(listings), normalize, outputPath, pageSize: 50 });

    const rerunSource = new FakeSource(listings);
    const rerun = await scrapeProjects({ projects: ["ABC"], source: rerunSource, normalize, outputPath, pageSize: 50 });

    expect(rerun.totals.emitted).toBe(0);
    expect(rerun.totals.skipped).toBe(2);
    expect(rerunSource.detailCalls).toEqual([]);
    expect(readOutput(outputPath)).toHaveLength(2);
  });

  it("stops the whole run once maxIssues records are emitted", async () => {
    const source = new FakeSource({ ABC: issueKeys(5, "ABC"), XYZ: issueKeys(5, "XYZ") });

    const result = await scrapeProjects({
      projects: ["ABC", "XYZ"],
      source,
      normalize,
      outputPath,
      pageSize: 50,
      maxIssues: 2,
    });

    expect(result.state).toBe("done");
    expect(result.stoppedByBudget).toBe(true);
    expect(result.totals.emitted).toBe(2);
    expect(result.perProject).toEqual([
      { project: "ABC", status: "stopped", listed: 2, emitted: 2, skipped: 0, failed: 0 },
      { project: "XYZ", status: "skipped", listed: 0, emitted: 0, skipped: 0, failed: 0 },
    ]);
    expect(source.listCalls).toEqual(["ABC"]);
    expect(source.detailCalls).toEqual(["ABC-1", "ABC-2"]);
  });

  it("carries the budget across projects", async () => {
    const source = new FakeSource({ ABC: issueKeys(5, "ABC"), XYZ: issueKeys(5, "XYZ") });

    const result = await scrapeProjects({
      projects: ["ABC", "XYZ"],
      source,
      normalize,
      outputPath,
      pageSize: 50,
      maxIssues: 6,
    });

    expect(result.perProject.map((p) => [p.project, p.status, p.emitted])).toEqual([
      ["ABC", "done", 5],
      ["XYZ", "stopped", 1],
    ]);
  });

  it("skips every project when maxIssues is 0", async () => {
    const source = new FakeSource({ ABC: issueKeys(2, "ABC") });

    const result = await scrapeProjects({ projects: ["ABC"], source, normalize, outputPath, pageSize: 50, maxIssues: 0 });

    expect(result.perProject[0].status).toBe("skipped");
    expect(source.listCalls).toEqual([]);
  });

  it("rejects a negative maxIssues", async () => {
    const source = new FakeSource({});

    await expect(
      scrapeProjects({ projects: ["ABC"], source, normalize, outputPath, pageSize: 50, maxIssues: -1 }),
    ).rejects.toThrow(RangeError);
  });

  it("aborts on a corrupt checkpoint before any network call", async () => {
    writeFileSync(checkpointPath, "{not json");
    const source = new FakeSource({ ABC: issueKeys(2, "ABC") });

    await expect(
      scrapeProjects({ projects: ["ABC"], source, normalize, outputPath, pageSize: 50 }),
    ).rejects.toBeInstanceOf(CorruptCheckpointError);
    expect(source.listCalls).toEqual([]);
    expect(existsSync(outputPath)).toBe(false);
  });

  it("marks a project failed when its listing fails and moves on", async () => {
    const source = new FakeSource(
      { ABC: issueKeys(3, "ABC"), XYZ: issueKeys(1, "XYZ") },
      { failingListings: { ABC: 1 } },
    );

    const result = await scrapeProjects({ projects: ["ABC", "XYZ"], source, normalize, outputPath, pageSize: 50 });

    expect(result.perProject).toEqual([
      {
        project: "ABC",
        status: "failed",
        listed: 1,
        emitted: 1,
        skipped: 0,
        failed: 0,
        error: { kind: "retries_exhausted", message: "search ABC@1 failed after 5 attempts (last: HTTP 503)" },
      },
      { project: "XYZ", status: "done", listed: 1, emitted: 1, skipped: 0, failed: 0 },
    ]);
    expect(result.totals.failedProjects).toBe(1);
    expect(readOutput(outputPath).map((r) => r.issue_key)).toEqual(["ABC-1", "XYZ-1"]);
  });

  it("leaves failed items out of the checkpoint so the next run retries them", async () => {
    const listings = { ABC: issueKeys(3, "ABC") };
    const first = await scrapeProjects({
      projects: ["ABC"],
      source: new FakeSource(listings, { failingDetails: ["ABC-2"] }),
      normalize,
      outputPath,
      pageSize: 50,
    });

    expect(first.perProject[0]).toEqual({ project: "ABC", status: "done", listed: 3, emitted: 2, skipped: 0, failed: 1 });
    expect(CheckpointStore.load(checkpointPath, outputPath).has("ABC-2")).toBe(false);

    const retrySource = new FakeSource(listings);
    const second = await scrapeProjects({ projects: ["ABC"], source: retrySource, normalize, outputPath, pageSize: 50 });

    expect(retrySource.detailCalls).toEqual(["ABC-2"]);
    expect(second.totals.emitted).toBe(1);
    expect(readOutput(outputPath).map((r) => r.issue_key)).toEqual(["ABC-1", "ABC-3", "ABC-2"]);
  });

  it("lets errors other than FetchError abort the run", async () => {
    const source = new FakeSource({ ABC: issueKeys(1, "ABC") });
    const broken: IssueSource = {
      listProjectIssues: () => ({
        [Symbol.asyncIterator]: () => ({
          next: () => Promise.reject(new Error("listing bug")),
        }),
      }),
      fetchIssueDetail: (key) => source.fetchIssueDetail(key),
    };

    await expect(
      scrapeProjects({ projects: ["ABC"], source: broken, normalize, outputPath, pageSize: 50 }),
    ).rejects.toThrow("listing bug");
  });

  it("scrapes through the Jira client end to end", async () => {
    const keys = ["ABC-1", "ABC-2", "ABC-3"];
    const sleeps: number[] = [];
    let detailTwoCalls = 0;
    const env: ScraperEnv = {
      jiraBaseUrl: "https://jira.test/rest/api/2",
      userAgent: "corpus-test",
      httpTimeoutMs: 1000,
      retry: { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 60_000 },
      defaultPageSize: 2,
    };
    const source = createJiraClient(env, {
      fetchImpl: async (url) => {
        const parsed = new URL(url);
        if (parsed.pathname === "/rest/api/2/search") {
          const startAt = Number(parsed.searchParams.get("startAt"));
          const maxResults = Number(parsed.searchParams.get("maxResults"));
          const page = keys.slice(startAt, startAt + maxResults).map((key) => ({ key }));
          return new Response(JSON.stringify({ issues: page, total: keys.length }), { status: 200 });
        }
        const key = decodeURIComponent(parsed.pathname.split("/").pop() ?? "");
        if (key === "ABC-2" && detailTwoCalls++ === 0) {
          return new Response("Service Unavailable", { status: 503 });
        }
        return new Response(
          JSON.stringify({
            key,
            fields: {
              summary: `Title ${key}`,
              project: { key: "ABC" },
              issuetype: { name: "Bug" },
              description: `Description of ${key}`,
              comment: { comments: [{ body: "Confirmed." }] },
            },
          }),
          { status: 200 },
        );
      },
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    const result = await scrapeProjects({ projects: ["ABC"], source, normalize, outputPath, pageSize: 2 });

    expect(result.totals).toEqual({ projects: 1, failedProjects: 0, listed: 3, emitted: 3, skipped: 0, failed: 0 });
    expect(sleeps).toEqual([1000]);
    const records = readOutput(outputPath);
    expect(records.map((r) => r.issue_key)).toEqual(keys);
    expect(records[1]).toMatchObject({
      title: "Title ABC-2",
      project: "ABC",
      issue_type: "Bug",
      description: "Description of ABC-2",
      comments: ["Confirmed."],
    });
    expect(records[1].tasks[0]).toEqual({
      task: "summarisation",
      input: "Description of ABC-2",
      output: "Description of ABC-2\nConfirmed.",
    });
  });
});
