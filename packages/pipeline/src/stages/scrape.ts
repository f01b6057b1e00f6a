import { randomUUID } from "node:crypto";

import {
  createRunLogger,
  errorMessage,
  type FetchErrorKind,
  isFetchError,
  type IssueSource,
  type NormalizedIssue,
} from "@issuecorpus/shared";

import { CheckpointStore, defaultCheckpointPath } from "../checkpoint/store";
import { JsonlSink } from "../sink/jsonl";

export type ScrapeState =
  | "starting"
  | "paging"
  | "fetching_detail"
  | "emitting"
  | "checkpointing"
  | "done"
  | "failed";

/**
 * done: listing exhausted. stopped: issue budget ran out inside this project.
 * skipped: budget ran out before this project started. failed: a page could
 * not be fetched.
 */
export type ProjectStatus = "done" | "stopped" | "skipped" | "failed";

export interface ProjectResult {
  project: string;
  status: ProjectStatus;
  /** Summaries pulled from the listing. */
  listed: number;
  emitted: number;
  /** Already in the checkpoint. */
  skipped: number;
  /** Detail fetch or normalization failed; not checkpointed. */
  failed: number;
  error?: { kind: FetchErrorKind; message: string };
}

export interface ScrapeRunResult {
  runId: string;
  state: "done";
  perProject: ProjectResult[];
  totals: {
    projects: number;
    failedProjects: number;
    listed: number;
    emitted: number;
    skipped: number;
    failed: number;
  };
  stoppedByBudget: boolean;
  checkpointPath: string;
}

export type NormalizeFn = (
  raw: Record<string, unknown>,
  context: { issueKey: string; projectKey: string },
) => NormalizedIssue;

export interface ScrapeParams {
  projects: string[];
  source: IssueSource;
  normalize: NormalizeFn;
  outputPath: string;
  checkpointPath?: string;
  /** Total records to emit across all projects; null/undefined = no cap. */
  maxIssues?: number | null;
  pageSize: number;
  runId?: string;
}

function emptyResult(project: string, status: ProjectStatus): ProjectResult {
  return { project, status, listed: 0, emitted: 0, skipped: 0, failed: 0 };
}

/**
 * Sequential scrape of every project into one JSONL file. The checkpoint is
 * loaded before any network call; a CorruptCheckpointError aborts the run.
 * Page failures end only their project. Item failures are counted and left
 * out of the checkpoint so a later run retries them.
 */
export async function scrapeProjects(params: ScrapeParams): Promise<ScrapeRunResult> {
  const runId = params.runId ?? randomUUID();
  const log = createRunLogger(runId);
  const checkpointPath = params.checkpointPath ?? defaultCheckpointPath(params.outputPath);

  const maxIssues = params.maxIssues ?? null;
  if (maxIssues !== null && (!Number.isInteger(maxIssues) || maxIssues < 0)) {
    throw new RangeError(`maxIssues must be a non-negative integer, got ${maxIssues}`);
  }

  let state: ScrapeState = "starting";
  const transition = (next: ScrapeState, context: Record<string, unknown>): void => {
    log.debug({ from: state, to: next, ...context }, "state");
    state = next;
  };

  const checkpoint = CheckpointStore.load(checkpointPath, params.outputPath);
  const sink = JsonlSink.open(params.outputPath);

  let remaining = maxIssues;
  let stoppedByBudget = false;
  const perProject: ProjectResult[] = [];

  try {
    for (const project of params.projects) {
      if (remaining === 0) {
        perProject.push(emptyResult(project, "skipped"));
        continue;
      }

      const result = emptyResult(project, "done");
      transition("paging", { project });
      log.info({ project }, "Scraping project");

      try {
        for await (const summary of params.source.listProjectIssues(project, params.pageSize)) {
          result.listed += 1;
          const issueKey = summary.key;

          transition("fetching_detail", { project, issueKey });
          if (checkpoint.has(issueKey)) {
            result.skipped += 1;
            transition("paging", { project });
            continue;
          }

          let record: NormalizedIssue;
          try {
            const detail = await params.source.fetchIssueDetail(issueKey);
            record = params.normalize(detail, { issueKey, projectKey: project });
          } catch (err) {
            result.failed += 1;
            log.error({ project, issueKey, err: errorMessage(err) }, "Skipping issue");
            transition("paging", { project });
            continue;
          }

          transition("emitting", { project, issueKey });
          sink.append(record);

          transition("checkpointing", { project, issueKey });
          checkpoint.markProcessed(issueKey);
          result.emitted += 1;
          log.info({ project, issueKey, emitted: result.emitted }, "Emitted issue");

          if (remaining !== null) {
            remaining -= 1;
            if (remaining === 0) {
              stoppedByBudget = true;
              result.status = "stopped";
              break;
            }
          }
          transition("paging", { project });
        }
      } catch (err) {
        if (!isFetchError(err)) throw err;
        transition("failed", { project, kind: err.kind });
        result.status = "failed";
        result.error = { kind: err.kind, message: err.message };
        log.error({ project, kind: err.kind, status: err.status, err: err.message }, "Project failed");
      }

      perProject.push(result);
      log.info(
        {
          project,
          status: result.status,
          listed: result.listed,
          emitted: result.emitted,
          skipped: result.skipped,
          failed: result.failed,
        },
        "Project finished",
      );
    }
  } finally {
    sink.close();
  }

  transition("done", {});

  const totals = {
    projects: perProject.length,
    failedProjects: perProject.filter((p) => p.status === "failed").length,
    listed: 0,
    emitted: 0,
    skipped: 0,
    failed: 0,
  };
  for (const p of perProject) {
    totals.listed += p.listed;
    totals.emitted += p.emitted;
    totals.skipped += p.skipped;
    totals.failed += p.failed;
  }

  return { runId, state: "done", perProject, totals, stoppedByBudget, checkpointPath };
}
