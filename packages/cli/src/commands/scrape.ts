import { getConnector, isValidProjectKey, normalizeProjectKey } from "@issuecorpus/connectors";
import { scrapeProjects, type ScrapeRunResult } from "@issuecorpus/pipeline";
import { CorruptCheckpointError, createLogger, loadScraperEnv } from "@issuecorpus/shared";

import { renderRunSummary } from "../ui/render";

const log = createLogger({ component: "cli" });

export interface ScrapeOptions {
  projects: string[];
  output: string;
  checkpoint: string | null;
  maxIssues: number | null;
  pageSize: number | null;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function splitCsv(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  const parsed = value && /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new UsageError(`Invalid ${flag} (expected a positive integer)`);
  }
  return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (!value || value.startsWith("--") || value.trim().length === 0) {
    throw new UsageError(`Missing ${flag} value`);
  }
  return value.trim();
}

/**
 * --projects takes every following token up to the next flag; each token may
 * itself be a comma-separated list. Keys are upper-cased and deduplicated in
 * first-seen order.
 */
export function parseScrapeArgs(args: string[]): ScrapeOptions {
  const projects: string[] = [];
  let output: string | null = null;
  let checkpoint: string | null = null;
  let maxIssues: number | null = null;
  let pageSize: number | null = null;

  for (let i = 0; i < args.length; i += 1) {
    const a = args[i];
    if (a === "--projects") {
      let consumed = 0;
      while (i + 1 < args.length && !args[i + 1].startsWith("--")) {
        projects.push(...splitCsv(args[i + 1]));
        i += 1;
        consumed += 1;
      }
      if (consumed === 0) throw new UsageError("Missing --projects value (expected one or more project keys)");
      continue;
    }
    if (a === "--output") {
      output = requireValue(a, args[i + 1]);
      i += 1;
      continue;
    }
    if (a === "--checkpoint") {
      checkpoint = requireValue(a, args[i + 1]);
      i += 1;
      continue;
    }
    if (a === "--max-issues") {
      maxIssues = parsePositiveInt(a, args[i + 1]);
      i += 1;
      continue;
    }
    if (a === "--page-size") {
      pageSize = parsePositiveInt(a, args[i + 1]);
      if (pageSize > 100) throw new UsageError("Invalid --page-size (maximum is 100)");
      i += 1;
      continue;
    }
    if (a === "--help" || a === "-h") {
      throw new UsageError("help");
    }
    throw new UsageError(`Unknown argument: ${a}`);
  }

  const keys = Array.from(new Set(projects.map(normalizeProjectKey)));
  const invalid = keys.find((k) => !isValidProjectKey(k));
  if (invalid !== undefined) {
    throw new UsageError(`Invalid project key: ${invalid} (expected letters, digits and underscores)`);
  }
  if (keys.length === 0) throw new UsageError("--projects is required");
  if (!output) throw new UsageError("--output is required");

  return { projects: keys, output, checkpoint, maxIssues, pageSize };
}

export function printScrapeUsage(): void {
  console.log("Usage:");
  console.log(
    "  scrape --projects <KEY> [<KEY>...] --output <file.jsonl> [--checkpoint <file.json>] [--max-issues N] [--page-size N]",
  );
  console.log("");
  console.log("Example:");
  console.log("  npm run scrape -- scrape --projects SPARK HADOOP --output data/issues.jsonl --max-issues 50");
}

/** 0 = every project completed, 1 = at least one project failed. */
export function exitCodeFor(result: ScrapeRunResult): number {
  return result.totals.failedProjects > 0 ? 1 : 0;
}

export async function scrapeCommand(args: string[] = []): Promise<void> {
  let opts: ScrapeOptions;
  try {
    opts = parseScrapeArgs(args);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    if (err.message === "help") {
      printScrapeUsage();
      return;
    }
    console.error(err.message);
    console.log("");
    printScrapeUsage();
    process.exitCode = 1;
    return;
  }

  const env = loadScraperEnv();
  const connector = getConnector("jira");
  if (!connector) {
    throw new Error('No connector registered for source type "jira"');
  }

  try {
    const result = await scrapeProjects({
      projects: opts.projects,
      source: connector.createSource(env),
      normalize: connector.normalize,
      outputPath: opts.output,
      checkpointPath: opts.checkpoint ?? undefined,
      maxIssues: opts.maxIssues,
      pageSize: opts.pageSize ?? env.defaultPageSize,
    });
    renderRunSummary(result);
    process.exitCode = exitCodeFor(result);
  } catch (err) {
    if (err instanceof CorruptCheckpointError) {
      log.fatal({ path: err.path }, err.message);
      process.exitCode = 2;
      return;
    }
    throw err;
  }
}
