import { closeSync, existsSync, fsyncSync, mkdirSync, openSync, readFileSync, renameSync, writeSync } from "node:fs";
import { dirname, resolve } from "node:path";

import { CorruptCheckpointError, createLogger } from "@issuecorpus/shared";

const log = createLogger({ component: "checkpoint" });

export interface CheckpointFile {
  outputPath: string;
  processed: string[];
  updatedAt: string;
}

export function defaultCheckpointPath(outputPath: string): string {
  return `${outputPath}.checkpoint.json`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Accepts the current shape ({ outputPath, processed, updatedAt }) and the
 * older flat map of issue key -> true.
 */
export function parseCheckpoint(text: string, path: string, outputPath: string): Set<string> {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (err) {
    throw new CorruptCheckpointError(path, `invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }

  if (!isRecord(payload)) {
    throw new CorruptCheckpointError(path, "expected a JSON object");
  }

  if ("processed" in payload) {
    const { processed } = payload;
    if (!Array.isArray(processed) || !processed.every((k): k is string => typeof k === "string")) {
      throw new CorruptCheckpointError(path, '"processed" must be an array of strings');
    }
    if (payload.outputPath !== undefined) {
      if (typeof payload.outputPath !== "string") {
        throw new CorruptCheckpointError(path, '"outputPath" must be a string');
      }
      if (resolve(payload.outputPath) !== resolve(outputPath)) {
        throw new CorruptCheckpointError(path, `recorded for output ${payload.outputPath}, not ${outputPath}`);
      }
    }
    return new Set(processed);
  }

  const keys = new Set<string>();
  for (const [key, value] of Object.entries(payload)) {
    if (typeof value !== "boolean") {
      throw new CorruptCheckpointError(path, `unexpected value for key ${key}`);
    }
    if (value) keys.add(key);
  }
  return keys;
}

/**
 * Durable set of issue keys already written to one output file. Every
 * insertion is flushed to disk (temp file, fsync, rename) before
 * markProcessed returns.
 */
export class CheckpointStore {
  private constructor(
    readonly path: string,
    readonly outputPath: string,
    private readonly processed: Set<string>,
  ) {}

  /** Missing file = empty set. Unreadable or mismatched file throws CorruptCheckpointError. */
  static load(path: string, outputPath: string): CheckpointStore {
    if (!existsSync(path)) {
      log.info({ path }, "No checkpoint found, starting fresh");
      return new CheckpointStore(path, outputPath, new Set());
    }
    const processed = parseCheckpoint(readFileSync(path, "utf8"), path, outputPath);
    log.info({ path, processed: processed.size }, "Loaded checkpoint");
    return new CheckpointStore(path, outputPath, processed);
  }

  get size(): number {
    return this.processed.size;
  }

  has(issueKey: string): boolean {
    return this.processed.has(issueKey);
  }

  keys(): string[] {
    return Array.from(this.processed);
  }

  /** Returns false (and writes nothing) when the key was already recorded. */
  markProcessed(issueKey: string): boolean {
    if (this.processed.has(issueKey)) return false;
    this.processed.add(issueKey);
    try {
      this.persist();
    } catch (err) {
      this.processed.delete(issueKey);
      throw err;
    }
    return true;
  }

  private persist(): void {
    const file: CheckpointFile = {
      outputPath: this.outputPath,
      processed: Array.from(this.processed),
      updatedAt: new Date().toISOString(),
    };
    mkdirSync(dirname(resolve(this.path)), { recursive: true });

    const tmpPath = `${this.path}.${process.pid}.tmp`;
    const fd = openSync(tmpPath, "w");
    try {
      writeSync(fd, JSON.stringify(file));
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tmpPath, this.path);
  }
}
