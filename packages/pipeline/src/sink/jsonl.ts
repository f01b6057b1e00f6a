import { closeSync, fstatSync, fsyncSync, ftruncateSync, mkdirSync, openSync, readSync, writeSync } from "node:fs";
import { dirname, resolve } from "node:path";

import { createLogger } from "@issuecorpus/shared";

const log = createLogger({ component: "sink" });

const TAIL_CHUNK_BYTES = 64 * 1024;
const NEWLINE = 0x0a;

/**
 * Byte length of the file up to and including its last newline (0 if none).
 */
function completeLength(fd: number, size: number): number {
  const buf = Buffer.alloc(TAIL_CHUNK_BYTES);
  let end = size;
  while (end > 0) {
    const start = Math.max(0, end - TAIL_CHUNK_BYTES);
    const length = end - start;
    readSync(fd, buf, 0, length, start);
    const idx = buf.subarray(0, length).lastIndexOf(NEWLINE);
    if (idx !== -1) return start + idx + 1;
    end = start;
  }
  return 0;
}

/**
 * Drop a trailing line with no newline, left behind by a crash mid-write.
 * Returns the number of bytes removed.
 */
export function repairTrailingPartialLine(fd: number): number {
  const size = fstatSync(fd).size;
  if (size === 0) return 0;
  const keep = completeLength(fd, size);
  if (keep === size) return 0;
  ftruncateSync(fd, keep);
  return size - keep;
}

/**
 * Append-only JSONL file. Each record is written as one buffer holding the
 * full line and its newline, then fsynced.
 */
export class JsonlSink {
  private fd: number | null;
  private written = 0;

  private constructor(
    readonly path: string,
    fd: number,
  ) {
    this.fd = fd;
  }

  static open(path: string): JsonlSink {
    mkdirSync(dirname(resolve(path)), { recursive: true });
    const fd = openSync(path, "a+");
    const removed = repairTrailingPartialLine(fd);
    if (removed > 0) {
      log.warn({ path, bytes: removed }, "Truncated partial trailing line");
    }
    return new JsonlSink(path, fd);
  }

  get linesWritten(): number {
    return this.written;
  }

  append(record: unknown): void {
    if (this.fd === null) {
      throw new Error(`JsonlSink ${this.path} is closed`);
    }
    const line = Buffer.from(`${JSON.stringify(record)}\n`, "utf8");
    let offset = 0;
    while (offset < line.length) {
      offset += writeSync(this.fd, line, offset, line.length - offset);
    }
    fsyncSync(this.fd);
    this.written += 1;
  }

  close(): void {
    if (this.fd === null) return;
    closeSync(this.fd);
    this.fd = null;
  }
}
