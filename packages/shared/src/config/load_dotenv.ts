import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import * as dotenv from "dotenv";

import { createLogger } from "../logging";

const log = createLogger({ component: "config" });

function isWorkspaceRoot(dir: string): boolean {
  const pkgPath = resolve(dir, "package.json");
  if (!existsSync(pkgPath)) return false;
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf8"));
    return typeof pkg === "object" && pkg !== null && "workspaces" in pkg;
  } catch {
    return false;
  }
}

/**
 * Walk up from startDir to the first directory holding a .env file or the
 * workspace root package.json. Falls back to startDir.
 */
export function findProjectRoot(startDir: string): string {
  let dir = resolve(startDir);
  for (;;) {
    if (existsSync(resolve(dir, ".env")) || isWorkspaceRoot(dir)) return dir;
    const parent = dirname(dir);
    if (parent === dir) return resolve(startDir);
    dir = parent;
  }
}

/**
 * Load .env then .env.local from the project root. Variables already set in
 * the process environment win; .env wins over .env.local for the same key.
 */
export function loadDotEnvIfPresent(cwd: string = process.cwd()): string[] {
  const projectRoot = findProjectRoot(cwd);
  const loaded: string[] = [];
  for (const filename of [".env", ".env.local"]) {
    const fullPath = resolve(projectRoot, filename);
    if (!existsSync(fullPath)) continue;
    const result = dotenv.config({ path: fullPath });
    if (result.error) {
      log.warn({ filename, err: result.error.message }, "Failed to read env file");
      continue;
    }
    loaded.push(fullPath);
  }
  return loaded;
}
