export interface RetryEnv {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface ScraperEnv {
  jiraBaseUrl: string;
  userAgent: string;

  httpTimeoutMs: number;
  retry: RetryEnv;

  defaultPageSize: number;
}

export const DEFAULT_JIRA_BASE_URL = "https://issues.apache.org/jira/rest/api/2";
export const DEFAULT_USER_AGENT = "issue-corpus/0.x (scraper)";

function parsePositiveIntEnv(name: string, value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim().length === 0) return defaultValue;
  const raw = value.trim();
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0 || String(parsed) !== raw) {
    throw new Error(`Invalid positive integer env var: ${name}=${raw}`);
  }
  return parsed;
}

function stripTrailingSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

export function loadScraperEnv(env: NodeJS.ProcessEnv = process.env): ScraperEnv {
  const baseUrlRaw = env.JIRA_BASE_URL?.trim();
  const jiraBaseUrl = stripTrailingSlash(baseUrlRaw && baseUrlRaw.length > 0 ? baseUrlRaw : DEFAULT_JIRA_BASE_URL);
  try {
    new URL(jiraBaseUrl);
  } catch {
    throw new Error(`Invalid URL env var: JIRA_BASE_URL=${jiraBaseUrl}`);
  }

  const retry: RetryEnv = {
    maxAttempts: parsePositiveIntEnv("RETRY_MAX_ATTEMPTS", env.RETRY_MAX_ATTEMPTS, 5),
    baseDelayMs: parsePositiveIntEnv("RETRY_BASE_DELAY_MS", env.RETRY_BASE_DELAY_MS, 1000),
    maxDelayMs: parsePositiveIntEnv("RETRY_MAX_DELAY_MS", env.RETRY_MAX_DELAY_MS, 60_000),
  };
  if (retry.maxDelayMs < retry.baseDelayMs) {
    throw new Error(
      `RETRY_MAX_DELAY_MS (${retry.maxDelayMs}) must not be below RETRY_BASE_DELAY_MS (${retry.baseDelayMs})`,
    );
  }

  return {
    jiraBaseUrl,
    userAgent: env.JIRA_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
    httpTimeoutMs: parsePositiveIntEnv("HTTP_TIMEOUT_MS", env.HTTP_TIMEOUT_MS, 30_000),
    retry,
    defaultPageSize: Math.min(100, parsePositiveIntEnv("DEFAULT_PAGE_SIZE", env.DEFAULT_PAGE_SIZE, 100)),
  };
}
