import {
  createLogger,
  errorMessage,
  FetchError,
  type FetchErrorKind,
  type HttpResponse,
  RETRYABLE_KINDS,
} from "@issuecorpus/shared";

const log = createLogger({ component: "retry" });

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
};

export interface RetryExecutorOptions {
  policy?: Partial<RetryPolicy>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export type ExecuteResult =
  | { ok: true; response: HttpResponse; attempts: number }
  | { ok: false; error: FetchError };

type AttemptFailure = {
  kind: FetchErrorKind;
  status: number | null;
  body: string | null;
  cause?: unknown;
};

// setTimeout fires almost at once for anything above a signed 32-bit delay.
const MAX_TIMER_MS = 2 ** 31 - 1;

export async function sleepMs(ms: number): Promise<void> {
  let remaining = ms;
  while (remaining > 0) {
    const chunk = Math.min(remaining, MAX_TIMER_MS);
    await new Promise<void>((resolve) => setTimeout(resolve, chunk));
    remaining -= chunk;
  }
}

function snippet(body: string): string {
  return body.slice(0, 500);
}

/** Exponential delay for a 1-indexed attempt, capped at maxDelayMs. */
export function backoffDelayMs(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/**
 * Retry-After as milliseconds: delta-seconds ("5", "1.5") or an IMF-fixdate
 * ("Thu, 01 Jan 2026 00:00:30 GMT"). Returns null when absent or in any other
 * form.
 */
export function parseRetryAfterMs(value: string | null, nowMs: number): number | null {
  if (value === null) return null;
  const trimmed = value.trim();
  if (trimmed.length === 0) return null;

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number.parseFloat(trimmed) * 1000);
  }

  const dateMs = Date.parse(trimmed);
  if (Number.isNaN(dateMs) || new Date(dateMs).toUTCString() !== trimmed) return null;
  return Math.max(0, dateMs - nowMs);
}

export function classifyStatus(status: number): FetchErrorKind | "ok" {
  if (status >= 200 && status < 300) return "ok";
  if (status === 429) return "rate_limited";
  if (status >= 500 && status < 600) return "server_error";
  return "client_error";
}

/**
 * Runs one HTTP call with bounded retries. Transport failures, 429 and 5xx
 * are retried; any other non-2xx fails on the spot.
 */
export class RetryExecutor {
  readonly policy: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: RetryExecutorOptions = {}) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.policy };
    if (!Number.isInteger(this.policy.maxAttempts) || this.policy.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.policy.maxAttempts}`);
    }
    this.sleep = options.sleep ?? sleepMs;
    this.now = options.now ?? Date.now;
  }

  async execute(requestFn: () => Promise<HttpResponse>, label = "request"): Promise<ExecuteResult> {
    const { maxAttempts } = this.policy;
    let last: AttemptFailure | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      let response: HttpResponse;
      try {
        response = await requestFn();
      } catch (err) {
        last = { kind: "transient_network", status: null, body: null, cause: err };
        if (attempt < maxAttempts) {
          await this.wait(attempt, last, backoffDelayMs(attempt, this.policy), label, errorMessage(err));
        }
        continue;
      }

      const kind = classifyStatus(response.status);
      if (kind === "ok") {
        return { ok: true, response, attempts: attempt };
      }

      if (!RETRYABLE_KINDS.has(kind)) {
        return {
          ok: false,
          error: new FetchError(
            "client_error",
            `${label} failed with HTTP ${response.status}: ${snippet(response.body)}`,
            { status: response.status, body: response.body, attempts: attempt },
          ),
        };
      }

      last = { kind, status: response.status, body: response.body };
      if (attempt < maxAttempts) {
        const retryAfterMs =
          kind === "rate_limited" ? parseRetryAfterMs(response.headers.get("retry-after"), this.now()) : null;
        const delayMs = retryAfterMs ?? backoffDelayMs(attempt, this.policy);
        await this.wait(attempt, last, delayMs, label, `HTTP ${response.status}`);
      }
    }

    const lastKind = last?.kind ?? null;
    const lastStatus = last?.status ?? null;
    const condition = lastStatus !== null ? `HTTP ${lastStatus}` : (lastKind ?? "unknown");
    log.error({ label, attempts: maxAttempts, lastKind, status: lastStatus }, "Max retries exceeded");
    return {
      ok: false,
      error: new FetchError("retries_exhausted", `${label} failed after ${maxAttempts} attempts (last: ${condition})`, {
        status: lastStatus,
        body: last?.body ?? null,
        attempts: maxAttempts,
        lastKind,
        cause: last?.cause,
      }),
    };
  }

  private async wait(
    attempt: number,
    failure: AttemptFailure,
    delayMs: number,
    label: string,
    reason: string,
  ): Promise<void> {
    log.warn(
      { label, attempt, maxAttempts: this.policy.maxAttempts, kind: failure.kind, delayMs },
      `${reason}; retrying in ${delayMs}ms`,
    );
    await this.sleep(delayMs);
  }
}
