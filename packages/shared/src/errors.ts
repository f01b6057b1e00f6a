export type FetchErrorKind =
  | "transient_network"
  | "rate_limited"
  | "server_error"
  | "client_error"
  | "retries_exhausted"
  | "malformed_response"
  | "item_fetch_failed";

/** Kinds the retry executor will try again. */
export const RETRYABLE_KINDS: ReadonlySet<FetchErrorKind> = new Set([
  "transient_network",
  "rate_limited",
  "server_error",
]);

export interface FetchErrorDetails {
  status?: number | null;
  body?: string | null;
  attempts?: number;
  /** For retries_exhausted and item_fetch_failed: the condition underneath. */
  lastKind?: FetchErrorKind | null;
  cause?: unknown;
}

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly status: number | null;
  readonly body: string | null;
  readonly attempts: number;
  readonly lastKind: FetchErrorKind | null;

  constructor(kind: FetchErrorKind, message: string, details: FetchErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "FetchError";
    this.kind = kind;
    this.status = details.status ?? null;
    this.body = details.body ?? null;
    this.attempts = details.attempts ?? 0;
    this.lastKind = details.lastKind ?? null;
  }
}

export class CorruptCheckpointError extends Error {
  constructor(
    public readonly path: string,
    reason: string,
  ) {
    super(`Checkpoint ${path} is corrupt: ${reason}`);
    this.name = "CorruptCheckpointError";
  }
}

export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
