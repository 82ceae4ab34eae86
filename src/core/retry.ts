import { TransientError } from "./errors";

const DEFAULT_BACKOFF_MS = [250, 750, 1500] as const;

export type RetryOptions = {
  attempts?: number;
  backoffMs?: number[];
  idempotent?: boolean;
  sleepFn?: (ms: number) => Promise<void>;
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function errorText(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  const parts: string[] = [];
  if (error.message.trim()) parts.push(error.message);
  const cause = error.cause;
  if (cause instanceof Error && cause.message.trim()) parts.push(cause.message);
  return parts.join("\n");
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof TransientError) return true;
  if (!(error instanceof Error)) return false;

  // fetch rejects with a TypeError on DNS/socket failures; AbortSignal.timeout with TimeoutError.
  if (error.name === "TimeoutError" || error.name === "AbortError") return true;

  const text = errorText(error).toLowerCase();
  if (!text) return false;

  return (
    text.includes("fetch failed") ||
    text.includes("econnreset") ||
    text.includes("econnrefused") ||
    text.includes("etimedout") ||
    text.includes("socket hang up") ||
    text.includes("connection reset") ||
    text.includes("temporary failure")
  );
}

export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const backoff = options.backoffMs && options.backoffMs.length > 0 ? options.backoffMs : Array.from(DEFAULT_BACKOFF_MS);
  const configuredAttempts = Math.max(1, Math.trunc(options.attempts ?? backoff.length));
  const idempotent = options.idempotent ?? true;
  const attempts = idempotent ? configuredAttempts : 1;
  const sleepFn = options.sleepFn ?? sleep;

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      const canRetry = idempotent && attempt < attempts && isRetryableError(error);
      if (!canRetry) {
        throw error;
      }

      const delay = backoff[Math.min(attempt - 1, backoff.length - 1)] ?? 0;
      if (delay > 0) {
        await sleepFn(delay);
      }
    }
  }

  throw lastError ?? new Error("retry: operation failed");
}
