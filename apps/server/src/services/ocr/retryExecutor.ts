import pino from "pino";
import type { RetryPolicy } from "../../types/ocr.js";
import { errorMessage, isOcrError, OcrError } from "./errors.js";
import type { FailureKind } from "./errors.js";

export const MAX_BACKOFF_MS = 30_000;

type Sleep = (ms: number) => Promise<void>;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelayMs(attempt: number, baseDelayMs: number, maxDelayMs = MAX_BACKOFF_MS): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1));
}

export function classifyFailure(error: unknown): FailureKind {
  if (isOcrError(error) && error.failureKind) return error.failureKind;
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") return "timeout";
    const cause: unknown = error.cause;
    const code = typeof cause === "object" && cause !== null && "code" in cause ? cause.code : undefined;
    if (typeof code === "string" && ["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EHOSTUNREACH", "EAI_AGAIN"].includes(code)) {
      return "connection";
    }
    if (error instanceof SyntaxError) return "malformed_response";
  }
  return "unknown";
}

/**
 * Runs one idempotent call with bounded attempts and doubling backoff.
 * Every failure kind is retried; the last cause is kept on the final error.
 */
export class RetryExecutor {
  constructor(
    private readonly logger: pino.Logger = pino({ name: "retry-executor" }),
    private readonly wait: Sleep = sleep
  ) {}

  /** Once `signal` is aborted no further attempt starts and its reason is thrown. */
  async execute<T>(
    call: (attempt: number) => Promise<T>,
    policy: RetryPolicy,
    label = "call",
    signal?: AbortSignal
  ): Promise<T> {
    const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
    let lastCause: unknown = undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      signal?.throwIfAborted();
      try {
        return await call(attempt);
      } catch (error) {
        signal?.throwIfAborted();
        lastCause = error;
        this.logger.warn(
          {
            label,
            attempt,
            maxAttempts,
            failureKind: classifyFailure(error),
            statusCode: isOcrError(error) ? error.statusCode : undefined,
            err: errorMessage(error)
          },
          "OCR call attempt failed"
        );
        if (attempt < maxAttempts) {
          await this.wait(backoffDelayMs(attempt, policy.baseDelayMs, policy.maxDelayMs));
        }
      }
    }

    throw new OcrError("exhausted_retries", `${label} failed after ${maxAttempts} attempts: ${errorMessage(lastCause)}`, {
      failureKind: classifyFailure(lastCause),
      statusCode: isOcrError(lastCause) ? lastCause.statusCode : undefined,
      cause: lastCause
    });
  }
}
