import { errorMessage, Logger } from "../config/logger";
import { sleep as defaultSleep, SleepFn } from "../shared/utils/sleep";
import { LlmProvider } from "./llm.provider";

export interface BackoffCallArgs {
  provider: LlmProvider;
  prompt: string;
  promptName: string;
  maxAttempts: number;
  baseDelayMs: number;
  logger?: Logger;
  timeoutMs?: number;
  sleep?: SleepFn;
  applicantId?: string;
}

export type SafeTextResult =
  | { ok: true; text: string; attempts: number }
  | {
      ok: false;
      error_code: "timeout" | "transient_failure" | "llm_failure";
      message: string;
      attempts: number;
    };

const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Sends the prompt, retrying transient failures (timeouts, network errors, 429, 5xx) with
 * exponential backoff: the wait before attempt n+1 is baseDelayMs * 2^(n-1).
 * Non-transient failures are returned after the first attempt.
 */
export async function callPromptWithBackoff(args: BackoffCallArgs): Promise<SafeTextResult> {
  const sleep = args.sleep ?? defaultSleep;
  const timeoutMs = normalizeTimeout(args.timeoutMs);
  const maxAttempts = Math.max(1, Math.floor(args.maxAttempts));
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      const text = (await withTimeout(args.provider.send(args.prompt), timeoutMs)).trim();
      return { ok: true, text, attempts: attempt };
    } catch (error) {
      lastError = error;
      if (!isTransientError(error)) {
        args.logger?.warn("llm.call.failed", {
          applicant_id: args.applicantId,
          promptName: args.promptName,
          provider: args.provider.name,
          attempt,
          error: errorMessage(error),
        });
        return {
          ok: false,
          error_code: "llm_failure",
          message: errorMessage(error),
          attempts: attempt,
        };
      }
      if (attempt >= maxAttempts) {
        break;
      }

      const delayMs = args.baseDelayMs * 2 ** (attempt - 1);
      args.logger?.warn("llm.call.retrying", {
        applicant_id: args.applicantId,
        promptName: args.promptName,
        provider: args.provider.name,
        attempt,
        delayMs,
        error: errorMessage(error),
      });
      await sleep(delayMs);
    }
  }

  args.logger?.error("llm.call.exhausted", {
    applicant_id: args.applicantId,
    promptName: args.promptName,
    provider: args.provider.name,
    attempts: maxAttempts,
    error: errorMessage(lastError),
  });
  return {
    ok: false,
    error_code: isTimeoutError(lastError) ? "timeout" : "transient_failure",
    message: errorMessage(lastError),
    attempts: maxAttempts,
  };
}

function normalizeTimeout(value?: number): number {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_TIMEOUT_MS;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error("timeout"));
    }, timeoutMs);
    promise
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

export function isTimeoutError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("timeout");
}

export function isTransientError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return (
    message.includes("timeout") ||
    message.includes("econnreset") ||
    message.includes("econnrefused") ||
    message.includes("enotfound") ||
    message.includes("socket hang up") ||
    message.includes("network") ||
    message.includes("http 429") ||
    message.includes("rate limit") ||
    message.includes("overloaded") ||
    /http 5\d\d/.test(message)
  );
}
