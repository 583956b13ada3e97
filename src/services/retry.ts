import type { RetryPolicy } from "../config.js";
import { classifyError, err, ok, TimeoutError, TransientError } from "../errors.js";
import type { MonitorError, Result } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("retry");

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((r) => setTimeout(r, ms));

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryOptions {
  /** Set to false for calls that must not repeat once they may have reached the remote side. */
  retryTimeouts?: boolean;
}

/**
 * Runs `fn` up to `policy.attempts` times, waiting `baseDelayMs * 2^n`
 * between attempts. Only transient failures are retried.
 */
export async function withRetry<T>(
  label: string,
  fn: () => Promise<T>,
  policy: RetryPolicy,
  wait: Sleep = sleep,
  options: RetryOptions = {},
): Promise<Result<T, MonitorError>> {
  const retryTimeouts = options.retryTimeouts ?? true;
  for (let attempt = 0; attempt < policy.attempts; attempt++) {
    try {
      return ok(await withTimeout(fn(), policy.timeoutMs, label));
    } catch (e) {
      const error = classifyError(e);
      if (error.kind !== "transient") return err(error);
      if (!retryTimeouts && error instanceof TimeoutError) {
        log.error(`${label} timed out; not retrying`);
        return err(error);
      }

      if (attempt < policy.attempts - 1) {
        const delay = policy.baseDelayMs * 2 ** attempt;
        log.warn(`${label} failed (attempt ${attempt + 1}/${policy.attempts}): ${error.message}; retrying in ${delay}ms`);
        await wait(delay);
        continue;
      }
      log.error(`${label} failed after ${policy.attempts} attempt(s): ${error.message}`);
      return err(error);
    }
  }
  return err(new TransientError(`${label}: no attempts configured`));
}
