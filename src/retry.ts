import * as core from "@actions/core";
import { errorMessage } from "./errors";
import { RetryPolicy } from "./types";

export const DEFAULT_RETRY_POLICY: RetryPolicy = { attempts: 3, initialDelayMs: 2000 };

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` up to `policy.attempts` times, doubling the wait after each
 * transient failure. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  label: string,
  fn: () => Promise<T>,
  policy: RetryPolicy,
  isTransient: (err: unknown) => boolean,
): Promise<T> {
  let delay = policy.initialDelayMs;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= policy.attempts || !isTransient(err)) {
        if (attempt > 1) core.warning(`${label} gave up after ${attempt} attempt(s)`);
        throw err;
      }
      core.warning(`${label} failed (attempt ${attempt}/${policy.attempts}): ${errorMessage(err)}; retrying in ${delay}ms`);
      await sleep(delay);
      delay *= 2;
    }
  }
}
