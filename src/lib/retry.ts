import type { FetchResponse } from "./fetch";
import { sleep } from "./fetch";
import { log } from "./logger";

const DEFAULT_RETRY_DELAY_MS = 4000;
const DEFAULT_MAX_RETRIES = 3;

type RetryOptions = {
  maxRetries?: number;
  label?: string;
};

export function retryDelayMs(response: FetchResponse): number {
  const retryAfter = response.headers.get("retry-after");
  if (retryAfter === null) return DEFAULT_RETRY_DELAY_MS;
  const seconds = Number.parseInt(retryAfter, 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : DEFAULT_RETRY_DELAY_MS;
}

/**
 * Re-issues a request while it answers HTTP 429, waiting for Retry-After.
 * Any other status (success or failure) is returned to the caller as is.
 */
export async function withRetry(
  fn: () => Promise<FetchResponse>,
  options?: RetryOptions
): Promise<FetchResponse> {
  const maxRetries = options?.maxRetries ?? DEFAULT_MAX_RETRIES;
  const label = options?.label ?? "request";

  for (let attempt = 0; ; attempt++) {
    const response = await fn();
    if (response.status !== 429) return response;

    if (attempt === maxRetries) {
      log(`[retry] ${label}: 429 after ${maxRetries} retries, giving up`);
      return response;
    }

    const delayMs = retryDelayMs(response);
    log(
      `[retry] ${label}: 429, waiting ${delayMs / 1000}s (attempt ${attempt + 1}/${maxRetries})`
    );
    await sleep(delayMs);
  }
}
