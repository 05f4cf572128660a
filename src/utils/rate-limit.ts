import { setTimeout as delay } from "node:timers/promises";
import type { Sleeper } from "../slack/types.js";
import { rateLimitDelay } from "./errors.js";

export const defaultSleeper: Sleeper = async (ms) => {
  await delay(ms);
};

export interface RateLimitOptions {
  sleep?: Sleeper;
  /** Called before every backoff with the server-provided delay in seconds */
  onRateLimited?: (retryAfter: number, attempt: number) => void;
}

/**
 * Invokes `call`, sleeping for the server-provided Retry-After and retrying
 * whenever Slack answers with a rate-limit error. There is no retry cap.
 * Any other error propagates unchanged.
 */
export async function callRateLimited<T>(
  call: () => Promise<T>,
  options: RateLimitOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? defaultSleeper;
  let attempt = 0;

  while (true) {
    try {
      return await call();
    } catch (error) {
      const retryAfter = rateLimitDelay(error);
      if (retryAfter === null) {
        throw error;
      }
      attempt++;
      options.onRateLimited?.(retryAfter, attempt);
      await sleep(retryAfter * 1000);
    }
  }
}
