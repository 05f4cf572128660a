import type { ApiEnvelope, Sleeper } from "../slack/types.js";
import { errorCode, isMissingScope, mapSlackError, neededScopes } from "./errors.js";
import type { JanitorLog } from "./logger.js";
import { callRateLimited } from "./rate-limit.js";

/**
 * What every remote call needs from its owner: somewhere to log and a way to
 * wait out rate limits.
 */
export interface ApiContext {
  readonly log: JanitorLog;
  readonly sleep: Sleeper;
}

export interface CallHints {
  /** Scopes the call requires, named in the warning when one is missing */
  scopes?: readonly string[];
  /** Method name used in log lines, e.g. "conversations.history" */
  method: string;
}

export function rateLimited<T>(ctx: ApiContext, method: string, call: () => Promise<T>): Promise<T> {
  return callRateLimited(call, {
    sleep: ctx.sleep,
    onRateLimited: (retryAfter, attempt) => {
      ctx.log.info(`${method}: rate limited, retrying in ${retryAfter}s`, { attempt });
    },
  });
}

/**
 * Runs `call` through the rate-limit wrapper and extracts a value from a
 * successful response. Every expected failure is logged and degrades to
 * `defaultValue`:
 *
 * - `ok: false` answers: warning with the full body
 * - missing scope (when `hints.scopes` is given): warning naming the scopes
 * - `fetch_members_failed` (archived channels): debug
 * - anything else: error with the mapped detail
 */
export async function safeApi<R extends ApiEnvelope, T>(
  ctx: ApiContext,
  call: () => Promise<R>,
  select: (body: R) => T,
  defaultValue: T,
  hints: CallHints
): Promise<T> {
  try {
    const body = await rateLimited(ctx, hints.method, call);
    if (!body.ok) {
      ctx.log.warning(`${hints.method}: request failed`, { body });
      return defaultValue;
    }
    return select(body);
  } catch (error) {
    const scopes = hints.scopes ?? [];
    if (isMissingScope(error) && scopes.length > 0) {
      ctx.log.warning(
        `${hints.method}: missing scope, requires one of: ${scopes.join(", ")}`,
        { needed: neededScopes(error) }
      );
    } else if (errorCode(error) === "fetch_members_failed") {
      ctx.log.debug(`${hints.method}: cannot fetch members, channel is archived`);
    } else {
      const mapped = mapSlackError(error);
      ctx.log.error(`${hints.method}: ${mapped.message}`, { ...mapped });
    }
    return defaultValue;
  }
}

/**
 * `safeApi` extracting one named attribute; an absent attribute also yields
 * the default.
 */
export function safeAttr<R extends ApiEnvelope, K extends keyof R>(
  ctx: ApiContext,
  call: () => Promise<R>,
  attr: K,
  defaultValue: NonNullable<R[K]>,
  hints: CallHints
): Promise<NonNullable<R[K]>> {
  return safeApi(ctx, call, (body) => body[attr] ?? defaultValue, defaultValue, hints);
}
