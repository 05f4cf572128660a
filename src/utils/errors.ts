import { ErrorCode } from "@slack/web-api";
import type { ApiEnvelope, SlackError } from "../slack/types.js";

const ERROR_MESSAGES: Record<string, string> = {
  rate_limited: "Rate limited by Slack API",
  invalid_auth: "Invalid Slack token. Please check your SLACK_TOKEN",
  missing_scope: "Token lacks required scope",
  channel_not_found: "Channel not found or not accessible",
  user_not_found: "User not found",
  not_in_channel: "Token user is not a member of this channel",
  message_not_found: "Message not found",
  file_not_found: "File not found",
  cant_delete_message: "Token user is not allowed to delete this message",
  fetch_members_failed: "Cannot fetch members of an archived channel",
};

export const AUTH_ERRORS = {
  NO_AUTH_CONFIGURED:
    "No Slack token configured. Set SLACK_TOKEN to a user (xoxp-) or bot (xoxb-) token.",
  INVALID_TOKEN:
    "SLACK_TOKEN must start with 'xox'. Please provide a valid Slack token.",
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function platformData(error: unknown): Record<string, unknown> | null {
  if (error instanceof Error && "data" in error && isRecord(error.data)) {
    return error.data;
  }
  return null;
}

/**
 * Returns the Slack error code of a thrown value: the platform `error` field
 * when present, otherwise the client error code.
 */
export function errorCode(error: unknown): string | null {
  const data = platformData(error);
  if (data && typeof data.error === "string") return data.error;
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

/**
 * Seconds to wait before retrying, or null when the error is not a rate-limit
 * signal.
 */
export function rateLimitDelay(error: unknown): number | null {
  if (
    error instanceof Error &&
    "code" in error &&
    error.code === ErrorCode.RateLimitedError &&
    "retryAfter" in error &&
    typeof error.retryAfter === "number"
  ) {
    return error.retryAfter;
  }
  const data = platformData(error);
  if (
    data &&
    (data.error === "ratelimited" || data.error === "rate_limited") &&
    typeof data.retry_after === "number"
  ) {
    return data.retry_after;
  }
  return null;
}

export function isMissingScope(error: unknown): boolean {
  return errorCode(error) === "missing_scope";
}

/**
 * Scopes a missing_scope failure reports as needed, if any.
 */
export function neededScopes(error: unknown): string | undefined {
  const needed = platformData(error)?.needed;
  return typeof needed === "string" ? needed : undefined;
}

export function mapSlackError(error: unknown): SlackError {
  const code = errorCode(error);

  if (code !== null) {
    const retryAfter = rateLimitDelay(error) ?? undefined;
    const normalized = retryAfter !== undefined ? "rate_limited" : code;
    const needed = neededScopes(error);

    let message = ERROR_MESSAGES[normalized] ?? `Slack API error: ${normalized}`;
    if (normalized === "missing_scope" && needed) {
      message = `Token lacks required scope: ${needed}`;
    }

    return {
      code: normalized,
      message,
      ...(retryAfter !== undefined && { retryAfter }),
      ...(needed !== undefined && { needed }),
    };
  }

  if (error instanceof Error) {
    return {
      code: "unknown_error",
      message: error.message,
    };
  }

  return {
    code: "unknown_error",
    message: String(error),
  };
}

/**
 * Raised for responses that answer `ok: false` without the client throwing.
 */
export class SlackResponseError extends Error {
  readonly data: ApiEnvelope;

  constructor(method: string, data: ApiEnvelope) {
    super(`${method} failed: ${data.error ?? "unknown error"}`);
    this.name = "SlackResponseError";
    this.data = data;
  }
}

export function ensureOk<R extends ApiEnvelope>(response: R, method: string): R {
  if (!response.ok) {
    throw new SlackResponseError(method, response);
  }
  return response;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class DownloadError extends Error {
  readonly status: number;

  constructor(url: string, status: number) {
    super(`Download of ${url} failed with HTTP ${status}`);
    this.name = "DownloadError";
    this.status = status;
  }
}
