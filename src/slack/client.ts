import { WebClient } from "@slack/web-api";
import type { AuthConfig, SlackApi } from "./types.js";
import { AUTH_ERRORS } from "../utils/errors.js";

let slackClient: SlackApi | null = null;
let cachedAuthConfig: AuthConfig | null = null;

/**
 * Resolves the Slack token from SLACK_TOKEN. User tokens (xoxp-) can delete
 * anything the user could delete by hand; bot tokens (xoxb-) only what the
 * bot posted.
 */
export function resolveAuthConfig(): AuthConfig {
  if (cachedAuthConfig) {
    return cachedAuthConfig;
  }

  const token = process.env.SLACK_TOKEN?.trim();
  if (!token) {
    throw new Error(AUTH_ERRORS.NO_AUTH_CONFIGURED);
  }
  if (!token.startsWith("xox")) {
    throw new Error(AUTH_ERRORS.INVALID_TOKEN);
  }

  cachedAuthConfig = { token };
  return cachedAuthConfig;
}

/**
 * A WebClient that rejects rate-limited calls instead of retrying them, so
 * the janitor's own wrapper sees every Retry-After.
 */
export function createSlackClient(token: string): SlackApi {
  return new WebClient(token, {
    rejectRateLimitedCalls: true,
    retryConfig: { retries: 0 },
  });
}

export function getSlackClient(): SlackApi {
  if (!slackClient) {
    slackClient = createSlackClient(resolveAuthConfig().token);
  }
  return slackClient;
}

export function resetSlackClient(): void {
  slackClient = null;
  cachedAuthConfig = null;
}
