export { SlackJanitor, type JanitorMessageOptions, type SlackJanitorOptions } from "./janitor.js";

export { SlackUser } from "./model/user.js";
export {
  CHANNEL_SCOPES,
  SlackChannel,
  SlackDirectMessage,
  type ChannelType,
} from "./model/channel.js";
export { SlackMessage, type MessageDeleteOptions } from "./model/message.js";
export { SlackFile } from "./model/file.js";
export { FileReaction, MessageReaction, type SlackReaction } from "./model/reaction.js";
export { ByKeyLookup } from "./model/lookup.js";
export type {
  FileListOptions,
  JanitorContext,
  MessageListOptions,
  TimeRange,
} from "./model/context.js";

export * from "./filter/predicates.js";

export { UserCache } from "./cache/user-cache.js";
export { ChannelCache } from "./cache/channel-cache.js";

export { resolveJanitorConfig, type JanitorConfig } from "./config/janitor.js";
export { createSlackClient, getSlackClient, resetSlackClient, resolveAuthConfig } from "./slack/client.js";
export type { SlackApi, SlackError, Sleeper } from "./slack/types.js";

export {
  ConfigError,
  DownloadError,
  SlackResponseError,
  ensureOk,
  mapSlackError,
} from "./utils/errors.js";
export { callRateLimited, defaultSleeper } from "./utils/rate-limit.js";
export { safeApi, safeAttr, type ApiContext, type CallHints } from "./utils/safe-api.js";
export {
  DEFAULT_PAGE_SIZE,
  collect,
  cursorPages,
  numberedPages,
  paginate,
  paginateNumbered,
} from "./utils/pagination.js";
export {
  DeleteCounter,
  SlackLogger,
  type JanitorLog,
  type LogLevel,
  type SlackLoggerOptions,
} from "./utils/logger.js";
export { readErrors, type ErrorLogEntry } from "./utils/error-log.js";
export { parseTime, type TimeIsh } from "./utils/format/timestamps.js";
