import type { SlackApi, SlackError } from "../slack/types.js";
import type { TimeIsh } from "../utils/format/timestamps.js";
import type { ApiContext } from "../utils/safe-api.js";
import type { SlackChannel } from "./channel.js";
import type { SlackMessage } from "./message.js";
import type { SlackUser } from "./user.js";

export interface TimeRange {
  after?: TimeIsh;
  before?: TimeIsh;
}

export interface MessageListOptions extends TimeRange {
  /** Yield each fetched page oldest-first */
  asc?: boolean;
  /** Follow every thread parent with its replies (one level deep) */
  withReplies?: boolean;
}

export interface FileListOptions extends TimeRange {
  user?: string | SlackUser;
  channel?: string | SlackChannel;
  /** Slack file types: all, spaces, snippets, images, gdocs, zips, pdfs */
  types?: string;
}

/**
 * The back-reference every entity holds to the janitor that produced it.
 */
export interface JanitorContext extends ApiContext {
  readonly api: SlackApi;
  readonly token: string;
  readonly pageSize: number;
  resolveUser(userId: string): Promise<SlackUser>;
  conversations(): Promise<readonly SlackChannel[]>;
  msgs(options?: MessageListOptions & { channels?: Iterable<SlackChannel> }): AsyncGenerator<SlackMessage>;
  postDelete(entity: object, error?: SlackError | null): Promise<void>;
}
