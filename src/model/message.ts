import type { RawMessage, SlackError } from "../slack/types.js";
import { tsToDate } from "../utils/format/timestamps.js";
import { collect } from "../utils/pagination.js";
import type { SlackChannel } from "./channel.js";
import type { JanitorContext } from "./context.js";
import { deleteVia } from "./delete.js";
import { SlackFile } from "./file.js";
import { isPinned, readFiles, readReactions } from "./raw.js";
import { MessageReaction } from "./reaction.js";
import type { SlackUser } from "./user.js";

export interface MessageDeleteOptions {
  /** Delete as the token's user rather than as the app */
  asUser?: boolean;
  /** Also delete files attached to the message */
  deleteFiles?: boolean;
  /** Also delete every reply in the message's thread */
  deleteReplies?: boolean;
}

const PREVIEW_LENGTH = 20;

export class SlackMessage {
  /** Message timestamp, its identity within the channel */
  readonly ts: string;
  /** Thread parent timestamp; equals `ts` outside threads */
  readonly threadTs: string;
  readonly text: string;
  readonly bot: boolean;
  readonly pinned: boolean;
  readonly hasReplies: boolean;
  /** Body already removed upstream; only replies and files remain */
  readonly isTombstone: boolean;
  readonly reactions: MessageReaction[];
  readonly json: RawMessage;

  constructor(
    entry: RawMessage,
    /** Sender; null for system messages posted without a user */
    readonly user: SlackUser | null,
    readonly files: SlackFile[],
    readonly channel: SlackChannel,
    private readonly janitor: JanitorContext
  ) {
    this.ts = entry.ts ?? "";
    this.threadTs = entry.thread_ts ?? this.ts;
    this.text = entry.text ?? "";
    this.bot = entry.subtype === "bot_message" || entry.bot_id !== undefined;
    this.pinned = isPinned(entry.pinned_to);
    this.hasReplies = (entry.reply_count ?? 0) > 0;
    this.isTombstone = entry.subtype === "tombstone";
    this.json = entry;
    this.reactions = readReactions(entry.reactions).map((r) => new MessageReaction(r, this, janitor));
  }

  /**
   * Builds a message, resolving its sender and attached files.
   */
  static async from(
    entry: RawMessage,
    channel: SlackChannel,
    janitor: JanitorContext
  ): Promise<SlackMessage> {
    const user = entry.user !== undefined ? await janitor.resolveUser(entry.user) : null;
    const files: SlackFile[] = [];
    for (const file of readFiles(entry.files)) {
      files.push(await SlackFile.from(file, janitor, entry.user));
    }
    return new SlackMessage(entry, user, files, channel, janitor);
  }

  get date(): Date {
    return tsToDate(this.ts);
  }

  get isReply(): boolean {
    return this.threadTs !== this.ts;
  }

  replies(): AsyncGenerator<SlackMessage> {
    return this.channel.repliesTo(this);
  }

  /**
   * Deletes the message, optionally with its files and thread replies. A
   * tombstone makes no call for itself. Returns this message's failure, or
   * null.
   */
  async delete(options: MessageDeleteOptions = {}): Promise<SlackError | null> {
    const asUser = options.asUser ?? false;

    if (options.deleteFiles) {
      for (const file of this.files) {
        await file.delete();
      }
    }

    if (options.deleteReplies && this.hasReplies) {
      const replies = await collect(this.replies());
      for (const reply of replies) {
        await reply.delete({ asUser, deleteFiles: options.deleteFiles });
      }
    }

    if (this.isTombstone) {
      return null;
    }

    return deleteVia(this.janitor, this, "chat.delete", () =>
      this.janitor.api.chat.delete({ channel: this.channel.id, ts: this.ts, as_user: asUser })
    );
  }

  toString(): string {
    const author = this.bot ? "bot" : String(this.user);
    const preview = this.text.length > PREVIEW_LENGTH ? this.text.slice(0, PREVIEW_LENGTH) : this.text;
    return `${this.channel.name}:${this.ts} (${author}): ${preview}`;
  }
}
