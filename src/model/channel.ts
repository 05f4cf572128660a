import type { RawChannel, RawMessage } from "../slack/types.js";
import { parseTime, toSlackTs } from "../utils/format/timestamps.js";
import { collect, cursorPages, paginate } from "../utils/pagination.js";
import type { FileListOptions, JanitorContext, MessageListOptions } from "./context.js";
import { SlackFile } from "./file.js";
import { SlackMessage } from "./message.js";
import type { SlackUser } from "./user.js";

export type ChannelType = "public" | "private" | "mpim" | "im";

interface ChannelScopes {
  /** conversations.list / conversations.members */
  read: string;
  /** conversations.history / conversations.replies */
  history: string;
}

export const CHANNEL_SCOPES: Record<ChannelType, ChannelScopes> = {
  public: { read: "channels:read", history: "channels:history" },
  private: { read: "groups:read", history: "groups:history" },
  mpim: { read: "mpim:read", history: "mpim:history" },
  im: { read: "im:read", history: "im:history" },
};

/**
 * A conversation: public or private channel, multi-person or direct message.
 */
export class SlackChannel {
  readonly id: string;
  readonly name: string;
  readonly isArchived: boolean;
  readonly json: RawChannel;

  protected memberList: Promise<SlackUser[]> | null = null;
  protected loadedMembers: SlackUser[] = [];

  constructor(
    entry: RawChannel,
    readonly type: ChannelType,
    protected readonly janitor: JanitorContext,
    name?: string
  ) {
    this.id = entry.id ?? "";
    this.name = name ?? entry.name ?? this.id;
    this.isArchived = entry.is_archived ?? false;
    this.json = entry;
  }

  /**
   * Members fetched so far; empty until `members()` has resolved once.
   */
  get knownMembers(): readonly SlackUser[] {
    return this.loadedMembers;
  }

  /**
   * Channel members, fetched on first call and kept for the channel's lifetime.
   */
  members(): Promise<SlackUser[]> {
    if (this.memberList === null) {
      this.memberList = this.fetchMembers().then((members) => {
        this.loadedMembers = members;
        return members;
      });
    }
    return this.memberList;
  }

  private async fetchMembers(): Promise<SlackUser[]> {
    const ids = await collect(
      paginate(
        this.janitor,
        (page) => this.janitor.api.conversations.members({ ...page, channel: this.id }),
        (body) => body.members,
        {
          method: "conversations.members",
          scopes: [CHANNEL_SCOPES[this.type].read],
          pageSize: this.janitor.pageSize,
        }
      )
    );
    const members: SlackUser[] = [];
    for (const id of ids) {
      members.push(await this.janitor.resolveUser(id));
    }
    return members;
  }

  /**
   * Channel history, newest page first. With `asc` each fetched page is
   * yielded oldest-first; with `withReplies` every thread parent is followed
   * by its replies.
   */
  async *msgs(options: MessageListOptions = {}): AsyncGenerator<SlackMessage> {
    const oldest = toSlackTs(parseTime(options.after));
    const latest = toSlackTs(parseTime(options.before));
    this.janitor.log.debug(`list msgs of ${this.name}`, { after: oldest, before: latest });

    const pages = cursorPages(
      this.janitor,
      (page) =>
        this.janitor.api.conversations.history({
          ...page,
          channel: this.id,
          ...(oldest !== undefined && { oldest }),
          ...(latest !== undefined && { latest }),
        }),
      (body) => body.messages,
      {
        method: "conversations.history",
        scopes: [CHANNEL_SCOPES[this.type].history],
        pageSize: this.janitor.pageSize,
      }
    );

    for await (const page of pages) {
      const ordered = options.asc ? [...page].reverse() : page;
      for (const entry of ordered) {
        if (!isUserVisible(entry)) continue;

        const msg = await SlackMessage.from(entry, this, this.janitor);
        yield msg;

        if (options.withReplies && msg.hasReplies) {
          yield* this.repliesTo(msg);
        }
      }
    }
  }

  /**
   * Replies in the thread of `parent`, oldest first, without the parent.
   */
  async *repliesTo(parent: SlackMessage): AsyncGenerator<SlackMessage> {
    const entries = paginate(
      this.janitor,
      (page) =>
        this.janitor.api.conversations.replies({ ...page, channel: this.id, ts: parent.ts }),
      (body) => body.messages,
      {
        method: "conversations.replies",
        scopes: [CHANNEL_SCOPES[this.type].history],
        pageSize: this.janitor.pageSize,
      }
    );

    for await (const entry of entries) {
      if (!isUserVisible(entry) || entry.ts === parent.ts) continue;
      yield await SlackMessage.from(entry, this, this.janitor);
    }
  }

  files(options: Omit<FileListOptions, "channel"> = {}): AsyncGenerator<SlackFile> {
    return SlackFile.list(this.janitor, { ...options, channel: this.id });
  }

  toString(): string {
    return this.name;
  }
}

function isUserVisible(entry: RawMessage): boolean {
  return entry.type === undefined || entry.type === "message";
}

/**
 * A direct message conversation; its only member is the partner, whose name
 * it carries.
 */
export class SlackDirectMessage extends SlackChannel {
  constructor(
    entry: RawChannel,
    readonly user: SlackUser,
    janitor: JanitorContext
  ) {
    super(entry, "im", janitor, user.name);
    this.loadedMembers = [user];
    this.memberList = Promise.resolve([user]);
  }
}
