import { CHANNEL_SCOPES, SlackChannel, SlackDirectMessage, type ChannelType } from "../model/channel.js";
import type { JanitorContext } from "../model/context.js";
import { ByKeyLookup } from "../model/lookup.js";
import { collect, paginate } from "../utils/pagination.js";

const LIST_TYPES: Record<ChannelType, string> = {
  public: "public_channel",
  private: "private_channel",
  mpim: "mpim",
  im: "im",
};

export const CONVERSATION_ORDER: readonly ChannelType[] = ["public", "private", "mpim", "im"];

/**
 * Conversations per type, each list loaded on first access and kept for the
 * janitor's lifetime.
 */
export class ChannelCache {
  private readonly lists = new Map<ChannelType, Promise<readonly SlackChannel[]>>();
  private lookup: Promise<ByKeyLookup<SlackChannel>> | null = null;

  constructor(private readonly janitor: JanitorContext) {}

  list(type: ChannelType): Promise<readonly SlackChannel[]> {
    let list = this.lists.get(type);
    if (!list) {
      list = this.populate(type);
      this.lists.set(type, list);
    }
    return list;
  }

  private async populate(type: ChannelType): Promise<readonly SlackChannel[]> {
    const entries = await collect(
      paginate(
        this.janitor,
        (page) =>
          this.janitor.api.conversations.list({
            ...page,
            types: LIST_TYPES[type],
            exclude_archived: false,
          }),
        (body) => body.channels,
        {
          method: "conversations.list",
          scopes: [CHANNEL_SCOPES[type].read],
          pageSize: this.janitor.pageSize,
        }
      )
    );

    const channels: SlackChannel[] = [];
    for (const entry of entries) {
      if (type === "im") {
        const partner = await this.janitor.resolveUser(entry.user ?? "");
        channels.push(new SlackDirectMessage(entry, partner, this.janitor));
      } else {
        channels.push(new SlackChannel(entry, type, this.janitor));
      }
    }
    this.janitor.log.debug(`collected ${channels.length} ${type} conversations`, {
      channels: channels.map(String),
    });
    return channels;
  }

  /**
   * Public channels, private channels, multi-person and direct messages, in
   * that order.
   */
  async conversations(): Promise<readonly SlackChannel[]> {
    const all: SlackChannel[] = [];
    for (const type of CONVERSATION_ORDER) {
      all.push(...(await this.list(type)));
    }
    return all;
  }

  all(): Promise<ByKeyLookup<SlackChannel>> {
    if (this.lookup === null) {
      this.lookup = this.conversations().then(
        (channels) => new ByKeyLookup(channels, (channel) => [channel.name, channel.id])
      );
    }
    return this.lookup;
  }

  /**
   * Finds a conversation by id or name. Accepts "general", "#general",
   * "General" and "C123456".
   */
  async find(input: string): Promise<SlackChannel | undefined> {
    const lookup = await this.all();
    const exact = lookup.get(input);
    if (exact) return exact;

    const name = (input.startsWith("#") ? input.slice(1) : input).toLowerCase();
    for (const channel of lookup) {
      if (channel.name.toLowerCase() === name) return channel;
    }
    return undefined;
  }
}
