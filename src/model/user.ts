import type { RawUser } from "../slack/types.js";
import type { SlackChannel } from "./channel.js";
import type { FileListOptions, JanitorContext, TimeRange } from "./context.js";
import { SlackFile } from "./file.js";
import type { SlackMessage } from "./message.js";

/**
 * A workspace member. Unknown ids resolve to dummy users carrying the id as
 * their name, so attribution never dangles.
 */
export class SlackUser {
  readonly id: string;
  readonly name: string;
  readonly realName: string;
  readonly displayName: string;
  readonly email: string;
  readonly isBot: boolean;
  readonly isAppUser: boolean;
  /** Bot or app user */
  readonly bot: boolean;
  readonly isDummy: boolean;
  readonly json: RawUser;

  constructor(
    entry: RawUser,
    private readonly janitor: JanitorContext,
    isDummy = false
  ) {
    this.id = entry.id ?? "";
    this.name = entry.name ?? this.id;
    this.realName = entry.profile?.real_name ?? entry.real_name ?? "";
    this.displayName = entry.profile?.display_name ?? "";
    this.email = entry.profile?.email ?? "";
    this.isBot = entry.is_bot ?? false;
    this.isAppUser = entry.is_app_user ?? false;
    this.bot = this.isBot || this.isAppUser;
    this.isDummy = isDummy;
    this.json = entry;
  }

  static dummy(userId: string, janitor: JanitorContext): SlackUser {
    return new SlackUser({ id: userId, name: userId }, janitor, true);
  }

  files(options: Omit<FileListOptions, "user"> = {}): AsyncGenerator<SlackFile> {
    return SlackFile.list(this.janitor, { ...options, user: this.id });
  }

  /**
   * Messages this user wrote in the conversations they are a member of.
   */
  async *msgs(options: TimeRange = {}): AsyncGenerator<SlackMessage> {
    const channels: SlackChannel[] = [];
    for (const channel of await this.janitor.conversations()) {
      if ((await channel.members()).includes(this)) {
        channels.push(channel);
      }
    }
    if (channels.length === 0) return;

    for await (const msg of this.janitor.msgs({ ...options, channels })) {
      if (msg.user === this) {
        yield msg;
      }
    }
  }

  toString(): string {
    return `${this.name} (${this.id}) ${this.realName}`.trimEnd();
  }
}
