import type { RawReaction, SlackError } from "../slack/types.js";
import type { JanitorContext } from "./context.js";
import { deleteVia } from "./delete.js";
import type { SlackFile } from "./file.js";
import type { SlackMessage } from "./message.js";
import type { SlackUser } from "./user.js";

/**
 * An emoji reaction on a message or a file. Both kinds resolve their users the
 * same way; they differ in the `reactions.remove` target and in `context`.
 */
export interface SlackReaction {
  readonly kind: "message" | "file";
  readonly name: string;
  readonly count: number;
  readonly userIds: readonly string[];
  /** Where the reaction is attached, for log lines */
  readonly context: string;
  users(): Promise<SlackUser[]>;
  delete(): Promise<SlackError | null>;
}

class ReactionUsers {
  private resolved: Promise<SlackUser[]> | null = null;

  constructor(
    private readonly janitor: JanitorContext,
    private readonly ids: readonly string[]
  ) {}

  get(): Promise<SlackUser[]> {
    if (this.resolved === null) {
      this.resolved = Promise.all(this.ids.map((id) => this.janitor.resolveUser(id)));
    }
    return this.resolved;
  }
}

export class MessageReaction implements SlackReaction {
  readonly kind = "message";
  readonly name: string;
  readonly count: number;
  readonly userIds: readonly string[];
  private readonly resolvedUsers: ReactionUsers;

  constructor(
    entry: RawReaction,
    readonly message: SlackMessage,
    private readonly janitor: JanitorContext
  ) {
    this.name = entry.name ?? "";
    this.count = entry.count ?? 0;
    this.userIds = entry.users ?? [];
    this.resolvedUsers = new ReactionUsers(janitor, this.userIds);
  }

  get context(): string {
    return `${this.message.channel.name}:${this.message.ts}`;
  }

  users(): Promise<SlackUser[]> {
    return this.resolvedUsers.get();
  }

  delete(): Promise<SlackError | null> {
    return deleteVia(this.janitor, this, "reactions.remove", () =>
      this.janitor.api.reactions.remove({
        name: this.name,
        channel: this.message.channel.id,
        timestamp: this.message.ts,
      })
    );
  }

  toString(): string {
    return `${this.context}:${this.name}`;
  }
}

export class FileReaction implements SlackReaction {
  readonly kind = "file";
  readonly name: string;
  readonly count: number;
  readonly userIds: readonly string[];
  private readonly resolvedUsers: ReactionUsers;

  constructor(
    entry: RawReaction,
    readonly file: SlackFile,
    private readonly janitor: JanitorContext
  ) {
    this.name = entry.name ?? "";
    this.count = entry.count ?? 0;
    this.userIds = entry.users ?? [];
    this.resolvedUsers = new ReactionUsers(janitor, this.userIds);
  }

  get context(): string {
    return this.file.name;
  }

  users(): Promise<SlackUser[]> {
    return this.resolvedUsers.get();
  }

  delete(): Promise<SlackError | null> {
    return deleteVia(this.janitor, this, "reactions.remove", () =>
      this.janitor.api.reactions.remove({ name: this.name, file: this.file.id })
    );
  }

  toString(): string {
    return `${this.context}:${this.name}`;
  }
}
