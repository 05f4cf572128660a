import type { JanitorContext } from "../model/context.js";
import { ByKeyLookup } from "../model/lookup.js";
import { SlackUser } from "../model/user.js";
import { collect, paginate } from "../utils/pagination.js";
import { safeAttr } from "../utils/safe-api.js";

const USER_SCOPES = ["users:read"];

/**
 * Workspace users keyed by id and name, loaded on first access and kept for
 * the janitor's lifetime. Ids missing from users.list are fetched one by one;
 * ids Slack cannot resolve become dummy users appended to the same lookup.
 */
export class UserCache {
  private lookup: Promise<ByKeyLookup<SlackUser>> | null = null;
  private readonly pending = new Map<string, Promise<SlackUser>>();

  constructor(private readonly janitor: JanitorContext) {}

  all(): Promise<ByKeyLookup<SlackUser>> {
    if (this.lookup === null) {
      this.lookup = this.populate();
    }
    return this.lookup;
  }

  private async populate(): Promise<ByKeyLookup<SlackUser>> {
    const entries = await collect(
      paginate(
        this.janitor,
        (page) => this.janitor.api.users.list(page),
        (body) => body.members,
        { method: "users.list", scopes: USER_SCOPES, pageSize: this.janitor.pageSize }
      )
    );
    const users = new ByKeyLookup(
      entries.map((entry) => new SlackUser(entry, this.janitor)),
      (user) => [user.name, user.id]
    );
    this.janitor.log.debug(`collected ${users.length} users`);
    return users;
  }

  /**
   * Never fails: unknown ids resolve to the same dummy user every time.
   */
  async resolve(userId: string): Promise<SlackUser> {
    const users = await this.all();
    const known = users.get(userId);
    if (known) return known;

    let pending = this.pending.get(userId);
    if (!pending) {
      pending = this.fetchOrDummy(userId, users);
      this.pending.set(userId, pending);
    }
    return pending;
  }

  private async fetchOrDummy(userId: string, users: ByKeyLookup<SlackUser>): Promise<SlackUser> {
    const entry = await safeAttr(
      this.janitor,
      () => this.janitor.api.users.info({ user: userId }),
      "user",
      {},
      { method: "users.info", scopes: USER_SCOPES }
    );

    let user: SlackUser;
    if (entry.id === userId) {
      user = new SlackUser(entry, this.janitor);
    } else {
      this.janitor.log.error(`user ${userId} not found - generating dummy one`, {
        code: "user_not_found",
      });
      user = SlackUser.dummy(userId, this.janitor);
    }
    users.append(user);
    return user;
  }
}
