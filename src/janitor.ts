import { ChannelCache } from "./cache/channel-cache.js";
import { UserCache } from "./cache/user-cache.js";
import { resolveJanitorConfig } from "./config/janitor.js";
import { SlackDirectMessage, type SlackChannel } from "./model/channel.js";
import type { FileListOptions, JanitorContext, MessageListOptions } from "./model/context.js";
import { SlackFile } from "./model/file.js";
import type { ByKeyLookup } from "./model/lookup.js";
import type { SlackMessage } from "./model/message.js";
import type { SlackUser } from "./model/user.js";
import { createSlackClient, resolveAuthConfig } from "./slack/client.js";
import type { SlackApi, SlackError, Sleeper } from "./slack/types.js";
import { SlackLogger, type JanitorLog } from "./utils/logger.js";
import { DEFAULT_PAGE_SIZE } from "./utils/pagination.js";
import { defaultSleeper } from "./utils/rate-limit.js";
import { safeAttr } from "./utils/safe-api.js";

export interface SlackJanitorOptions {
  token: string;
  /** Defaults to a WebClient for `token` */
  client?: SlackApi;
  log?: JanitorLog;
  /** Pause after every delete, successful or not */
  sleepForMs?: number;
  pageSize?: number;
  sleep?: Sleeper;
}

export interface JanitorMessageOptions extends MessageListOptions {
  /** Conversations to walk; all conversations when absent or empty */
  channels?: Iterable<SlackChannel>;
}

/**
 * Entry point: owns the Slack connection and the user and conversation
 * caches, and fans listings out over conversations.
 *
 * Caches are filled on first access and never invalidated; create a new
 * janitor to pick up membership or profile changes.
 */
export class SlackJanitor implements JanitorContext {
  readonly api: SlackApi;
  readonly token: string;
  readonly log: JanitorLog;
  readonly sleep: Sleeper;
  readonly pageSize: number;
  sleepForMs: number;

  private readonly userCache: UserCache;
  private readonly channelCache: ChannelCache;
  private self: Promise<SlackUser> | null = null;

  constructor(options: SlackJanitorOptions) {
    this.token = options.token;
    this.api = options.client ?? createSlackClient(options.token);
    this.log = options.log ?? new SlackLogger();
    this.sleep = options.sleep ?? defaultSleeper;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.sleepForMs = options.sleepForMs ?? 0;
    this.userCache = new UserCache(this);
    this.channelCache = new ChannelCache(this);
    this.log.debug("start");
  }

  /**
   * Builds a janitor from SLACK_TOKEN and the SLACK_JANITOR_* settings.
   */
  static fromEnv(overrides: Partial<SlackJanitorOptions> = {}): SlackJanitor {
    const { token } = resolveAuthConfig();
    const config = resolveJanitorConfig();
    return new SlackJanitor({
      token,
      sleepForMs: config.sleepForMs,
      pageSize: config.pageSize,
      log: new SlackLogger({
        level: config.logLevel,
        logFile: config.logFile,
        errorLogPath: config.errorLogPath,
      }),
      ...overrides,
    });
  }

  users(): Promise<ByKeyLookup<SlackUser>> {
    return this.userCache.all();
  }

  /**
   * The user owning the token.
   */
  myself(): Promise<SlackUser> {
    if (this.self === null) {
      this.self = safeAttr(this, () => this.api.auth.test(), "user_id", "", {
        method: "auth.test",
      }).then((userId) => this.resolveUser(userId));
    }
    return this.self;
  }

  resolveUser(userId: string): Promise<SlackUser> {
    return this.userCache.resolve(userId);
  }

  channels(): Promise<readonly SlackChannel[]> {
    return this.channelCache.list("public");
  }

  groups(): Promise<readonly SlackChannel[]> {
    return this.channelCache.list("private");
  }

  mpim(): Promise<readonly SlackChannel[]> {
    return this.channelCache.list("mpim");
  }

  async ims(): Promise<readonly SlackDirectMessage[]> {
    const ims = await this.channelCache.list("im");
    return ims.filter((c): c is SlackDirectMessage => c instanceof SlackDirectMessage);
  }

  conversations(): Promise<readonly SlackChannel[]> {
    return this.channelCache.conversations();
  }

  /**
   * Conversations keyed by id and name.
   */
  c(): Promise<ByKeyLookup<SlackChannel>> {
    return this.channelCache.all();
  }

  findConversation(input: string): Promise<SlackChannel | undefined> {
    return this.channelCache.find(input);
  }

  files(options: FileListOptions = {}): AsyncGenerator<SlackFile> {
    return SlackFile.list(this, options);
  }

  async *msgs(options: JanitorMessageOptions = {}): AsyncGenerator<SlackMessage> {
    const { channels, ...listOptions } = options;
    let targets: readonly SlackChannel[] = channels ? [...channels] : [];
    if (targets.length === 0) {
      targets = await this.conversations();
    }
    for (const channel of targets) {
      yield* channel.msgs(listOptions);
    }
  }

  /**
   * Records one delete attempt and applies the configured throttle.
   */
  async postDelete(entity: object, error?: SlackError | null): Promise<void> {
    this.log.deleted(entity, error);
    if (error?.code === "missing_scope") {
      this.log.warning(
        `cannot delete ${String(entity)}: the token lacks the ${error.needed ?? "required"} scope`
      );
    }
    if (this.sleepForMs > 0) {
      await this.sleep(this.sleepForMs);
    }
  }
}
