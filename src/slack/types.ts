// Raw payloads - read-only projections of Slack API responses. Fields the
// janitor does not rely on stay loosely typed so WebClient responses remain
// assignable.

export interface ApiEnvelope {
  ok: boolean;
  error?: string;
}

export interface CursorMetadata {
  next_cursor?: string;
}

export interface PagingMetadata {
  page?: number;
  pages?: number;
}

export interface CursorEnvelope extends ApiEnvelope {
  response_metadata?: CursorMetadata;
}

export interface PagedEnvelope extends ApiEnvelope {
  paging?: PagingMetadata;
}

export interface RawProfile {
  real_name?: string;
  display_name?: string;
  email?: string;
}

export interface RawUser {
  id?: string;
  name?: string;
  real_name?: string;
  is_bot?: boolean;
  is_app_user?: boolean;
  profile?: RawProfile;
}

export interface RawChannel {
  id?: string;
  name?: string;
  user?: string;
  is_archived?: boolean;
}

export interface RawReaction {
  name?: string;
  count?: number;
  users?: string[];
}

export interface RawFile {
  id?: string;
  name?: string;
  title?: string;
  mimetype?: string;
  size?: number;
  is_public?: boolean;
  user?: string;
  url_private_download?: string;
  pinned_to?: unknown;
  reactions?: unknown;
}

export interface RawMessage {
  type?: string;
  subtype?: string;
  ts?: string;
  thread_ts?: string;
  text?: string;
  user?: string;
  bot_id?: string;
  reply_count?: number;
  pinned_to?: unknown;
  files?: unknown;
  reactions?: unknown;
}

// Request shapes

export interface CursorPageRequest {
  cursor?: string;
  limit: number;
}

export interface NumberedPageRequest {
  page: number;
  count: number;
}

export interface TimeWindow {
  oldest?: string;
  latest?: string;
}

/**
 * The subset of the WebClient surface the janitor calls. A `WebClient`
 * satisfies it structurally.
 */
export interface SlackApi {
  auth: {
    test(): Promise<ApiEnvelope & { user_id?: string }>;
  };
  users: {
    list(options: CursorPageRequest): Promise<CursorEnvelope & { members?: RawUser[] }>;
    info(options: { user: string }): Promise<ApiEnvelope & { user?: RawUser }>;
  };
  conversations: {
    list(
      options: CursorPageRequest & { types: string; exclude_archived?: boolean }
    ): Promise<CursorEnvelope & { channels?: RawChannel[] }>;
    members(
      options: CursorPageRequest & { channel: string }
    ): Promise<CursorEnvelope & { members?: string[] }>;
    history(
      options: CursorPageRequest & TimeWindow & { channel: string }
    ): Promise<CursorEnvelope & { messages?: RawMessage[]; has_more?: boolean }>;
    replies(
      options: CursorPageRequest & { channel: string; ts: string }
    ): Promise<CursorEnvelope & { messages?: RawMessage[] }>;
  };
  chat: {
    delete(options: { channel: string; ts: string; as_user?: boolean }): Promise<ApiEnvelope>;
  };
  files: {
    list(
      options: NumberedPageRequest & {
        user?: string;
        channel?: string;
        ts_from?: string;
        ts_to?: string;
        types?: string;
      }
    ): Promise<PagedEnvelope & { files?: RawFile[] }>;
    delete(options: { file: string }): Promise<ApiEnvelope>;
  };
  reactions: {
    remove(options: {
      name: string;
      channel?: string;
      timestamp?: string;
      file?: string;
    }): Promise<ApiEnvelope>;
  };
}

// Error types

export interface SlackError {
  code: string;
  message: string;
  retryAfter?: number;
  /** Scopes the call needed, reported by missing_scope failures */
  needed?: string;
}

export type Sleeper = (ms: number) => Promise<void>;

export interface AuthConfig {
  token: string;
}
