import { createWriteStream } from "node:fs";
import * as path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { RawFile, SlackError } from "../slack/types.js";
import { DownloadError } from "../utils/errors.js";
import { parseTime, toSlackTs } from "../utils/format/timestamps.js";
import { paginateNumbered } from "../utils/pagination.js";
import type { FileListOptions, JanitorContext } from "./context.js";
import { deleteVia } from "./delete.js";
import { isPinned, readReactions } from "./raw.js";
import { FileReaction } from "./reaction.js";
import type { SlackUser } from "./user.js";

export class SlackFile {
  readonly id: string;
  readonly name: string;
  readonly title: string;
  readonly mimetype: string | null;
  readonly size: number;
  readonly isPublic: boolean;
  readonly pinned: boolean;
  readonly reactions: FileReaction[];
  readonly json: RawFile;

  constructor(
    entry: RawFile,
    /** Owner of the file */
    readonly user: SlackUser,
    private readonly janitor: JanitorContext
  ) {
    this.id = entry.id ?? "";
    this.name = entry.name ?? this.id;
    this.title = entry.title ?? this.name;
    this.mimetype = entry.mimetype ?? null;
    this.size = entry.size ?? 0;
    this.isPublic = entry.is_public ?? false;
    this.pinned = isPinned(entry.pinned_to);
    this.json = entry;
    this.reactions = readReactions(entry.reactions).map((r) => new FileReaction(r, this, janitor));
  }

  /**
   * Builds a file, resolving its owner. `fallbackUserId` attributes files that
   * omit `user`, such as those embedded in a message.
   */
  static async from(
    entry: RawFile,
    janitor: JanitorContext,
    fallbackUserId?: string
  ): Promise<SlackFile> {
    const owner = await janitor.resolveUser(entry.user ?? fallbackUserId ?? "");
    return new SlackFile(entry, owner, janitor);
  }

  /**
   * Files matching the filters, fetched page by page via `files.list`.
   */
  static async *list(janitor: JanitorContext, options: FileListOptions = {}): AsyncGenerator<SlackFile> {
    const user = typeof options.user === "object" ? options.user.id : options.user;
    const channel = typeof options.channel === "object" ? options.channel.id : options.channel;
    const tsFrom = toSlackTs(parseTime(options.after));
    const tsTo = toSlackTs(parseTime(options.before));

    janitor.log.debug("list files", { user, channel, after: tsFrom, before: tsTo, types: options.types });

    const entries = paginateNumbered(
      janitor,
      (page) =>
        janitor.api.files.list({
          ...page,
          ...(user !== undefined && { user }),
          ...(channel !== undefined && { channel }),
          ...(tsFrom !== undefined && { ts_from: tsFrom }),
          ...(tsTo !== undefined && { ts_to: tsTo }),
          ...(options.types !== undefined && { types: options.types }),
        }),
      (body) => body.files,
      { method: "files.list", scopes: ["files:read"], pageSize: janitor.pageSize }
    );

    for await (const entry of entries) {
      yield await SlackFile.from(entry, janitor);
    }
  }

  delete(): Promise<SlackError | null> {
    return deleteVia(this.janitor, this, "files.delete", () =>
      this.janitor.api.files.delete({ file: this.id })
    );
  }

  /**
   * Raw authenticated response for the private download URL.
   */
  async downloadResponse(): Promise<Response> {
    const url = this.json.url_private_download;
    if (!url) {
      throw new DownloadError(`file ${this.id}`, 404);
    }
    const response = await fetch(url, {
      headers: { Authorization: `Bearer ${this.janitor.token}` },
    });
    if (!response.ok) {
      throw new DownloadError(url, response.status);
    }
    return response;
  }

  async downloadContent(): Promise<Buffer> {
    const response = await this.downloadResponse();
    return Buffer.from(await response.arrayBuffer());
  }

  async downloadJson(): Promise<unknown> {
    const response = await this.downloadResponse();
    const body: unknown = await response.json();
    return body;
  }

  /**
   * Content in chunks of at most `chunkSize` bytes.
   */
  async *downloadStream(chunkSize = 1024): AsyncGenerator<Buffer> {
    const response = await this.downloadResponse();
    if (!response.body) return;

    const reader = response.body.getReader();
    let pending = Buffer.alloc(0);
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        pending = Buffer.concat([pending, Buffer.from(value)]);
        while (pending.length >= chunkSize) {
          yield pending.subarray(0, chunkSize);
          pending = pending.subarray(chunkSize);
        }
      }
      if (pending.length > 0) {
        yield pending;
      }
    } finally {
      // releases the connection when the consumer stops early
      await reader.cancel();
    }
  }

  /**
   * Saves the content to `fileName` (the file's own name by default) and
   * returns the path written.
   */
  async download(fileName: string = this.name): Promise<string> {
    await pipeline(Readable.from(this.downloadStream(64 * 1024)), createWriteStream(fileName));
    return fileName;
  }

  downloadTo(directory = "."): Promise<string> {
    return this.download(path.join(directory, this.name));
  }

  toString(): string {
    return this.name;
  }
}
