import type { RawFile, RawReaction } from "../slack/types.js";

function field(obj: object, key: string): unknown {
  return key in obj ? Reflect.get(obj, key) : undefined;
}

function objects(value: unknown): object[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is object => typeof v === "object" && v !== null);
}

function str(obj: object, key: string): string | undefined {
  const v = field(obj, key);
  return typeof v === "string" ? v : undefined;
}

function num(obj: object, key: string): number | undefined {
  const v = field(obj, key);
  return typeof v === "number" ? v : undefined;
}

function bool(obj: object, key: string): boolean | undefined {
  const v = field(obj, key);
  return typeof v === "boolean" ? v : undefined;
}

export function readReactions(value: unknown): RawReaction[] {
  return objects(value).map((r) => {
    const users = field(r, "users");
    return {
      name: str(r, "name"),
      count: num(r, "count"),
      users: Array.isArray(users) ? users.filter((u): u is string => typeof u === "string") : [],
    };
  });
}

/**
 * Files embedded in a message. Entries without an id (deleted files show up
 * as `{ mode: "tombstone" }`) are dropped.
 */
export function readFiles(value: unknown): RawFile[] {
  return objects(value)
    .filter((f) => str(f, "id") !== undefined && str(f, "mode") !== "tombstone")
    .map((f) => ({
      id: str(f, "id"),
      name: str(f, "name"),
      title: str(f, "title"),
      mimetype: str(f, "mimetype"),
      size: num(f, "size"),
      is_public: bool(f, "is_public"),
      user: str(f, "user"),
      url_private_download: str(f, "url_private_download"),
      pinned_to: field(f, "pinned_to"),
      reactions: field(f, "reactions"),
    }));
}

/**
 * `pinned_to` lists the channels an item is pinned in.
 */
export function isPinned(pinnedTo: unknown): boolean {
  return Array.isArray(pinnedTo) ? pinnedTo.length > 0 : Boolean(pinnedTo);
}
