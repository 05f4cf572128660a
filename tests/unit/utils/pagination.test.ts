import { describe, it, expect, vi } from "vitest";
import {
  collect,
  cursorPages,
  nextCursor,
  nextPage,
  paginate,
  paginateNumbered,
} from "../../../src/utils/pagination.js";
import type {
  CursorEnvelope,
  CursorPageRequest,
  NumberedPageRequest,
  PagedEnvelope,
  Sleeper,
} from "../../../src/slack/types.js";
import { RecordingLog, platformError } from "../../helpers/fake-slack.js";

type CursorBody = CursorEnvelope & { items?: string[] };
type PagedBody = PagedEnvelope & { items?: string[] };

function context() {
  return { log: new RecordingLog(), sleep: vi.fn<Sleeper>(async () => {}) };
}

describe("nextCursor / nextPage", () => {
  it("treats an empty or missing cursor as the end", () => {
    expect(nextCursor({ next_cursor: "abc" })).toBe("abc");
    expect(nextCursor({ next_cursor: "" })).toBeNull();
    expect(nextCursor(undefined)).toBeNull();
  });

  it("stops when the last page is reached or paging is missing", () => {
    expect(nextPage({ page: 1, pages: 3 })).toBe(2);
    expect(nextPage({ page: 3, pages: 3 })).toBeNull();
    expect(nextPage({ page: 1 })).toBeNull();
    expect(nextPage(undefined)).toBeNull();
  });
});

describe("paginate", () => {
  it("follows cursors across pages and fetches each page once", async () => {
    const fetchPage = vi
      .fn<(request: CursorPageRequest) => Promise<CursorBody>>()
      .mockResolvedValueOnce({ ok: true, items: ["a", "b"], response_metadata: { next_cursor: "c2" } })
      .mockResolvedValueOnce({ ok: true, items: ["c", "d"], response_metadata: { next_cursor: "c3" } })
      .mockResolvedValueOnce({ ok: true, items: ["e", "f"], response_metadata: { next_cursor: "" } });

    const items = await collect(
      paginate(context(), fetchPage, (body) => body.items, { method: "test.list", pageSize: 2 })
    );

    expect(items).toEqual(["a", "b", "c", "d", "e", "f"]);
    expect(fetchPage.mock.calls).toEqual([
      [{ limit: 2 }],
      [{ cursor: "c2", limit: 2 }],
      [{ cursor: "c3", limit: 2 }],
    ]);
  });

  it("is lazy: nothing is fetched until the sequence is consumed", async () => {
    const fetchPage = vi.fn<(request: CursorPageRequest) => Promise<CursorBody>>(async () => ({
      ok: true,
      items: ["a"],
      response_metadata: { next_cursor: "more" },
    }));

    const items = paginate(context(), fetchPage, (body) => body.items, { method: "test.list" });
    expect(fetchPage).not.toHaveBeenCalled();

    const first = await items.next();
    expect(first.value).toBe("a");
    expect(fetchPage).toHaveBeenCalledTimes(1);
    await items.return(undefined);
  });

  it("uses the default page size", async () => {
    const fetchPage = vi.fn<(request: CursorPageRequest) => Promise<CursorBody>>(async () => ({
      ok: true,
      items: [],
    }));
    await collect(paginate(context(), fetchPage, (body) => body.items, { method: "test.list" }));
    expect(fetchPage).toHaveBeenCalledWith({ limit: 200 });
  });

  it("stops after one page when metadata is missing", async () => {
    const fetchPage = vi.fn<(request: CursorPageRequest) => Promise<CursorBody>>(async () => ({
      ok: true,
      items: ["only"],
    }));
    const items = await collect(
      paginate(context(), fetchPage, (body) => body.items, { method: "test.list" })
    );
    expect(items).toEqual(["only"]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it("ends the sequence when a page fails", async () => {
    const ctx = context();
    const fetchPage = vi
      .fn<(request: CursorPageRequest) => Promise<CursorBody>>()
      .mockResolvedValueOnce({ ok: true, items: ["a"], response_metadata: { next_cursor: "c2" } })
      .mockRejectedValueOnce(platformError({ error: "channel_not_found" }));

    const items = await collect(
      paginate(ctx, fetchPage, (body) => body.items, { method: "test.list" })
    );
    expect(items).toEqual(["a"]);
    expect(ctx.log.at("error")).toEqual(["test.list: Channel not found or not accessible"]);
  });
});

describe("cursorPages", () => {
  it("yields an empty first page", async () => {
    const fetchPage = vi.fn<(request: CursorPageRequest) => Promise<CursorBody>>(async () => ({
      ok: true,
      items: [],
      response_metadata: { next_cursor: "" },
    }));
    const pages = await collect(
      cursorPages(context(), fetchPage, (body) => body.items, { method: "test.list" })
    );
    expect(pages).toEqual([[]]);
  });
});

describe("paginateNumbered", () => {
  it("walks page numbers until the last page", async () => {
    const fetchPage = vi
      .fn<(request: NumberedPageRequest) => Promise<PagedBody>>()
      .mockResolvedValueOnce({ ok: true, items: ["a", "b"], paging: { page: 1, pages: 2 } })
      .mockResolvedValueOnce({ ok: true, items: ["c"], paging: { page: 2, pages: 2 } });

    const items = await collect(
      paginateNumbered(context(), fetchPage, (body) => body.items, { method: "files.list" })
    );

    expect(items).toEqual(["a", "b", "c"]);
    expect(fetchPage.mock.calls).toEqual([[{ page: 1, count: 200 }], [{ page: 2, count: 200 }]]);
  });
});
