import type {
  CursorEnvelope,
  CursorMetadata,
  CursorPageRequest,
  NumberedPageRequest,
  PagedEnvelope,
  PagingMetadata,
} from "../slack/types.js";
import { safeApi, type ApiContext, type CallHints } from "./safe-api.js";

export const DEFAULT_PAGE_SIZE = 200;

export interface PaginationHints extends CallHints {
  pageSize?: number;
}

/**
 * Next cursor from a response's metadata, or null when the listing is done.
 */
export function nextCursor(metadata?: CursorMetadata): string | null {
  const cursor = metadata?.next_cursor;
  return cursor && cursor.length > 0 ? cursor : null;
}

/**
 * Next page number, or null when `page >= pages` or paging is missing.
 */
export function nextPage(paging?: PagingMetadata): number | null {
  if (paging?.page === undefined || paging.pages === undefined) return null;
  return paging.page < paging.pages ? paging.page + 1 : null;
}

/**
 * Walks a cursor-paginated method page by page. The first request carries
 * only `limit`; later ones add the cursor of the previous response.
 */
export async function* cursorPages<R extends CursorEnvelope, T>(
  ctx: ApiContext,
  fetchPage: (request: CursorPageRequest) => Promise<R>,
  select: (body: R) => readonly T[] | undefined,
  hints: PaginationHints
): AsyncGenerator<T[]> {
  const limit = hints.pageSize ?? DEFAULT_PAGE_SIZE;
  let request: CursorPageRequest = { limit };

  while (true) {
    const current = request;
    const [items, metadata] = await safeApi<R, readonly [readonly T[], CursorMetadata | undefined]>(
      ctx,
      () => fetchPage(current),
      (body) => [select(body) ?? [], body.response_metadata] as const,
      [[], undefined] as const,
      hints
    );

    yield [...items];

    const cursor = nextCursor(metadata);
    if (cursor === null) return;
    request = { cursor, limit };
  }
}

/**
 * Walks a page-number paginated method (`files.list`) starting at page 1.
 */
export async function* numberedPages<R extends PagedEnvelope, T>(
  ctx: ApiContext,
  fetchPage: (request: NumberedPageRequest) => Promise<R>,
  select: (body: R) => readonly T[] | undefined,
  hints: PaginationHints
): AsyncGenerator<T[]> {
  const count = hints.pageSize ?? DEFAULT_PAGE_SIZE;
  let page = 1;

  while (true) {
    const current: NumberedPageRequest = { page, count };
    const [items, paging] = await safeApi<R, readonly [readonly T[], PagingMetadata | undefined]>(
      ctx,
      () => fetchPage(current),
      (body) => [select(body) ?? [], body.paging] as const,
      [[], undefined] as const,
      hints
    );

    yield [...items];

    const next = nextPage(paging);
    if (next === null) return;
    page = next;
  }
}

export async function* flattenPages<T>(pages: AsyncIterable<readonly T[]>): AsyncGenerator<T> {
  for await (const page of pages) {
    yield* page;
  }
}

/**
 * Lazy record sequence over a cursor-paginated method.
 */
export function paginate<R extends CursorEnvelope, T>(
  ctx: ApiContext,
  fetchPage: (request: CursorPageRequest) => Promise<R>,
  select: (body: R) => readonly T[] | undefined,
  hints: PaginationHints
): AsyncGenerator<T> {
  return flattenPages(cursorPages(ctx, fetchPage, select, hints));
}

/**
 * Lazy record sequence over a page-number paginated method.
 */
export function paginateNumbered<R extends PagedEnvelope, T>(
  ctx: ApiContext,
  fetchPage: (request: NumberedPageRequest) => Promise<R>,
  select: (body: R) => readonly T[] | undefined,
  hints: PaginationHints
): AsyncGenerator<T> {
  return flattenPages(numberedPages(ctx, fetchPage, select, hints));
}

/**
 * Drains a lazy sequence into an array.
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
