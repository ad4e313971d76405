import { z } from "zod";
import type { Quote, QuoteSortField, SortOrder } from "../../shared/schema";
import { ValidationError } from "../types/errors";

export interface QuotePageRequest {
  limit: number;
  sortBy: QuoteSortField;
  sortOrder: SortOrder;
  lastKey?: string;
}

export interface QuotePage {
  quotes: Quote[];
  totalCount: number;
  count: number;
  hasMore: boolean;
  lastKey: string | null;
}

const ListCursorSchema = z.object({
  id: z.string().min(1),
  sortBy: z.enum(["quote", "author", "createdAt", "updatedAt"]),
  sortOrder: z.enum(["asc", "desc"]),
});

type ListCursor = z.infer<typeof ListCursorSchema>;

function sortValue(quote: Quote, field: QuoteSortField): string {
  switch (field) {
    case "quote":
      return quote.quote.toLowerCase();
    case "author":
      return quote.author.toLowerCase();
    case "createdAt":
      return quote.createdAt ?? "";
    case "updatedAt":
      return quote.updatedAt ?? "";
  }
}

/** Stable in-memory sort; ties keep scan order. */
export function sortQuotes(quotes: Quote[], sortBy: QuoteSortField, sortOrder: SortOrder): Quote[] {
  const direction = sortOrder === "desc" ? -1 : 1;
  return quotes
    .map((quote, index) => ({ quote, index, key: sortValue(quote, sortBy) }))
    .sort((a, b) => {
      if (a.key < b.key) return -direction;
      if (a.key > b.key) return direction;
      return a.index - b.index;
    })
    .map(({ quote }) => quote);
}

export function encodeListCursor(cursor: ListCursor): string {
  return Buffer.from(JSON.stringify(cursor), "utf8").toString("base64url");
}

export function decodeListCursor(key: string): ListCursor {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(key, "base64url").toString("utf8"));
  } catch (err) {
    throw new ValidationError("Invalid lastKey", { reason: String(err) });
  }
  const parsed = ListCursorSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("Invalid lastKey", { issues: parsed.error.issues });
  }
  return parsed.data;
}

/**
 * Sort the full result set and cut one page out of it.
 * `lastKey` names the last quote of the previous page under the same ordering.
 */
export function pageQuotes(quotes: Quote[], request: QuotePageRequest): QuotePage {
  const sorted = sortQuotes(quotes, request.sortBy, request.sortOrder);

  let start = 0;
  if (request.lastKey) {
    const cursor = decodeListCursor(request.lastKey);
    if (cursor.sortBy !== request.sortBy || cursor.sortOrder !== request.sortOrder) {
      throw new ValidationError("lastKey was issued for a different ordering", {
        sortBy: cursor.sortBy,
        sortOrder: cursor.sortOrder,
      });
    }
    const index = sorted.findIndex((quote) => quote.id === cursor.id);
    if (index === -1) {
      throw new ValidationError("lastKey refers to a quote that no longer exists", { id: cursor.id });
    }
    start = index + 1;
  }

  const page = sorted.slice(start, start + request.limit);
  const hasMore = start + page.length < sorted.length;
  const last = page[page.length - 1];

  return {
    quotes: page,
    totalCount: sorted.length,
    count: page.length,
    hasMore,
    lastKey:
      hasMore && last
        ? encodeListCursor({ id: last.id, sortBy: request.sortBy, sortOrder: request.sortOrder })
        : null,
  };
}

/** Case-insensitive substring match over text, author and tags. */
export function matchesSearch(quote: Quote, query: string): boolean {
  const needle = query.toLowerCase();
  if (!needle) return false;
  return (
    quote.quote.toLowerCase().includes(needle) ||
    quote.author.toLowerCase().includes(needle) ||
    quote.tags.some((tag) => tag.toLowerCase().includes(needle))
  );
}
