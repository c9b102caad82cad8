/**
 * Cursor-based pagination.
 *
 * Cursors are base64url-encoded JSON objects: { f: field, v: lastSeen }.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
 * Keys are non-negative integers (sequence numbers, log positions).
 */

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

interface CursorData {
  readonly f: string;
  readonly v: number;
}

export function encodeCursor(field: string, value: number): string {
  const data: CursorData = { f: field, v: value };
  return Buffer.from(JSON.stringify(data)).toString("base64url");
}

/**
 * @returns undefined if the cursor is malformed.
 */
export function decodeCursor(
  cursor: string,
): { field: string; value: number } | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (typeof data !== "object" || data === null || !("f" in data) || !("v" in data)) {
    return undefined;
  }
  const { f, v } = data;
  if (typeof f !== "string" || typeof v !== "number" || !Number.isSafeInteger(v)) {
    return undefined;
  }
  return { field: f, value: v };
}

/**
 * Page through items sorted ascending by `getKey`. A cursor for a
 * different field is ignored.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getKey: (item: T) => number,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded !== undefined && decoded.field === fieldName) {
      const after = decoded.value;
      filtered = filtered.filter((item) => getKey(item) > after);
    }
  }

  // One extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data[data.length - 1];

  const cursor =
    hasMore && last !== undefined ? encodeCursor(fieldName, getKey(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
