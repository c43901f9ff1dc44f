/**
 * Cursor pagination over audit records.
 *
 * A cursor is the base64url form of "<field>:<key>", where key is the
 * last numeric key (global position or stream version) already served.
 * List endpoints answer { data, pagination: { cursor, hasMore } }.
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

export function encodeCursor(field: string, key: number): string {
  return Buffer.from(`${field}:${key}`).toString("base64url");
}

/**
 * The key a cursor resumes after, or undefined when the cursor is
 * malformed or was issued for another field.
 */
export function decodeCursor(cursor: string, field: string): number | undefined {
  const text = Buffer.from(cursor, "base64url").toString("utf-8");
  const prefix = `${field}:`;
  if (!text.startsWith(prefix)) return undefined;
  const key = Number(text.slice(prefix.length));
  return Number.isSafeInteger(key) && key >= 0 ? key : undefined;
}

/**
 * Page through items already sorted ascending by `keyOf`. An unusable
 * cursor restarts from the first item.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  keyOf: (item: T) => number,
  field: string,
): PaginatedResponse<T> {
  const after = query.cursor === undefined ? undefined : decodeCursor(query.cursor, field);
  const remaining = after === undefined ? items : items.filter((item) => keyOf(item) > after);

  const data = remaining.slice(0, query.limit);
  const last = data.at(-1);
  const hasMore = remaining.length > data.length;

  return {
    data,
    pagination: {
      cursor: hasMore && last !== undefined ? encodeCursor(field, keyOf(last)) : null,
      hasMore,
    },
  };
}
