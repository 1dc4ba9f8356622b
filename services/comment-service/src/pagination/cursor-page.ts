import { CursorValue, encodeCursor } from './cursor.codec';

export interface CursorPage<T> {
  items: T[];
  hasNext: boolean;
  nextCursor: string | null;
}

/**
 * Trim a `limit + 1` fetch down to one page and emit the cursor for the next one.
 */
export function toCursorPage<T extends { id: number }>(
  rows: T[],
  limit: number,
  sortValue: (row: T) => CursorValue,
): CursorPage<T> {
  const hasNext = rows.length > limit;
  const items = hasNext ? rows.slice(0, limit) : rows;
  const last = items[items.length - 1];

  return {
    items,
    hasNext,
    nextCursor: hasNext && last ? encodeCursor(sortValue(last), last.id) : null,
  };
}
