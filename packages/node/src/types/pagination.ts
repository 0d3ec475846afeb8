/**
 * Position-window pagination.
 *
 * List endpoints return { data, pagination: { next, hasMore } }, where
 * `next` is the position to pass as `from` for the following page.
 */

export interface PaginationQuery {
  readonly from: number;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly next: number | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

/**
 * Take one page from items sorted ascending by position, starting at
 * `query.from`.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  positionOf: (item: T) => number,
): PaginatedResponse<T> {
  const window = items.filter((item) => positionOf(item) >= query.from);

  // One extra detects hasMore
  const page = window.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;

  const last = data[data.length - 1];
  const next = hasMore && last !== undefined ? positionOf(last) + 1 : null;

  return { data, pagination: { next, hasMore } };
}
