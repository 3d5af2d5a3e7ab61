import type { Paginated } from '@server-registry/shared';

export const DEFAULT_PAGE_LIMIT = 100;

export interface PaginationParams {
  limit: number;
  offset: number;
}

/**
 * Pagination is opt-in: without limit or offset the caller gets null and
 * list endpoints answer with the plain array.
 */
export function parsePaginationParams(query: { limit?: number; offset?: number }): PaginationParams | null {
  if (query.limit === undefined && query.offset === undefined) {
    return null;
  }
  return {
    limit: query.limit ?? DEFAULT_PAGE_LIMIT,
    offset: query.offset ?? 0,
  };
}

export function paginate<T>(items: T[], params: PaginationParams): Paginated<T> {
  return {
    items: items.slice(params.offset, params.offset + params.limit),
    total: items.length,
    limit: params.limit,
    offset: params.offset,
  };
}

export function paginateOrReturnAll<T>(items: T[], params: PaginationParams | null): T[] | Paginated<T> {
  return params ? paginate(items, params) : items;
}
