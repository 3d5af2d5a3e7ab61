import { describe, it, expect } from 'vitest';
import { DEFAULT_PAGE_LIMIT, paginate, paginateOrReturnAll, parsePaginationParams } from './pagination.js';

describe('parsePaginationParams', () => {
  it('should return null when neither limit nor offset is set', () => {
    expect(parsePaginationParams({})).toBeNull();
  });

  it('should fill in the missing half', () => {
    expect(parsePaginationParams({ limit: 5 })).toEqual({ limit: 5, offset: 0 });
    expect(parsePaginationParams({ offset: 10 })).toEqual({ limit: DEFAULT_PAGE_LIMIT, offset: 10 });
  });
});

describe('paginate', () => {
  const items = ['a', 'b', 'c', 'd', 'e'];

  it('should slice the requested window', () => {
    expect(paginate(items, { limit: 2, offset: 1 })).toEqual({
      items: ['b', 'c'],
      total: 5,
      limit: 2,
      offset: 1,
    });
  });

  it('should return an empty page past the end', () => {
    expect(paginate(items, { limit: 2, offset: 10 }).items).toEqual([]);
  });
});

describe('paginateOrReturnAll', () => {
  it('should return the array itself without params', () => {
    const items = [1, 2, 3];

    expect(paginateOrReturnAll(items, null)).toBe(items);
  });

  it('should wrap the page when params are given', () => {
    expect(paginateOrReturnAll([1, 2, 3], { limit: 1, offset: 0 })).toEqual({
      items: [1],
      total: 3,
      limit: 1,
      offset: 0,
    });
  });
});
