import { describe, expect, it } from 'vitest';
import { toPage, toPageWindow } from '../src/utils/pagination';

describe('pagination', () => {
  it('computes the offset from page and page size', () => {
    expect(toPageWindow({ page: 1, page_size: 20 })).toEqual({ limit: 20, offset: 0 });
    expect(toPageWindow({ page: 3, page_size: 15 })).toEqual({ limit: 15, offset: 30 });
  });

  it('echoes the request next to the items and total', () => {
    expect(toPage({ page: 2, page_size: 5 }, ['a'], 6)).toEqual({
      items: ['a'],
      total: 6,
      page: 2,
      page_size: 5,
    });
  });
});
