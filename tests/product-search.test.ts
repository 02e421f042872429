import { describe, expect, it } from 'vitest';
import { SqlParams } from '../src/connections/db/sql';
import { buildSearchClause, normalizeSearchText, searchOrderBy } from '../src/modules/products/product-search';

describe('product search', () => {
  it('normalizes search text', () => {
    expect(normalizeSearchText(undefined)).toBeNull();
    expect(normalizeSearchText('')).toBeNull();
    expect(normalizeSearchText('\t ')).toBeNull();
    expect(normalizeSearchText(' chair ')).toBe('chair');
  });

  it('binds the text once and queries both languages', () => {
    const params = new SqlParams();
    params.add(42);

    const clause = buildSearchClause('стул', params);

    expect(params.values).toEqual([42, 'стул']);
    expect(clause.match).toBe(
      "(p.tsv @@ websearch_to_tsquery('english', $2) OR p.tsv @@ websearch_to_tsquery('russian', $2))"
    );
    expect(clause.rank).toBe(
      "GREATEST(ts_rank_cd(p.tsv, websearch_to_tsquery('english', $2)), ts_rank_cd(p.tsv, websearch_to_tsquery('russian', $2)))"
    );
  });

  it('orders by relevance only when ranking', () => {
    expect(searchOrderBy('GREATEST(x, y)')).toBe('rank DESC, p.id ASC');
    expect(searchOrderBy(null)).toBe('p.id ASC');
  });
});
