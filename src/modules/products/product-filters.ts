import { SqlParams } from '../../connections/db/sql';
import { InvalidInputError } from '../../utils/errors';
import { buildSearchClause, normalizeSearchText } from './product-search';

export interface ProductFilterParams {
  category_id?: number;
  min_price?: number;
  max_price?: number;
  in_stock?: boolean;
  seller_id?: number;
  search?: string;
}

/**
 * Conjunctive predicate set over active products in active categories. Absent members impose no
 * constraint. The same value feeds the count query and the page query.
 */
export interface ProductFilter {
  categoryIds: number[] | null;
  minPrice: number | null;
  maxPrice: number | null;
  inStock: boolean | null;
  sellerId: number | null;
  searchText: string | null;
}

export interface CompiledProductFilter {
  from: string;
  where: string;
  values: unknown[];
  rank: string | null;
}

const PRODUCT_SOURCE = 'products p JOIN categories c ON c.id = p.category_id';

export const buildProductFilter = (params: ProductFilterParams): ProductFilter => {
  const { category_id, min_price, max_price, in_stock, seller_id, search } = params;

  if (min_price !== undefined && max_price !== undefined && min_price > max_price) {
    throw new InvalidInputError('min_price must not be greater than max_price', { min_price, max_price });
  }

  return {
    categoryIds: category_id !== undefined ? [category_id] : null,
    minPrice: min_price ?? null,
    maxPrice: max_price ?? null,
    inStock: in_stock ?? null,
    sellerId: seller_id ?? null,
    searchText: normalizeSearchText(search),
  };
};

export const withCategoryIds = (filter: ProductFilter, categoryIds: number[]): ProductFilter => ({
  ...filter,
  categoryIds,
});

export const compileProductFilter = (filter: ProductFilter): CompiledProductFilter => {
  const params = new SqlParams();
  const conditions = ['p.is_active = TRUE', 'c.is_active = TRUE'];

  if (filter.categoryIds) {
    conditions.push(
      filter.categoryIds.length === 1
        ? `p.category_id = ${params.add(filter.categoryIds[0])}`
        : `p.category_id = ANY(${params.add(filter.categoryIds)}::int[])`
    );
  }

  if (filter.minPrice !== null) {
    conditions.push(`p.price >= ${params.add(filter.minPrice)}`);
  }

  if (filter.maxPrice !== null) {
    conditions.push(`p.price <= ${params.add(filter.maxPrice)}`);
  }

  if (filter.inStock !== null) {
    conditions.push(filter.inStock ? 'p.stock > 0' : 'p.stock = 0');
  }

  if (filter.sellerId !== null) {
    conditions.push(`p.seller_id = ${params.add(filter.sellerId)}`);
  }

  const search = filter.searchText ? buildSearchClause(filter.searchText, params) : null;
  if (search) {
    conditions.push(search.match);
  }

  return {
    from: PRODUCT_SOURCE,
    where: conditions.join(' AND '),
    values: params.values,
    rank: search ? search.rank : null,
  };
};
