import { Queryable } from '../../connections/db/types';
import { CreateProductInput, Product, ProductInput } from '../../connections/db/models/product.model';
import { PageWindow } from '../../utils/pagination';
import { compileProductFilter, ProductFilter } from './product-filters';
import { searchOrderBy } from './product-search';

export interface ProductListing {
  items: Product[];
  /** Relevance per item, in item order; null when no search text was given */
  ranks: number[] | null;
  total: number;
}

export interface ProductRepository {
  list(filter: ProductFilter, window: PageWindow): Promise<ProductListing>;
  findActiveById(id: number): Promise<Product | null>;
  /** Active product whose category is active too */
  findVisibleById(id: number): Promise<Product | null>;
  /** Active product, row-locked until the surrounding transaction ends */
  lockActiveById(id: number): Promise<Product | null>;
  create(input: CreateProductInput): Promise<Product>;
  update(id: number, input: ProductInput): Promise<Product>;
  deactivate(id: number): Promise<Product>;
  updateRating(id: number, rating: number): Promise<void>;
}

const PRODUCT_COLUMNS = [
  'p.id',
  'p.name',
  'p.description',
  'p.price',
  'p.image_url',
  'p.stock',
  'p.is_active',
  'p.category_id',
  'p.seller_id',
  'p.rating',
  'p.created_at',
  'p.updated_at',
].join(', ');

const RETURNING_COLUMNS = PRODUCT_COLUMNS.replace(/p\./g, '');

type RankedProductRow = Product & { rank: number };

export class PgProductRepository implements ProductRepository {
  constructor(private readonly db: Queryable) {}

  async list(filter: ProductFilter, window: PageWindow): Promise<ProductListing> {
    // One compiled predicate set for both statements
    const { from, where, values, rank } = compileProductFilter(filter);

    const countResult = await this.db.query<{ total: number }>(
      `SELECT COUNT(*)::int AS total FROM ${from} WHERE ${where}`,
      values
    );
    const total = countResult.rows[0]?.total ?? 0;

    const limitRef = `$${values.length + 1}`;
    const offsetRef = `$${values.length + 2}`;
    const columns = rank ? `${PRODUCT_COLUMNS}, ${rank} AS rank` : PRODUCT_COLUMNS;

    const pageResult = await this.db.query<RankedProductRow>(
      `SELECT ${columns}
       FROM ${from}
       WHERE ${where}
       ORDER BY ${searchOrderBy(rank)}
       LIMIT ${limitRef} OFFSET ${offsetRef}`,
      [...values, window.limit, window.offset]
    );

    const items = pageResult.rows.map(({ rank: _rank, ...product }) => product);
    const ranks = rank ? pageResult.rows.map(row => Number(row.rank)) : null;

    return { items, ranks, total };
  }

  async findActiveById(id: number): Promise<Product | null> {
    const result = await this.db.query<Product>(
      `SELECT ${PRODUCT_COLUMNS} FROM products p WHERE p.id = $1 AND p.is_active = TRUE`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async findVisibleById(id: number): Promise<Product | null> {
    const result = await this.db.query<Product>(
      `SELECT ${PRODUCT_COLUMNS}
       FROM products p
       JOIN categories c ON c.id = p.category_id
       WHERE p.id = $1 AND p.is_active = TRUE AND c.is_active = TRUE`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async lockActiveById(id: number): Promise<Product | null> {
    const result = await this.db.query<Product>(
      `SELECT ${PRODUCT_COLUMNS} FROM products p WHERE p.id = $1 AND p.is_active = TRUE FOR UPDATE`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async create(input: CreateProductInput): Promise<Product> {
    const result = await this.db.query<Product>(
      `INSERT INTO products (name, description, price, image_url, stock, category_id, seller_id)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${RETURNING_COLUMNS}`,
      [
        input.name,
        input.description,
        input.price,
        input.image_url,
        input.stock,
        input.category_id,
        input.seller_id,
      ]
    );
    return result.rows[0];
  }

  async update(id: number, input: ProductInput): Promise<Product> {
    const result = await this.db.query<Product>(
      `UPDATE products
       SET name = $1, description = $2, price = $3, image_url = $4, stock = $5,
           category_id = $6, updated_at = NOW()
       WHERE id = $7
       RETURNING ${RETURNING_COLUMNS}`,
      [
        input.name,
        input.description,
        input.price,
        input.image_url,
        input.stock,
        input.category_id,
        id,
      ]
    );
    return result.rows[0];
  }

  async deactivate(id: number): Promise<Product> {
    const result = await this.db.query<Product>(
      `UPDATE products
       SET is_active = FALSE, image_url = NULL, updated_at = NOW()
       WHERE id = $1
       RETURNING ${RETURNING_COLUMNS}`,
      [id]
    );
    return result.rows[0];
  }

  async updateRating(id: number, rating: number): Promise<void> {
    await this.db.query('UPDATE products SET rating = $1 WHERE id = $2', [rating, id]);
  }
}
