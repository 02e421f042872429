import { Queryable } from '../types';
import { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    // tsv: name weighted A, description weighted B, each under both the
    // english and russian text search configurations
    await db.query(`
      CREATE TABLE IF NOT EXISTS products (
        id SERIAL PRIMARY KEY,
        name VARCHAR(100) NOT NULL,
        description VARCHAR(500),
        price NUMERIC(10, 2) NOT NULL CHECK (price > 0),
        image_url VARCHAR(200),
        stock INTEGER NOT NULL CHECK (stock >= 0),
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        category_id INTEGER NOT NULL REFERENCES categories(id),
        seller_id INTEGER NOT NULL REFERENCES users(id),
        rating DOUBLE PRECISION NOT NULL DEFAULT 0,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        tsv TSVECTOR GENERATED ALWAYS AS (
          setweight(to_tsvector('english', COALESCE(name, '')), 'A')
          || setweight(to_tsvector('russian', COALESCE(name, '')), 'A')
          || setweight(to_tsvector('english', COALESCE(description, '')), 'B')
          || setweight(to_tsvector('russian', COALESCE(description, '')), 'B')
        ) STORED
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_products_tsv ON products USING GIN(tsv)
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_products_category ON products(category_id)
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_products_seller ON products(seller_id)
    `);
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_products_seller');
    await db.query('DROP INDEX IF EXISTS idx_products_category');
    await db.query('DROP INDEX IF EXISTS idx_products_tsv');
    await db.query('DROP TABLE IF EXISTS products CASCADE');
  },
};
