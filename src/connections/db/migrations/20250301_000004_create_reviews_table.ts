import { Queryable } from '../types';
import { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS reviews (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id),
        product_id INTEGER NOT NULL REFERENCES products(id),
        comment VARCHAR(1000),
        comment_date TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        grade SMALLINT NOT NULL CHECK (grade BETWEEN 1 AND 5),
        is_active BOOLEAN NOT NULL DEFAULT TRUE
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_reviews_product_active ON reviews(product_id) WHERE is_active
    `);
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_reviews_product_active');
    await db.query('DROP TABLE IF EXISTS reviews CASCADE');
  },
};
