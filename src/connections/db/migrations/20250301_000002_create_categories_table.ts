import { Queryable } from '../types';
import { Migration } from './types';

export const migration: Migration = {
  async up(db: Queryable) {
    await db.query(`
      CREATE TABLE IF NOT EXISTS categories (
        id SERIAL PRIMARY KEY,
        name VARCHAR(50) NOT NULL,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        parent_id INTEGER REFERENCES categories(id)
      )
    `);

    await db.query(`
      CREATE INDEX IF NOT EXISTS idx_categories_parent ON categories(parent_id)
    `);
  },

  async down(db: Queryable) {
    await db.query('DROP INDEX IF EXISTS idx_categories_parent');
    await db.query('DROP TABLE IF EXISTS categories CASCADE');
  },
};
