import { Queryable } from '../../connections/db/types';
import { Category, CategoryInput } from '../../connections/db/models/category.model';

export interface CategoryRepository {
  listActive(): Promise<Category[]>;
  findById(id: number): Promise<Category | null>;
  findActiveById(id: number): Promise<Category | null>;
  create(input: CategoryInput): Promise<Category>;
  update(id: number, input: CategoryInput): Promise<Category>;
  deactivate(id: number): Promise<void>;
}

const CATEGORY_COLUMNS = 'id, name, parent_id, is_active';

export class PgCategoryRepository implements CategoryRepository {
  constructor(private readonly db: Queryable) {}

  async listActive(): Promise<Category[]> {
    const result = await this.db.query<Category>(
      `SELECT ${CATEGORY_COLUMNS} FROM categories WHERE is_active = TRUE ORDER BY id`
    );
    return result.rows;
  }

  async findById(id: number): Promise<Category | null> {
    const result = await this.db.query<Category>(
      `SELECT ${CATEGORY_COLUMNS} FROM categories WHERE id = $1`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async findActiveById(id: number): Promise<Category | null> {
    const result = await this.db.query<Category>(
      `SELECT ${CATEGORY_COLUMNS} FROM categories WHERE id = $1 AND is_active = TRUE`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async create(input: CategoryInput): Promise<Category> {
    const result = await this.db.query<Category>(
      `INSERT INTO categories (name, parent_id)
       VALUES ($1, $2)
       RETURNING ${CATEGORY_COLUMNS}`,
      [input.name, input.parent_id]
    );
    return result.rows[0];
  }

  async update(id: number, input: CategoryInput): Promise<Category> {
    const result = await this.db.query<Category>(
      `UPDATE categories SET name = $1, parent_id = $2
       WHERE id = $3
       RETURNING ${CATEGORY_COLUMNS}`,
      [input.name, input.parent_id, id]
    );
    return result.rows[0];
  }

  async deactivate(id: number): Promise<void> {
    await this.db.query('UPDATE categories SET is_active = FALSE WHERE id = $1', [id]);
  }
}
