import { Queryable } from '../../connections/db/types';
import { CreateReviewInput, Review, UpdateReviewInput } from '../../connections/db/models/review.model';

export interface ReviewRepository {
  /** Active reviews of active products */
  listActive(): Promise<Review[]>;
  listActiveByProduct(productId: number): Promise<Review[]>;
  /** Active review whose product is active too */
  findActiveById(id: number): Promise<Review | null>;
  create(input: CreateReviewInput): Promise<Review>;
  update(id: number, input: UpdateReviewInput): Promise<Review>;
  deactivate(id: number): Promise<void>;
  /** Mean grade of the product's active reviews, null when it has none */
  averageActiveGrade(productId: number): Promise<number | null>;
}

const REVIEW_COLUMNS = 'r.id, r.user_id, r.product_id, r.comment, r.comment_date, r.grade, r.is_active';

const RETURNING_COLUMNS = REVIEW_COLUMNS.replace(/r\./g, '');

export class PgReviewRepository implements ReviewRepository {
  constructor(private readonly db: Queryable) {}

  async listActive(): Promise<Review[]> {
    const result = await this.db.query<Review>(
      `SELECT ${REVIEW_COLUMNS}
       FROM reviews r
       JOIN products p ON p.id = r.product_id
       WHERE r.is_active = TRUE AND p.is_active = TRUE
       ORDER BY r.id`
    );
    return result.rows;
  }

  async listActiveByProduct(productId: number): Promise<Review[]> {
    const result = await this.db.query<Review>(
      `SELECT ${REVIEW_COLUMNS}
       FROM reviews r
       WHERE r.product_id = $1 AND r.is_active = TRUE
       ORDER BY r.id`,
      [productId]
    );
    return result.rows;
  }

  async findActiveById(id: number): Promise<Review | null> {
    const result = await this.db.query<Review>(
      `SELECT ${REVIEW_COLUMNS}
       FROM reviews r
       JOIN products p ON p.id = r.product_id
       WHERE r.id = $1 AND r.is_active = TRUE AND p.is_active = TRUE`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async create(input: CreateReviewInput): Promise<Review> {
    const result = await this.db.query<Review>(
      `INSERT INTO reviews (user_id, product_id, comment, grade)
       VALUES ($1, $2, $3, $4)
       RETURNING ${RETURNING_COLUMNS}`,
      [input.user_id, input.product_id, input.comment, input.grade]
    );
    return result.rows[0];
  }

  async update(id: number, input: UpdateReviewInput): Promise<Review> {
    const result = await this.db.query<Review>(
      `UPDATE reviews SET comment = $1, grade = $2, comment_date = NOW()
       WHERE id = $3
       RETURNING ${RETURNING_COLUMNS}`,
      [input.comment, input.grade, id]
    );
    return result.rows[0];
  }

  async deactivate(id: number): Promise<void> {
    await this.db.query('UPDATE reviews SET is_active = FALSE WHERE id = $1', [id]);
  }

  async averageActiveGrade(productId: number): Promise<number | null> {
    const result = await this.db.query<{ average: number | null }>(
      `SELECT AVG(grade)::float8 AS average
       FROM reviews
       WHERE product_id = $1 AND is_active = TRUE`,
      [productId]
    );
    return result.rows[0]?.average ?? null;
  }
}
