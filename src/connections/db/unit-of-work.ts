import { Queryable } from './types';
import { logger } from '../../utils/logging';
import { PgUserRepository, UserRepository } from '../../modules/users/users.repository';
import { CategoryRepository, PgCategoryRepository } from '../../modules/categories/categories.repository';
import { PgProductRepository, ProductRepository } from '../../modules/products/products.repository';
import { PgReviewRepository, ReviewRepository } from '../../modules/reviews/reviews.repository';
import { CartRepository, PgCartRepository } from '../../modules/cart/cart.repository';

export interface Repositories {
  users: UserRepository;
  categories: CategoryRepository;
  products: ProductRepository;
  reviews: ReviewRepository;
  cart: CartRepository;
}

/**
 * One atomic transaction boundary. Everything `work` does through the
 * repositories it is handed either commits together or rolls back together.
 */
export interface UnitOfWork {
  run<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
}

export interface TransactionClient extends Queryable {
  release(err?: Error | boolean): void;
}

// Satisfied by pg.Pool
export interface ConnectionSource extends Queryable {
  connect(): Promise<TransactionClient>;
}

export const createPgRepositories = (db: Queryable): Repositories => ({
  users: new PgUserRepository(db),
  categories: new PgCategoryRepository(db),
  products: new PgProductRepository(db),
  reviews: new PgReviewRepository(db),
  cart: new PgCartRepository(db),
});

export class PgUnitOfWork implements UnitOfWork {
  constructor(private readonly source: ConnectionSource) {}

  async run<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    const client = await this.source.connect();
    // A client whose ROLLBACK failed is destroyed instead of going back to the pool
    let broken: Error | undefined;

    try {
      await client.query('BEGIN');
      const result = await work(createPgRepositories(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        logger.error('Transaction rollback failed', { error: broken.message });
      }
      throw error;
    } finally {
      client.release(broken);
    }
  }

  async ping(): Promise<void> {
    await this.source.query('SELECT 1');
  }
}
