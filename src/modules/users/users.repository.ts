import { Queryable } from '../../connections/db/types';
import { CreateUserInput, User } from '../../connections/db/models/user.model';

export interface UserRepository {
  findByEmail(email: string): Promise<User | null>;
  findActiveById(id: number): Promise<User | null>;
  create(input: CreateUserInput): Promise<User>;
}

const USER_COLUMNS = 'id, email, hashed_password, role, is_active, created_at';

export class PgUserRepository implements UserRepository {
  constructor(private readonly db: Queryable) {}

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.db.query<User>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email]
    );
    return result.rows[0] ?? null;
  }

  async findActiveById(id: number): Promise<User | null> {
    const result = await this.db.query<User>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1 AND is_active = TRUE`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async create(input: CreateUserInput): Promise<User> {
    const result = await this.db.query<User>(
      `INSERT INTO users (email, hashed_password, role)
       VALUES ($1, $2, $3)
       RETURNING ${USER_COLUMNS}`,
      [input.email, input.hashed_password, input.role]
    );
    return result.rows[0];
  }
}
