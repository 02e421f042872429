import { Queryable } from '../../connections/db/types';
import { CartItem, CartLine } from '../../connections/db/models/cart-item.model';

export interface CartRepository {
  listByUser(userId: number): Promise<CartLine[]>;
  findLine(userId: number, productId: number): Promise<CartLine | null>;
  /** Inserts the line or adds to its quantity in one statement */
  addQuantity(userId: number, productId: number, quantity: number): Promise<CartItem>;
  setQuantity(userId: number, productId: number, quantity: number): Promise<CartItem | null>;
  remove(userId: number, productId: number): Promise<boolean>;
  clear(userId: number): Promise<void>;
}

const CART_COLUMNS = 'id, user_id, product_id, quantity, created_at, updated_at';

interface CartLineRow extends CartItem {
  product_name: string;
  product_price: string | null;
  product_image_url: string | null;
  product_stock: number;
  product_is_active: boolean;
}

const toCartLine = (row: CartLineRow): CartLine => ({
  id: row.id,
  user_id: row.user_id,
  product_id: row.product_id,
  quantity: row.quantity,
  created_at: row.created_at,
  updated_at: row.updated_at,
  product: {
    id: row.product_id,
    name: row.product_name,
    price: row.product_price,
    image_url: row.product_image_url,
    stock: row.product_stock,
    is_active: row.product_is_active,
  },
});

const CART_LINE_SELECT = `SELECT ci.id, ci.user_id, ci.product_id, ci.quantity, ci.created_at, ci.updated_at,
         p.name AS product_name,
         p.price AS product_price,
         p.image_url AS product_image_url,
         p.stock AS product_stock,
         p.is_active AS product_is_active
  FROM cart_items ci
  JOIN products p ON p.id = ci.product_id`;

export class PgCartRepository implements CartRepository {
  constructor(private readonly db: Queryable) {}

  async listByUser(userId: number): Promise<CartLine[]> {
    const result = await this.db.query<CartLineRow>(
      `${CART_LINE_SELECT}
  WHERE ci.user_id = $1
  ORDER BY ci.id`,
      [userId]
    );
    return result.rows.map(toCartLine);
  }

  async findLine(userId: number, productId: number): Promise<CartLine | null> {
    const result = await this.db.query<CartLineRow>(
      `${CART_LINE_SELECT}
  WHERE ci.user_id = $1 AND ci.product_id = $2`,
      [userId, productId]
    );
    const row = result.rows[0];
    return row ? toCartLine(row) : null;
  }

  async addQuantity(userId: number, productId: number, quantity: number): Promise<CartItem> {
    const result = await this.db.query<CartItem>(
      `INSERT INTO cart_items (user_id, product_id, quantity)
       VALUES ($1, $2, $3)
       ON CONFLICT (user_id, product_id)
       DO UPDATE SET quantity = cart_items.quantity + EXCLUDED.quantity, updated_at = NOW()
       RETURNING ${CART_COLUMNS}`,
      [userId, productId, quantity]
    );
    return result.rows[0];
  }

  async setQuantity(userId: number, productId: number, quantity: number): Promise<CartItem | null> {
    const result = await this.db.query<CartItem>(
      `UPDATE cart_items SET quantity = $1, updated_at = NOW()
       WHERE user_id = $2 AND product_id = $3
       RETURNING ${CART_COLUMNS}`,
      [quantity, userId, productId]
    );
    return result.rows[0] ?? null;
  }

  async remove(userId: number, productId: number): Promise<boolean> {
    const result = await this.db.query(
      'DELETE FROM cart_items WHERE user_id = $1 AND product_id = $2',
      [userId, productId]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async clear(userId: number): Promise<void> {
    await this.db.query('DELETE FROM cart_items WHERE user_id = $1', [userId]);
  }
}
