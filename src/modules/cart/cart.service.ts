import { CartLine } from '../../connections/db/models/cart-item.model';
import { Repositories, UnitOfWork } from '../../connections/db/unit-of-work';
import { InvalidInputError, NotFoundError } from '../../utils/errors';
import { formatCents, toCents } from '../../utils/money';
import { AddCartItemPayload, MAX_CART_QUANTITY } from './cart.validation';

export interface CartView {
  items: CartLine[];
  total_quantity: number;
  /** Two-decimal string, e.g. "37.50" */
  total_price: string;
}

/**
 * Totals computed at read time; a line whose product has no price counts as 0
 */
export const summarizeCart = (lines: CartLine[]): CartView => {
  let totalQuantity = 0;
  let totalCents = 0;

  for (const line of lines) {
    totalQuantity += line.quantity;
    totalCents += line.quantity * toCents(line.product.price);
  }

  return {
    items: lines,
    total_quantity: totalQuantity,
    total_price: formatCents(totalCents),
  };
};

const assertProductActive = async ({ products }: Repositories, productId: number) => {
  if (!(await products.findActiveById(productId))) {
    throw new NotFoundError('Product not found or inactive');
  }
};

const readLine = async ({ cart }: Repositories, userId: number, productId: number) => {
  const line = await cart.findLine(userId, productId);
  if (!line) {
    throw new NotFoundError('Cart item not found');
  }
  return line;
};

export class CartService {
  constructor(private readonly uow: UnitOfWork) {}

  view(userId: number): Promise<CartView> {
    return this.uow.run(async ({ cart }) => summarizeCart(await cart.listByUser(userId)));
  }

  /**
   * Adds to the existing line for the product or creates it, and returns the
   * merged line with its product snapshot
   */
  add(userId: number, payload: AddCartItemPayload): Promise<CartLine> {
    const { product_id, quantity } = payload;

    return this.uow.run(async (repos) => {
      await assertProductActive(repos, product_id);

      const existing = await repos.cart.findLine(userId, product_id);
      if (existing && existing.quantity + quantity > MAX_CART_QUANTITY) {
        throw new InvalidInputError('Cart quantity is too large', {
          quantity: existing.quantity + quantity,
          max: MAX_CART_QUANTITY,
        });
      }

      await repos.cart.addQuantity(userId, product_id, quantity);
      return readLine(repos, userId, product_id);
    });
  }

  setQuantity(userId: number, productId: number, quantity: number): Promise<CartLine> {
    return this.uow.run(async (repos) => {
      await assertProductActive(repos, productId);

      if (!(await repos.cart.setQuantity(userId, productId, quantity))) {
        throw new NotFoundError('Cart item not found');
      }
      return readLine(repos, userId, productId);
    });
  }

  remove(userId: number, productId: number): Promise<void> {
    return this.uow.run(async ({ cart }) => {
      if (!(await cart.remove(userId, productId))) {
        throw new NotFoundError('Cart item not found');
      }
    });
  }

  clear(userId: number): Promise<void> {
    return this.uow.run(({ cart }) => cart.clear(userId));
  }
}
