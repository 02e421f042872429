import { describe, expect, it } from 'vitest';
import { CartLine } from '../src/connections/db/models/cart-item.model';
import { CartService, summarizeCart } from '../src/modules/cart/cart.service';
import { addCartItemSchema, MAX_CART_QUANTITY, setCartQuantitySchema } from '../src/modules/cart/cart.validation';
import { InvalidInputError, NotFoundError } from '../src/utils/errors';
import { MemoryUnitOfWork } from './helpers/memory-store';

const setup = () => {
  const uow = new MemoryUnitOfWork();
  const store = uow.store;
  const buyer = store.seedUser('buyer@example.com');
  const seller = store.seedUser('seller@example.com', 'seller');
  const category = store.seedCategory('Lighting');
  const lamp = store.seedProduct({ name: 'Desk lamp', category_id: category.id, seller_id: seller.id, price: '12.50' });
  const bulb = store.seedProduct({ name: 'Bulb', category_id: category.id, seller_id: seller.id, price: '2.25' });
  return { uow, store, buyer, lamp, bulb, service: new CartService(uow) };
};

describe('CartService', () => {
  it('merges repeated adds into one line', async () => {
    const { store, buyer, lamp, service } = setup();

    await service.add(buyer.id, { product_id: lamp.id, quantity: 2 });
    const merged = await service.add(buyer.id, { product_id: lamp.id, quantity: 3 });

    expect(merged.quantity).toBe(5);
    expect(merged.product).toEqual({
      id: lamp.id,
      name: 'Desk lamp',
      price: '12.50',
      image_url: null,
      stock: 5,
      is_active: true,
    });
    expect(store.state.cartItems.filter((ci) => ci.user_id === buyer.id)).toHaveLength(1);
  });

  it('refuses a merge past the largest storable quantity', async () => {
    const { store, buyer, lamp, service } = setup();
    await service.add(buyer.id, { product_id: lamp.id, quantity: MAX_CART_QUANTITY - 1 });

    await expect(service.add(buyer.id, { product_id: lamp.id, quantity: 2 })).rejects.toBeInstanceOf(InvalidInputError);
    expect(store.state.cartItems[0].quantity).toBe(MAX_CART_QUANTITY - 1);
  });

  it('refuses inactive or unknown products', async () => {
    const { store, buyer, lamp, service } = setup();
    store.state.products[0].is_active = false;

    await expect(service.add(buyer.id, { product_id: lamp.id, quantity: 1 })).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.add(buyer.id, { product_id: 999, quantity: 1 })).rejects.toBeInstanceOf(NotFoundError);
    expect(store.state.cartItems).toEqual([]);
  });

  it('sets a quantity only on an existing line', async () => {
    const { buyer, lamp, bulb, service } = setup();
    await service.add(buyer.id, { product_id: lamp.id, quantity: 1 });

    const updated = await service.setQuantity(buyer.id, lamp.id, 7);
    expect(updated.quantity).toBe(7);
    expect(updated.product.name).toBe('Desk lamp');
    await expect(service.setQuantity(buyer.id, bulb.id, 2)).rejects.toThrow('Cart item not found');
  });

  it('checks the product before the line when setting a quantity', async () => {
    const { buyer, service } = setup();
    await expect(service.setQuantity(buyer.id, 999, 2)).rejects.toThrow('Product not found or inactive');
  });

  it('removes a line and reports a missing one', async () => {
    const { buyer, lamp, service } = setup();
    await service.add(buyer.id, { product_id: lamp.id, quantity: 1 });

    await service.remove(buyer.id, lamp.id);
    await expect(service.remove(buyer.id, lamp.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('clears idempotently', async () => {
    const { buyer, lamp, bulb, service } = setup();
    await service.add(buyer.id, { product_id: lamp.id, quantity: 1 });
    await service.add(buyer.id, { product_id: bulb.id, quantity: 4 });

    await service.clear(buyer.id);
    await service.clear(buyer.id);

    expect((await service.view(buyer.id)).items).toEqual([]);
  });

  it('totals quantities and prices at read time', async () => {
    const { buyer, lamp, bulb, service } = setup();
    await service.add(buyer.id, { product_id: lamp.id, quantity: 2 });
    await service.add(buyer.id, { product_id: bulb.id, quantity: 3 });

    const view = await service.view(buyer.id);

    expect(view.items.map((line) => line.product.name)).toEqual(['Desk lamp', 'Bulb']);
    expect(view.total_quantity).toBe(5);
    expect(view.total_price).toBe('31.75');
  });
});

describe('cart payloads', () => {
  it('bounds quantities by the storable maximum', () => {
    expect(addCartItemSchema.safeParse({ product_id: 1, quantity: 3_000_000_000 }).success).toBe(false);
    expect(setCartQuantitySchema.safeParse({ quantity: 3_000_000_000 }).success).toBe(false);
    expect(addCartItemSchema.parse({ product_id: 1, quantity: MAX_CART_QUANTITY }).quantity).toBe(MAX_CART_QUANTITY);
  });
});

describe('summarizeCart', () => {
  it('counts a missing price as zero', () => {
    const line = (id: number, quantity: number, price: string | null): CartLine => ({
      id,
      user_id: 1,
      product_id: id,
      quantity,
      created_at: new Date(0),
      updated_at: new Date(0),
      product: { id, name: `P${id}`, price, image_url: null, stock: 1, is_active: true },
    });

    const view = summarizeCart([line(1, 2, null), line(2, 3, '0.10')]);

    expect(view.total_quantity).toBe(5);
    expect(view.total_price).toBe('0.30');
  });

  it('summarizes an empty cart', () => {
    expect(summarizeCart([])).toEqual({ items: [], total_quantity: 0, total_price: '0.00' });
  });
});
