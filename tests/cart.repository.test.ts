import { describe, expect, it, vi } from 'vitest';
import { PgCartRepository } from '../src/modules/cart/cart.repository';

describe('PgCartRepository', () => {
  it('adds quantity with a single upsert on (user_id, product_id)', async () => {
    const line = { id: 1, user_id: 2, product_id: 3, quantity: 5, created_at: new Date(), updated_at: new Date() };
    const query = vi.fn().mockResolvedValue({ rows: [line], rowCount: 1 });
    const repo = new PgCartRepository({ query });

    const result = await repo.addQuantity(2, 3, 2);

    expect(query).toHaveBeenCalledTimes(1);
    const [sql, values] = query.mock.calls[0];
    expect(sql).toContain('ON CONFLICT (user_id, product_id)');
    expect(sql).toContain('DO UPDATE SET quantity = cart_items.quantity + EXCLUDED.quantity');
    expect(values).toEqual([2, 3, 2]);
    expect(result).toEqual(line);
  });

  it('maps joined rows onto lines with a product snapshot', async () => {
    const created = new Date('2025-03-01T00:00:00Z');
    const query = vi.fn().mockResolvedValue({
      rows: [
        {
          id: 10,
          user_id: 2,
          product_id: 3,
          quantity: 4,
          created_at: created,
          updated_at: created,
          product_name: 'Lamp',
          product_price: '12.50',
          product_image_url: null,
          product_stock: 8,
          product_is_active: true,
        },
      ],
      rowCount: 1,
    });
    const repo = new PgCartRepository({ query });

    const lines = await repo.listByUser(2);

    expect(lines).toEqual([
      {
        id: 10,
        user_id: 2,
        product_id: 3,
        quantity: 4,
        created_at: created,
        updated_at: created,
        product: { id: 3, name: 'Lamp', price: '12.50', image_url: null, stock: 8, is_active: true },
      },
    ]);
    expect(query.mock.calls[0][0]).toContain('ORDER BY ci.id');
  });

  it('reads one joined line for a product, or null', async () => {
    const query = vi.fn().mockResolvedValue({ rows: [], rowCount: 0 });
    const repo = new PgCartRepository({ query });

    expect(await repo.findLine(2, 3)).toBeNull();

    const [sql, values] = query.mock.calls[0];
    expect(sql).toContain('JOIN products p ON p.id = ci.product_id');
    expect(sql).toContain('WHERE ci.user_id = $1 AND ci.product_id = $2');
    expect(values).toEqual([2, 3]);
  });

  it('reports whether a line was removed', async () => {
    const query = vi.fn()
      .mockResolvedValueOnce({ rows: [], rowCount: 1 })
      .mockResolvedValueOnce({ rows: [], rowCount: 0 });
    const repo = new PgCartRepository({ query });

    expect(await repo.remove(2, 3)).toBe(true);
    expect(await repo.remove(2, 3)).toBe(false);
  });
});
