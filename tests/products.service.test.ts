import { describe, expect, it, vi } from 'vitest';
import { ProductsService } from '../src/modules/products/products.service';
import { productListQuerySchema } from '../src/modules/products/products.validation';
import { ForbiddenError, InvalidInputError, NotFoundError } from '../src/utils/errors';
import { MemoryMediaStorage, MemoryUnitOfWork } from './helpers/memory-store';

const image = { buffer: Buffer.from('png-bytes'), originalname: 'lamp.png', mimetype: 'image/png' };

const setup = () => {
  const uow = new MemoryUnitOfWork();
  const store = uow.store;
  const storage = new MemoryMediaStorage();
  const seller = store.seedUser('seller@example.com', 'seller');
  const rival = store.seedUser('rival@example.com', 'seller');
  const home = store.seedCategory('Home');
  const kitchen = store.seedCategory('Kitchen', home.id);
  return { uow, store, storage, seller, rival, home, kitchen, service: new ProductsService(uow, storage) };
};

const query = (params: Record<string, string>) => productListQuerySchema.parse(params);

const payload = (category_id: number) => ({
  name: 'Table lamp',
  description: null,
  price: 24.5,
  stock: 3,
  category_id,
});

describe('ProductsService.list', () => {
  it('pages through active products with a stable total', async () => {
    const { store, seller, home, service } = setup();
    for (let i = 1; i <= 5; i++) {
      store.seedProduct({ name: `Item ${i}`, category_id: home.id, seller_id: seller.id });
    }
    store.seedProduct({ name: 'Retired', category_id: home.id, seller_id: seller.id, is_active: false });

    const first = await service.list(query({ page: '1', page_size: '2' }));
    const last = await service.list(query({ page: '3', page_size: '2' }));

    expect(first.items.map((p) => p.name)).toEqual(['Item 1', 'Item 2']);
    expect(first.total).toBe(5);
    expect(last.items.map((p) => p.name)).toEqual(['Item 5']);
    expect(last.total).toBe(5);
    expect(last).toMatchObject({ page: 3, page_size: 2, ranks: null });
  });

  it('returns an empty page past the end', async () => {
    const { store, seller, home, service } = setup();
    store.seedProduct({ name: 'Only', category_id: home.id, seller_id: seller.id });

    const result = await service.list(query({ page: '4', page_size: '10' }));

    expect(result.items).toEqual([]);
    expect(result.total).toBe(1);
  });

  it('ranks search matches and reports one rank per item', async () => {
    const { store, seller, home, service } = setup();
    store.seedProduct({ name: 'Garden chair', category_id: home.id, seller_id: seller.id });
    store.seedProduct({ name: 'Oak table', description: 'pairs with any chair', category_id: home.id, seller_id: seller.id });
    store.seedProduct({ name: 'Chair cushion', category_id: home.id, seller_id: seller.id });
    store.seedProduct({ name: 'Rug', category_id: home.id, seller_id: seller.id });

    const result = await service.list(query({ search: ' chair ' }));

    expect(result.items.map((p) => p.name)).toEqual(['Garden chair', 'Chair cushion', 'Oak table']);
    expect(result.ranks).toEqual([1, 1, 0.4]);
    expect(result.total).toBe(3);
  });

  it('rejects an inverted price range without running a unit of work', async () => {
    const { uow, service } = setup();
    const runSpy = vi.spyOn(uow, 'run');

    await expect(service.list(query({ min_price: '100', max_price: '50' }))).rejects.toBeInstanceOf(InvalidInputError);
    expect(runSpy).not.toHaveBeenCalled();
  });

  it('expands a category to its subcategories on request', async () => {
    const { store, seller, home, kitchen, service } = setup();
    store.seedProduct({ name: 'Sofa', category_id: home.id, seller_id: seller.id });
    store.seedProduct({ name: 'Kettle', category_id: kitchen.id, seller_id: seller.id });

    const direct = await service.list(query({ category_id: String(home.id) }));
    const expanded = await service.list(query({ category_id: String(home.id), include_subcategories: 'true' }));

    expect(direct.items.map((p) => p.name)).toEqual(['Sofa']);
    expect(expanded.items.map((p) => p.name)).toEqual(['Sofa', 'Kettle']);
  });

  it('leaves out products whose category is inactive', async () => {
    const { store, seller, home, kitchen, service } = setup();
    store.seedProduct({ name: 'Sofa', category_id: home.id, seller_id: seller.id });
    const hidden = store.seedProduct({ name: 'Kettle', category_id: kitchen.id, seller_id: seller.id });
    store.state.categories[1].is_active = false;

    const result = await service.list(query({}));

    expect(result.items.map((p) => p.name)).toEqual(['Sofa']);
    expect(result.total).toBe(1);
    await expect(service.get(hidden.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('combines price, stock and seller filters', async () => {
    const { store, seller, rival, home, service } = setup();
    store.seedProduct({ name: 'Cheap', price: '5.00', category_id: home.id, seller_id: seller.id });
    store.seedProduct({ name: 'Mid', price: '25.00', category_id: home.id, seller_id: seller.id });
    store.seedProduct({ name: 'Mid sold out', price: '25.00', stock: 0, category_id: home.id, seller_id: seller.id });
    store.seedProduct({ name: 'Mid rival', price: '25.00', category_id: home.id, seller_id: rival.id });

    const inStock = await service.list(
      query({ min_price: '10', max_price: '30', in_stock: 'true', seller_id: String(seller.id) })
    );
    const soldOut = await service.list(query({ in_stock: 'false' }));

    expect(inStock.items.map((p) => p.name)).toEqual(['Mid']);
    expect(soldOut.items.map((p) => p.name)).toEqual(['Mid sold out']);
  });
});

describe('ProductsService writes', () => {
  it('creates a product with an uploaded image', async () => {
    const { seller, home, storage, service } = setup();

    const product = await service.create(payload(home.id), seller.id, image);

    expect(product).toMatchObject({ name: 'Table lamp', price: '24.50', seller_id: seller.id, rating: 0 });
    expect(product.image_url).toBe('/media/1-lamp.png');
    expect(storage.stored).toEqual(['/media/1-lamp.png']);
  });

  it('removes the stored image when the insert is rejected', async () => {
    const { home, store, storage, seller, service } = setup();
    store.state.categories[0].is_active = false;

    await expect(service.create(payload(home.id), seller.id, image)).rejects.toMatchObject({ statusCode: 400 });
    expect(storage.removed).toEqual(['/media/1-lamp.png']);
    expect(store.state.products).toEqual([]);
  });

  it('lets only the owning seller update or delete', async () => {
    const { store, seller, rival, home, service } = setup();
    const product = store.seedProduct({ name: 'Stool', category_id: home.id, seller_id: seller.id });

    await expect(service.update(product.id, payload(home.id), rival.id)).rejects.toBeInstanceOf(ForbiddenError);
    await expect(service.deactivate(product.id, rival.id)).rejects.toBeInstanceOf(ForbiddenError);
    await expect(service.update(999, payload(home.id), seller.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('replaces the image and discards the old one after commit', async () => {
    const { store, storage, seller, home, service } = setup();
    const product = store.seedProduct({
      name: 'Stool',
      category_id: home.id,
      seller_id: seller.id,
      image_url: '/media/old.png',
    });

    const updated = await service.update(product.id, payload(home.id), seller.id, image);

    expect(updated.image_url).toBe('/media/1-lamp.png');
    expect(updated.price).toBe('24.50');
    expect(storage.removed).toEqual(['/media/old.png']);
  });

  it('keeps the stored image when an update carries no file', async () => {
    const { store, storage, seller, home, service } = setup();
    const product = store.seedProduct({
      name: 'Stool',
      category_id: home.id,
      seller_id: seller.id,
      image_url: '/media/stool.png',
    });

    const updated = await service.update(product.id, { ...payload(home.id), price: 17 }, seller.id);

    expect(updated.price).toBe('17.00');
    expect(updated.image_url).toBe('/media/stool.png');
    expect(storage.removed).toEqual([]);
  });

  it('soft deletes and clears the image', async () => {
    const { store, storage, seller, home, service } = setup();
    const product = store.seedProduct({
      name: 'Stool',
      category_id: home.id,
      seller_id: seller.id,
      image_url: '/media/stool.png',
    });

    const removed = await service.deactivate(product.id, seller.id);

    expect(removed).toMatchObject({ is_active: false, image_url: null });
    expect(storage.removed).toEqual(['/media/stool.png']);
    await expect(service.get(product.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('hides products whose category is inactive', async () => {
    const { store, seller, home, service } = setup();
    const product = store.seedProduct({ name: 'Vase', category_id: home.id, seller_id: seller.id });

    expect((await service.get(product.id)).name).toBe('Vase');

    store.state.categories[0].is_active = false;
    await expect(service.get(product.id)).rejects.toBeInstanceOf(NotFoundError);
  });
});
