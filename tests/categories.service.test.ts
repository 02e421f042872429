import { describe, expect, it, vi } from 'vitest';
import { CategoriesService } from '../src/modules/categories/categories.service';
import { InvalidInputError, NotFoundError } from '../src/utils/errors';
import { MemoryUnitOfWork } from './helpers/memory-store';

const setup = () => {
  const uow = new MemoryUnitOfWork();
  return { uow, store: uow.store, service: new CategoriesService(uow) };
};

describe('CategoriesService', () => {
  it('rejects a category as its own parent before touching storage', async () => {
    const { uow, store, service } = setup();
    const category = store.seedCategory('Furniture');
    const runSpy = vi.spyOn(uow, 'run');

    await expect(service.update(category.id, { name: 'Furniture', parent_id: category.id }, 1))
      .rejects.toBeInstanceOf(InvalidInputError);

    expect(runSpy).not.toHaveBeenCalled();
    expect(store.state.categories[0]).toEqual(category);
  });

  it('requires an active parent on create and update', async () => {
    const { store, service } = setup();
    const inactive = store.seedCategory('Archive', null, false);
    const category = store.seedCategory('Garden');

    await expect(service.create({ name: 'Tools', parent_id: inactive.id }, 1))
      .rejects.toMatchObject({ statusCode: 400, code: 'INVALID_INPUT' });
    await expect(service.update(category.id, { name: 'Garden', parent_id: 999 }, 1))
      .rejects.toMatchObject({ statusCode: 400 });
  });

  it('returns a category with its ancestor path', async () => {
    const { store, service } = setup();
    const root = store.seedCategory('Home');
    const middle = store.seedCategory('Kitchen', root.id);
    const leaf = store.seedCategory('Knives', middle.id);

    const result = await service.get(leaf.id);

    expect(result.name).toBe('Knives');
    expect(result.path.map((c) => c.name)).toEqual(['Home', 'Kitchen']);
  });

  it('updates name and parent', async () => {
    const { store, service } = setup();
    const root = store.seedCategory('Outdoor');
    const child = store.seedCategory('Tents');

    const updated = await service.update(child.id, { name: 'Camping tents', parent_id: root.id }, 1);

    expect(updated).toEqual({ id: child.id, name: 'Camping tents', parent_id: root.id, is_active: true });
  });

  it('deactivates once and refuses a second time', async () => {
    const { store, service } = setup();
    const category = store.seedCategory('Toys');

    await service.deactivate(category.id, 1);
    expect(store.state.categories[0].is_active).toBe(false);

    await expect(service.deactivate(category.id, 1)).rejects.toBeInstanceOf(InvalidInputError);
    await expect(service.deactivate(12345, 1)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('hides inactive categories', async () => {
    const { store, service } = setup();
    store.seedCategory('Visible');
    const hidden = store.seedCategory('Hidden', null, false);

    expect((await service.list()).map((c) => c.name)).toEqual(['Visible']);
    await expect(service.get(hidden.id)).rejects.toBeInstanceOf(NotFoundError);
  });
});
