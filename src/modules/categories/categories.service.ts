import { Category } from '../../connections/db/models/category.model';
import { Repositories, UnitOfWork } from '../../connections/db/unit-of-work';
import { InvalidInputError, NotFoundError } from '../../utils/errors';
import { auditLog } from '../../utils/logging';
import { CategoryPayload } from './categories.validation';
import { CategoryTree } from './category-tree';

export interface CategoryWithPath extends Category {
  /** Active ancestors, root first */
  path: Category[];
}

const assertParentUsable = async ({ categories }: Repositories, parentId: number | null) => {
  if (parentId === null) return;

  if (!(await categories.findActiveById(parentId))) {
    throw new InvalidInputError('Parent category not found or inactive', { parent_id: parentId });
  }
};

export class CategoriesService {
  constructor(private readonly uow: UnitOfWork) {}

  list(): Promise<Category[]> {
    return this.uow.run(({ categories }) => categories.listActive());
  }

  get(id: number): Promise<CategoryWithPath> {
    return this.uow.run(async ({ categories }) => {
      const tree = new CategoryTree(await categories.listActive());
      const category = tree.get(id);
      if (!category) {
        throw new NotFoundError('Category not found');
      }
      return { ...category, path: tree.ancestors(id) };
    });
  }

  /**
   * The category and all its active descendants; empty when the category is
   * not active
   */
  subtreeIds(id: number): Promise<number[]> {
    return this.uow.run(async ({ categories }) =>
      new CategoryTree(await categories.listActive()).descendants(id)
    );
  }

  async create(payload: CategoryPayload, actorId: number): Promise<Category> {
    const category = await this.uow.run(async (repos) => {
      await assertParentUsable(repos, payload.parent_id);
      return repos.categories.create(payload);
    });

    auditLog('CATEGORY_CREATED', { categoryId: category.id, actorId });
    return category;
  }

  async update(id: number, payload: CategoryPayload, actorId: number): Promise<Category> {
    // Rejected before anything is read or written
    if (payload.parent_id === id) {
      throw new InvalidInputError('A category cannot be its own parent', { parent_id: id });
    }

    const category = await this.uow.run(async (repos) => {
      if (!(await repos.categories.findActiveById(id))) {
        throw new NotFoundError('Category not found');
      }
      await assertParentUsable(repos, payload.parent_id);
      return repos.categories.update(id, payload);
    });

    auditLog('CATEGORY_UPDATED', { categoryId: id, actorId });
    return category;
  }

  async deactivate(id: number, actorId: number): Promise<void> {
    await this.uow.run(async ({ categories }) => {
      const category = await categories.findById(id);
      if (!category) {
        throw new NotFoundError('Category not found');
      }
      if (!category.is_active) {
        throw new InvalidInputError('Category is already inactive');
      }
      await categories.deactivate(id);
    });

    auditLog('CATEGORY_DEACTIVATED', { categoryId: id, actorId });
  }
}
