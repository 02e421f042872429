import { Product } from '../../connections/db/models/product.model';
import { Review } from '../../connections/db/models/review.model';
import { Repositories, UnitOfWork } from '../../connections/db/unit-of-work';
import { ForbiddenError, InvalidInputError, NotFoundError } from '../../utils/errors';
import { auditLog, logger } from '../../utils/logging';
import { Page, toPage, toPageWindow } from '../../utils/pagination';
import { CategoryTree } from '../categories/category-tree';
import { MediaFile, MediaStorage } from '../upload/storage.service';
import { buildProductFilter, withCategoryIds } from './product-filters';
import { ProductListQuery, ProductPayload } from './products.validation';

export interface ProductListResult extends Page<Product> {
  /** Relevance of each item when searching, null otherwise */
  ranks: number[] | null;
}

const assertCategoryUsable = async ({ categories }: Repositories, categoryId: number) => {
  if (!(await categories.findActiveById(categoryId))) {
    throw new InvalidInputError('Category not found or inactive', { category_id: categoryId });
  }
};

const findOwnedProduct = async ({ products }: Repositories, id: number, sellerId: number) => {
  const product = await products.findActiveById(id);
  if (!product) {
    throw new NotFoundError('Product not found');
  }
  if (product.seller_id !== sellerId) {
    throw new ForbiddenError('You can only modify your own products');
  }
  return product;
};

export class ProductsService {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly storage: MediaStorage
  ) {}

  async list(query: ProductListQuery): Promise<ProductListResult> {
    const { page, page_size, include_subcategories, ...filterParams } = query;

    // Fails on an inverted price range before any query runs
    const filter = buildProductFilter(filterParams);
    const request = { page, page_size };

    return this.uow.run(async ({ categories, products }) => {
      let effective = filter;
      if (include_subcategories && filterParams.category_id !== undefined) {
        const tree = new CategoryTree(await categories.listActive());
        effective = withCategoryIds(filter, tree.descendants(filterParams.category_id));
      }

      const { items, ranks, total } = await products.list(effective, toPageWindow(request));
      return { ...toPage(request, items, total), ranks };
    });
  }

  async get(id: number): Promise<Product> {
    const product = await this.uow.run(({ products }) => products.findVisibleById(id));
    if (!product) {
      throw new NotFoundError('Product not found');
    }
    return product;
  }

  reviews(id: number): Promise<Review[]> {
    return this.uow.run(async ({ products, reviews }) => {
      if (!(await products.findActiveById(id))) {
        throw new NotFoundError('Product not found');
      }
      return reviews.listActiveByProduct(id);
    });
  }

  async create(payload: ProductPayload, sellerId: number, image?: MediaFile): Promise<Product> {
    const uploadedUrl = image ? await this.storage.store(image) : null;

    const product = await this.cleaningUpOnFailure(uploadedUrl, () =>
      this.uow.run(async (repos) => {
        await assertCategoryUsable(repos, payload.category_id);
        return repos.products.create({
          ...payload,
          image_url: uploadedUrl,
          seller_id: sellerId,
        });
      })
    );

    auditLog('PRODUCT_CREATED', { productId: product.id, sellerId });
    return product;
  }

  async update(id: number, payload: ProductPayload, sellerId: number, image?: MediaFile): Promise<Product> {
    const uploadedUrl = image ? await this.storage.store(image) : null;

    const [previous, updated] = await this.cleaningUpOnFailure(uploadedUrl, () =>
      this.uow.run(async (repos) => {
        const current = await findOwnedProduct(repos, id, sellerId);
        await assertCategoryUsable(repos, payload.category_id);
        const next = await repos.products.update(id, {
          ...payload,
          image_url: uploadedUrl ?? current.image_url,
        });
        return [current, next] as const;
      })
    );

    if (previous.image_url && previous.image_url !== updated.image_url) {
      await this.discard(previous.image_url);
    }

    auditLog('PRODUCT_UPDATED', { productId: id, sellerId });
    return updated;
  }

  async deactivate(id: number, sellerId: number): Promise<Product> {
    const [previous, deactivated] = await this.uow.run(async (repos) => {
      const current = await findOwnedProduct(repos, id, sellerId);
      return [current, await repos.products.deactivate(id)] as const;
    });

    if (previous.image_url) {
      await this.discard(previous.image_url);
    }

    auditLog('PRODUCT_DEACTIVATED', { productId: id, sellerId });
    return deactivated;
  }

  // A file stored for a write that did not commit is removed again
  private async cleaningUpOnFailure<T>(uploadedUrl: string | null, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (uploadedUrl) await this.discard(uploadedUrl);
      throw error;
    }
  }

  // Removal failures are logged, never rethrown
  private async discard(url: string): Promise<void> {
    try {
      await this.storage.remove(url);
    } catch (error) {
      logger.error('[Media] Failed to remove file', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
