import { Category } from '../../connections/db/models/category.model';

/**
 * Categories held by id with `parent_id` as the only link. Walks are
 * iterative and track visited ids, so a cycle stored in the table ends the
 * walk instead of looping.
 */
export class CategoryTree {
  private readonly byId = new Map<number, Category>();
  private readonly childrenOf = new Map<number, number[]>();

  constructor(categories: Category[]) {
    for (const category of categories) {
      this.byId.set(category.id, category);
    }

    for (const category of categories) {
      if (category.parent_id === null || !this.byId.has(category.parent_id)) {
        continue;
      }
      const siblings = this.childrenOf.get(category.parent_id) ?? [];
      siblings.push(category.id);
      this.childrenOf.set(category.parent_id, siblings);
    }
  }

  get(id: number): Category | undefined {
    return this.byId.get(id);
  }

  /**
   * Path from the root down to the category's parent
   */
  ancestors(id: number): Category[] {
    const path: Category[] = [];
    const visited = new Set<number>([id]);
    let parentId = this.byId.get(id)?.parent_id ?? null;

    while (parentId !== null && !visited.has(parentId)) {
      const parent = this.byId.get(parentId);
      if (!parent) break;

      visited.add(parentId);
      path.push(parent);
      parentId = parent.parent_id;
    }

    return path.reverse();
  }

  /**
   * The category itself followed by every category below it, breadth first
   */
  descendants(id: number): number[] {
    if (!this.byId.has(id)) {
      return [];
    }

    const result: number[] = [];
    const visited = new Set<number>();
    const queue = [id];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || visited.has(current)) continue;

      visited.add(current);
      result.push(current);
      queue.push(...(this.childrenOf.get(current) ?? []));
    }

    return result;
  }
}
