export type CategoryId = number;

export const CATEGORY_PATH_SEPARATOR = '/';

export interface Category {
  id: CategoryId;
  path: string;
  parentId: CategoryId | null;
  level: number;
  name: string | null;
}

export interface CategoryLookup {
  get(categoryId: CategoryId): Promise<Category>;
}

/**
 * Returns ids of every category whose path is `prefix` itself or lies below
 * it. Ordering is whatever the store returns.
 */
export interface DescendantQuery {
  findIdsByPathPrefix(prefix: string): Promise<CategoryId[]>;
}

export const CATEGORY_LOOKUP = Symbol('CATEGORY_LOOKUP');
export const DESCENDANT_QUERY = Symbol('DESCENDANT_QUERY');
