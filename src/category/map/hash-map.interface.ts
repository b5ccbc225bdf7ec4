import { CategoryId } from '../interfaces/category.interface';

/**
 * Per-category memoized data. Entries are built on first read and live until
 * reset.
 */
export interface HashMap<T> {
  getAllData(categoryId: CategoryId): Promise<T>;

  getData(categoryId: CategoryId, key: number): Promise<T>;

  resetData(categoryId: CategoryId): void;
}
