import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CATEGORY_LOOKUP,
  CategoryId,
  CategoryLookup,
  DESCENDANT_QUERY,
  DescendantQuery,
} from '../interfaces/category.interface';
import { HashMap } from './hash-map.interface';

/**
 * Holds, per category id, the ids of that category and all its subcategories.
 */
@Injectable()
export class DataCategoryHashMap implements HashMap<readonly CategoryId[]> {
  private readonly logger = new Logger(DataCategoryHashMap.name);

  private readonly hashMap = new Map<CategoryId, readonly CategoryId[]>();
  private readonly inflight = new Map<
    CategoryId,
    Promise<readonly CategoryId[]>
  >();

  constructor(
    @Inject(CATEGORY_LOOKUP)
    private readonly categoryLookup: CategoryLookup,
    @Inject(DESCENDANT_QUERY)
    private readonly descendantQuery: DescendantQuery,
  ) {}

  /**
   * Returns the id of the category and the ids of all its subcategories,
   * querying the store only on the first call per id.
   */
  async getAllData(categoryId: CategoryId): Promise<readonly CategoryId[]> {
    const cached = this.hashMap.get(categoryId);
    if (cached) {
      return cached;
    }

    const existing = this.inflight.get(categoryId);
    if (existing) {
      return existing;
    }

    const promise = this.getAllCategoryChildrenIds(categoryId);
    this.inflight.set(categoryId, promise);

    try {
      const ids = await promise;
      // A reset during the query drops the slot; the result is then stale.
      if (this.inflight.get(categoryId) === promise) {
        this.hashMap.set(categoryId, ids);
        this.logger.debug(
          `Cached ${ids.length} category ids for category ${categoryId}`,
        );
      }
      return ids;
    } finally {
      if (this.inflight.get(categoryId) === promise) {
        this.inflight.delete(categoryId);
      }
    }
  }

  /**
   * Returns the cached id list of `categoryId` when `key` is a populated
   * position in it, an empty list otherwise.
   */
  async getData(
    categoryId: CategoryId,
    key: number,
  ): Promise<readonly CategoryId[]> {
    const categorySpecificData = await this.getAllData(categoryId);
    if (
      Number.isInteger(key) &&
      key >= 0 &&
      key < categorySpecificData.length
    ) {
      return categorySpecificData;
    }

    return [];
  }

  resetData(categoryId: CategoryId): void {
    this.inflight.delete(categoryId);
    if (this.hashMap.delete(categoryId)) {
      this.logger.debug(`Reset category ids for category ${categoryId}`);
    }
  }

  resetAll(): void {
    const size = this.hashMap.size;
    this.inflight.clear();
    this.hashMap.clear();
    this.logger.debug(`Reset category ids for ${size} categories`);
  }

  has(categoryId: CategoryId): boolean {
    return this.hashMap.has(categoryId);
  }

  private async getAllCategoryChildrenIds(
    categoryId: CategoryId,
  ): Promise<readonly CategoryId[]> {
    const category = await this.categoryLookup.get(categoryId);
    const ids = await this.descendantQuery.findIdsByPathPrefix(category.path);
    return Object.freeze(ids);
  }
}
