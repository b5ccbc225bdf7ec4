import { Test, TestingModule } from '@nestjs/testing';
import { CategoryController } from './category.controller';
import { DataCategoryHashMap } from './map/data-category-hash-map';
import { CategoryNotFoundException } from './exceptions/category.exceptions';
import {
  CATEGORY_LOOKUP,
  Category,
  DESCENDANT_QUERY,
} from './interfaces/category.interface';

const paths: Record<number, string> = {
  1: '1',
  2: '1/2',
  5: '1/2/5',
  6: '1/2/6',
  20: '1/20',
};

describe('CategoryController', () => {
  let controller: CategoryController;
  let hashMap: DataCategoryHashMap;
  const categoryLookup = {
    get: jest.fn(async (id: number): Promise<Category> => {
      const path = paths[id];
      if (!path) {
        throw new CategoryNotFoundException(id);
      }
      return { id, path, parentId: null, level: 0, name: null };
    }),
  };
  const descendantQuery = {
    findIdsByPathPrefix: jest.fn(async (prefix: string): Promise<number[]> =>
      Object.entries(paths)
        .filter(([, path]) => path === prefix || path.startsWith(`${prefix}/`))
        .map(([id]) => Number(id)),
    ),
  };

  beforeEach(async () => {
    categoryLookup.get.mockClear();
    descendantQuery.findIdsByPathPrefix.mockClear();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [CategoryController],
      providers: [
        DataCategoryHashMap,
        { provide: CATEGORY_LOOKUP, useValue: categoryLookup },
        { provide: DESCENDANT_QUERY, useValue: descendantQuery },
      ],
    }).compile();

    controller = module.get(CategoryController);
    hashMap = module.get(DataCategoryHashMap);
  });

  describe('getDescendants', () => {
    it('reports a miss and then a hit', async () => {
      await expect(controller.getDescendants(2)).resolves.toEqual({
        success: true,
        data: { categoryId: 2, descendantIds: [2, 5, 6], total: 3, cached: false },
        message: 'Category descendants fetched successfully',
      });

      const second = await controller.getDescendants(2);
      expect(second.data.cached).toBe(true);
      expect(descendantQuery.findIdsByPathPrefix).toHaveBeenCalledTimes(1);
    });

    it('propagates CategoryNotFoundException', async () => {
      await expect(controller.getDescendants(404)).rejects.toBeInstanceOf(
        CategoryNotFoundException,
      );
    });
  });

  describe('getDescendantsByKey', () => {
    it('returns the descendants when the position is populated', async () => {
      const result = await controller.getDescendantsByKey(1, 4);

      expect(result.data.descendantIds).toEqual([1, 2, 5, 6, 20]);
      expect(result.data.cached).toBeUndefined();
    });

    it('returns an empty list when the position is past the end', async () => {
      await expect(controller.getDescendantsByKey(2, 3)).resolves.toEqual({
        success: true,
        data: { categoryId: 2, descendantIds: [], total: 0 },
        message: 'Position 3 is empty for category 2',
      });
    });
  });

  describe('reset', () => {
    it('forces the next read to query again', async () => {
      await controller.getDescendants(2);

      expect(controller.reset(2)).toEqual({
        success: true,
        data: { reset: [2] },
        message: 'Cached descendants reset for category 2',
      });

      const result = await controller.getDescendants(2);
      expect(result.data.cached).toBe(false);
      expect(descendantQuery.findIdsByPathPrefix).toHaveBeenCalledTimes(2);
    });
  });

  describe('resetMany', () => {
    it('resets only the listed categories', async () => {
      await controller.getDescendants(1);
      await controller.getDescendants(2);
      await controller.getDescendants(5);

      expect(controller.resetMany({ ids: '1, 2,x' })).toEqual({
        success: true,
        data: { reset: [1, 2] },
        message: 'Cached descendants reset for 2 categories',
      });
      expect(hashMap.has(1)).toBe(false);
      expect(hashMap.has(2)).toBe(false);
      expect(hashMap.has(5)).toBe(true);
    });

    it('resets every entry when no ids are given', async () => {
      await controller.getDescendants(1);
      await controller.getDescendants(5);

      expect(controller.resetMany({})).toEqual({
        success: true,
        data: { reset: 'all' },
        message: 'All cached category descendants reset',
      });
      expect(hashMap.has(1)).toBe(false);
      expect(hashMap.has(5)).toBe(false);
    });
  });
});
