import { CategoryUtils } from './category.utils';

describe('CategoryUtils', () => {
  describe('parseCategoryIds', () => {
    it('keeps positive ids once, in order', () => {
      expect(CategoryUtils.parseCategoryIds('3,1, 3,abc,0,-2, 7')).toEqual([
        3, 1, 7,
      ]);
    });

    it('returns an empty list for blank input', () => {
      expect(CategoryUtils.parseCategoryIds(undefined)).toEqual([]);
      expect(CategoryUtils.parseCategoryIds('   ')).toEqual([]);
    });
  });

  it('converts driver ids to numbers', () => {
    expect(CategoryUtils.toCategoryId('42')).toBe(42);
    expect(CategoryUtils.toCategoryId(BigInt(7))).toBe(7);
  });

  it('refuses ids that would be rounded', () => {
    expect(() => CategoryUtils.toCategoryId('9007199254740993')).toThrow(
      'Category id 9007199254740993 is outside the safe integer range',
    );
    expect(() => CategoryUtils.toCategoryId('9007199254740992')).toThrow(
      RangeError,
    );
  });

  it('drops unsafe ids from id lists', () => {
    expect(
      CategoryUtils.parseCategoryIds('5,9007199254740993,9007199254740991'),
    ).toEqual([5, 9007199254740991]);
  });

  describe('quoteTableName', () => {
    it('quotes plain identifiers', () => {
      expect(CategoryUtils.quoteTableName('catalog_category_entity')).toBe(
        '"catalog_category_entity"',
      );
    });

    it('rejects anything else', () => {
      expect(() => CategoryUtils.quoteTableName('category; drop')).toThrow(
        'Invalid category table name "category; drop"',
      );
    });
  });

  it('escapes LIKE wildcards and the escape character', () => {
    expect(CategoryUtils.escapeLikePattern('1_2%\\')).toBe('1\\_2\\%\\\\');
  });
});
