import { Logger } from '@nestjs/common';
import { CategoryId } from '../../category/interfaces/category.interface';

const SQL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export class CategoryUtils {
  private static readonly logger = new Logger(CategoryUtils.name);

  /**
   * Parse category IDs from a comma separated string
   */
  static parseCategoryIds(categoryIdsString?: string): CategoryId[] {
    if (!categoryIdsString || categoryIdsString.trim() === '') {
      return [];
    }

    return categoryIdsString
      .split(',')
      .map((id) => id.trim())
      .filter((id) => /^\d+$/.test(id))
      .map((id) => parseInt(id, 10))
      .filter((id) => this.isCategoryId(id))
      .filter((id, index, arr) => arr.indexOf(id) === index);
  }

  /**
   * Convert a driver value (bigint columns arrive as strings) to a CategoryId
   */
  static toCategoryId(value: string | number | bigint): CategoryId {
    const id = Number(value);
    if (!Number.isSafeInteger(id)) {
      this.logger.error(`Category id ${String(value)} is not a safe integer`);
      throw new RangeError(
        `Category id ${String(value)} is outside the safe integer range`,
      );
    }
    return id;
  }

  static isCategoryId(value: number): boolean {
    return Number.isSafeInteger(value) && value > 0;
  }

  /**
   * Quote a table name after checking it is a plain identifier
   */
  static quoteTableName(tableName: string): string {
    if (!SQL_IDENTIFIER.test(tableName)) {
      throw new Error(`Invalid category table name "${tableName}"`);
    }
    return `"${tableName}"`;
  }

  static escapeLikePattern(value: string): string {
    return value.replace(/[\\%_]/g, (char) => `\\${char}`);
  }
}
