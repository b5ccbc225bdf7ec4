import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DatabaseService } from '../database/database.service';
import { CategoryUtils } from '../common/utils/category.utils';
import {
  CategoryNotFoundException,
  CategoryQueryException,
} from './exceptions/category.exceptions';
import {
  Category,
  CategoryId,
  CategoryLookup,
} from './interfaces/category.interface';

interface CategoryRow {
  id: string;
  path: string;
  parent_id: string | null;
  level: number | null;
  name: string | null;
}

@Injectable()
export class CategoryRepository implements CategoryLookup {
  private readonly logger = new Logger(CategoryRepository.name);
  private readonly table: string;

  constructor(
    private readonly database: DatabaseService,
    configService: ConfigService,
  ) {
    this.table = CategoryUtils.quoteTableName(
      configService.get<string>('CATEGORY_TABLE') || 'category',
    );
  }

  async get(categoryId: CategoryId): Promise<Category> {
    let rows: CategoryRow[];
    try {
      const result = await this.database.query<CategoryRow>(
        `SELECT id, path, parent_id, level, name FROM ${this.table} WHERE id = $1`,
        [categoryId],
      );
      rows = result.rows;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Error fetching category ${categoryId}: ${reason}`);
      throw new CategoryQueryException(`get ${categoryId}`, reason);
    }

    const [row] = rows;
    if (!row) {
      this.logger.warn(`Category ${categoryId} not found`);
      throw new CategoryNotFoundException(categoryId);
    }

    try {
      return {
        id: CategoryUtils.toCategoryId(row.id),
        path: row.path,
        parentId: row.parent_id
          ? CategoryUtils.toCategoryId(row.parent_id)
          : null,
        level: row.level || 0,
        name: row.name,
      };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CategoryQueryException(`get ${categoryId}`, reason);
    }
  }
}
