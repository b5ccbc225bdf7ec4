import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DatabaseService } from '../database/database.service';
import { CategoryUtils } from '../common/utils/category.utils';
import { CategoryQueryException } from './exceptions/category.exceptions';
import {
  CATEGORY_PATH_SEPARATOR,
  CategoryId,
  DescendantQuery,
} from './interfaces/category.interface';

@Injectable()
export class CategoryResource implements DescendantQuery {
  private readonly logger = new Logger(CategoryResource.name);
  private readonly table: string;

  constructor(
    private readonly database: DatabaseService,
    configService: ConfigService,
  ) {
    this.table = CategoryUtils.quoteTableName(
      configService.get<string>('CATEGORY_TABLE') || 'category',
    );
  }

  async findIdsByPathPrefix(prefix: string): Promise<CategoryId[]> {
    // "1/2" must not pick up "1/20", so match the path itself or path + separator.
    const below =
      CategoryUtils.escapeLikePattern(prefix + CATEGORY_PATH_SEPARATOR) + '%';

    try {
      const result = await this.database.query<{ id: string }>(
        `SELECT id FROM ${this.table} WHERE path = $1 OR path LIKE $2 ESCAPE '\\'`,
        [prefix, below],
      );
      return result.rows.map((row) => CategoryUtils.toCategoryId(row.id));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Error fetching descendants for path "${prefix}": ${reason}`,
      );
      throw new CategoryQueryException(`descendants of "${prefix}"`, reason);
    }
  }
}
