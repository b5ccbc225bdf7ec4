import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CategoryController } from './category.controller';
import { CategoryRepository } from './category.repository';
import { CategoryResource } from './category.resource';
import { DataCategoryHashMap } from './map/data-category-hash-map';
import {
  CATEGORY_LOOKUP,
  DESCENDANT_QUERY,
} from './interfaces/category.interface';
import { DatabaseModule } from '../database/database.module';

@Module({
  imports: [ConfigModule, DatabaseModule],
  controllers: [CategoryController],
  providers: [
    { provide: CATEGORY_LOOKUP, useClass: CategoryRepository },
    { provide: DESCENDANT_QUERY, useClass: CategoryResource },
    DataCategoryHashMap,
  ],
  exports: [DataCategoryHashMap],
})
export class CategoryModule {}
