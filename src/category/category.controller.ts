import {
  Controller,
  Get,
  Delete,
  Param,
  Query,
  Logger,
  ParseIntPipe,
  UseFilters,
  UseInterceptors,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common';
import {
  ApiTags,
  ApiOperation,
  ApiResponse,
  ApiParam,
} from '@nestjs/swagger';
import { DataCategoryHashMap } from './map/data-category-hash-map';
import {
  CategoryDescendantsDto,
  CategoryDescendantsResponseDto,
  ResetDescendantsQueryDto,
} from './dto/category-descendants.dto';
import { CategoryUtils } from '../common/utils/category.utils';
import { ParseCategoryIdPipe } from '../common/pipes/parse-category-id.pipe';
import { CategoryExceptionFilter } from '../common/filters/category-exception.filter';
import { CategoryLoggingInterceptor } from '../common/interceptors/category-logging.interceptor';

@ApiTags('category')
@Controller('category')
@UseFilters(CategoryExceptionFilter)
@UseInterceptors(CategoryLoggingInterceptor)
export class CategoryController {
  private readonly logger = new Logger(CategoryController.name);

  constructor(private readonly categoryHashMap: DataCategoryHashMap) {}

  @Delete('descendants')
  @ApiOperation({
    summary: 'Reset cached descendant ids',
    description:
      'Drops the cached entries for the given category IDs, or every entry when none are given',
  })
  @ApiResponse({ status: 200, description: 'Cache entries reset' })
  @UsePipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
    }),
  )
  resetMany(@Query() query: ResetDescendantsQueryDto) {
    const ids = CategoryUtils.parseCategoryIds(query.ids);

    if (ids.length === 0) {
      this.categoryHashMap.resetAll();
      return {
        success: true,
        data: { reset: 'all' },
        message: 'All cached category descendants reset',
      };
    }

    ids.forEach((id) => this.categoryHashMap.resetData(id));
    this.logger.log(`Reset cached descendants for categories ${ids.join(',')}`);

    return {
      success: true,
      data: { reset: ids },
      message: `Cached descendants reset for ${ids.length} categories`,
    };
  }

  @Get(':id/descendants')
  @ApiOperation({
    summary: 'Get category and descendant IDs',
    description:
      'Returns the category ID and the IDs of all its subcategories, cached after the first request',
  })
  @ApiParam({ name: 'id', description: 'Category ID' })
  @ApiResponse({ status: 200, type: CategoryDescendantsResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid category ID' })
  @ApiResponse({ status: 404, description: 'Category not found' })
  async getDescendants(
    @Param('id', ParseCategoryIdPipe) id: number,
  ): Promise<CategoryDescendantsResponseDto> {
    const cached = this.categoryHashMap.has(id);
    const ids = await this.categoryHashMap.getAllData(id);

    return new CategoryDescendantsResponseDto(
      new CategoryDescendantsDto(id, ids, cached),
      'Category descendants fetched successfully',
    );
  }

  @Get(':id/descendants/:key')
  @ApiOperation({
    summary: 'Get descendant IDs when a position is populated',
    description:
      'Returns the descendant IDs of the category when the key category belongs to them, an empty list otherwise',
  })
  @ApiParam({ name: 'id', description: 'Category ID' })
  @ApiParam({ name: 'key', description: 'Zero-based position in the list' })
  @ApiResponse({ status: 200, type: CategoryDescendantsResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid category ID' })
  @ApiResponse({ status: 404, description: 'Category not found' })
  async getDescendantsByKey(
    @Param('id', ParseCategoryIdPipe) id: number,
    @Param('key', ParseIntPipe) key: number,
  ): Promise<CategoryDescendantsResponseDto> {
    const ids = await this.categoryHashMap.getData(id, key);

    return new CategoryDescendantsResponseDto(
      new CategoryDescendantsDto(id, ids),
      ids.length > 0
        ? 'Category descendants fetched successfully'
        : `Position ${key} is empty for category ${id}`,
    );
  }

  @Delete(':id/descendants')
  @ApiOperation({ summary: 'Reset cached descendant ids of one category' })
  @ApiParam({ name: 'id', description: 'Category ID' })
  @ApiResponse({ status: 200, description: 'Cache entry reset' })
  @ApiResponse({ status: 400, description: 'Invalid category ID' })
  reset(@Param('id', ParseCategoryIdPipe) id: number) {
    this.categoryHashMap.resetData(id);

    return {
      success: true,
      data: { reset: [id] },
      message: `Cached descendants reset for category ${id}`,
    };
  }
}
