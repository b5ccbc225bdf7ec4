import { ApiProperty } from '@nestjs/swagger';
import { IsOptional, IsString, Matches } from 'class-validator';

export class CategoryDescendantsDto {
  @ApiProperty({ description: 'Requested category ID', example: 2 })
  categoryId: number;

  @ApiProperty({
    description: 'The category itself and all of its subcategories',
    type: [Number],
    example: [2, 5, 6],
  })
  descendantIds: number[];

  @ApiProperty({ description: 'Number of ids returned' })
  total: number;

  @ApiProperty({
    description: 'Whether the ids were served from cache',
    required: false,
  })
  cached?: boolean;

  constructor(
    categoryId: number,
    descendantIds: readonly number[],
    cached?: boolean,
  ) {
    this.categoryId = categoryId;
    this.descendantIds = [...descendantIds];
    this.total = descendantIds.length;
    if (cached !== undefined) {
      this.cached = cached;
    }
  }
}

export class CategoryDescendantsResponseDto {
  @ApiProperty({ description: 'Success status' })
  success: boolean;

  @ApiProperty({ type: CategoryDescendantsDto })
  data: CategoryDescendantsDto;

  @ApiProperty({ description: 'Response message' })
  message: string;

  constructor(data: CategoryDescendantsDto, message: string) {
    this.success = true;
    this.data = data;
    this.message = message;
  }
}

export class ResetDescendantsQueryDto {
  @ApiProperty({
    description:
      'Comma separated category IDs to reset; empty resets every entry',
    required: false,
    example: '1,2,3',
  })
  @IsOptional()
  @IsString()
  @Matches(/^[\d,\s]*$/, {
    message: 'ids must be a comma separated list of category IDs',
  })
  ids?: string;
}
