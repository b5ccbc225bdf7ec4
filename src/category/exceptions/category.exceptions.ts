import {
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import { CategoryId } from '../interfaces/category.interface';

export class CategoryNotFoundException extends NotFoundException {
  constructor(readonly categoryId: CategoryId) {
    super(`Category ${categoryId} not found`);
  }
}

export class CategoryQueryException extends InternalServerErrorException {
  constructor(
    readonly operation: string,
    readonly reason: string,
  ) {
    super(`Category query failed (${operation}): ${reason}`);
  }
}
