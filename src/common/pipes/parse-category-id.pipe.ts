import {
  ArgumentMetadata,
  BadRequestException,
  Injectable,
  PipeTransform,
} from '@nestjs/common';
import { CategoryUtils } from '../utils/category.utils';
import { CategoryId } from '../../category/interfaces/category.interface';

@Injectable()
export class ParseCategoryIdPipe implements PipeTransform<string, CategoryId> {
  transform(value: string, metadata: ArgumentMetadata): CategoryId {
    const id = /^\d+$/.test(value) ? Number(value) : NaN;

    if (!CategoryUtils.isCategoryId(id)) {
      throw new BadRequestException(
        `${metadata.data ?? 'id'} must be a positive integer no greater than ${Number.MAX_SAFE_INTEGER}`,
      );
    }

    return id;
  }
}
