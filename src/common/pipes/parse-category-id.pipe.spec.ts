import { BadRequestException } from '@nestjs/common';
import { ParseCategoryIdPipe } from './parse-category-id.pipe';

describe('ParseCategoryIdPipe', () => {
  const pipe = new ParseCategoryIdPipe();
  const metadata = { type: 'param' as const, data: 'id' };

  it('parses positive ids', () => {
    expect(pipe.transform('42', metadata)).toBe(42);
    expect(pipe.transform('9007199254740991', metadata)).toBe(
      9007199254740991,
    );
  });

  it('rejects ids beyond the safe integer range', () => {
    expect(() => pipe.transform('9007199254740992', metadata)).toThrow(
      BadRequestException,
    );
    expect(() => pipe.transform('99999999999999999999', metadata)).toThrow(
      'id must be a positive integer no greater than 9007199254740991',
    );
  });

  it('rejects zero, negative and non-numeric ids', () => {
    expect(() => pipe.transform('0', metadata)).toThrow(BadRequestException);
    expect(() => pipe.transform('-3', metadata)).toThrow(BadRequestException);
    expect(() => pipe.transform('1.5', metadata)).toThrow(BadRequestException);
    expect(() => pipe.transform('abc', metadata)).toThrow(BadRequestException);
  });
});
