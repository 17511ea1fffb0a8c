import { HttpStatus } from '@nestjs/common';
import {
  CyclicBomError,
  DuplicatePartError,
  NotDirectChildError,
  UnknownPartError,
} from '../core/bom/bom.errors';
import { toHttpException } from './bom-error.filter';

describe('toHttpException', () => {
  it('maps a non-direct child lookup to 404', () => {
    const exception = toHttpException(new NotDirectChildError('P-1', 'ASM'));

    expect(exception.getStatus()).toBe(HttpStatus.NOT_FOUND);
    expect(exception.message).toBe("Part 'P-1' is not a direct child of 'ASM'.");
  });

  it.each([
    new UnknownPartError('P-9', 'ASM'),
    new DuplicatePartError('P-1'),
    new CyclicBomError(['A', 'B', 'A']),
  ])('maps $name to 400', (error) => {
    const exception = toHttpException(error);

    expect(exception.getStatus()).toBe(HttpStatus.BAD_REQUEST);
    expect(exception.getResponse()).toEqual({
      statusCode: 400,
      message: error.message,
      error: 'Bad Request',
    });
    expect(exception.cause).toBe(error);
  });
});
