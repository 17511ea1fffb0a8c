import {
  ArgumentsHost,
  BadRequestException,
  Catch,
  HttpException,
  NotFoundException,
} from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import { BomError, NotDirectChildError } from '../core/bom/bom.errors';

/**
 * Maps core BOM errors onto HTTP responses. Structural problems in loaded
 * records are the caller's fault (400); a quantity lookup outside the
 * assembly's direct children is a missing resource (404).
 */
@Catch(BomError)
export class BomErrorFilter extends BaseExceptionFilter {
  catch(exception: BomError, host: ArgumentsHost): void {
    super.catch(toHttpException(exception), host);
  }
}

export function toHttpException(exception: BomError): HttpException {
  if (exception instanceof NotDirectChildError) {
    return new NotFoundException(exception.message, {
      cause: exception,
      description: 'Not Found',
    });
  }

  return new BadRequestException(exception.message, {
    cause: exception,
    description: 'Bad Request',
  });
}
