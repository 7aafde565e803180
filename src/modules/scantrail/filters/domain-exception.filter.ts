import {
  ArgumentsHost,
  BadRequestException,
  Catch,
  ConflictException,
  ExceptionFilter,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { Response } from 'express';
import {
  DuplicateCorrelationError,
  MissingScanRecordError,
  NotFoundError,
  ValidationError,
} from '../../../core';

/**
 * Nest exception for a domain error
 */
export function toHttpException(error: Error): HttpException {
  if (error instanceof NotFoundError) {
    return new NotFoundException(error.message);
  }
  if (error instanceof DuplicateCorrelationError) {
    return new ConflictException(error.message);
  }
  if (error instanceof MissingScanRecordError) {
    return new UnprocessableEntityException(error.message);
  }
  if (error instanceof ValidationError) {
    return new BadRequestException(error.issues.length > 0 ? error.issues : error.message);
  }
  return new InternalServerErrorException();
}

/**
 * Domain Exception Filter
 *
 * Maps store and lookup errors raised by the core to HTTP responses
 */
@Catch(NotFoundError, DuplicateCorrelationError, MissingScanRecordError, ValidationError)
export class DomainExceptionFilter implements ExceptionFilter {
  catch(exception: Error, host: ArgumentsHost): void {
    const httpException = toHttpException(exception);
    const response = host.switchToHttp().getResponse<Response>();

    response.status(httpException.getStatus()).json(httpException.getResponse());
  }
}
