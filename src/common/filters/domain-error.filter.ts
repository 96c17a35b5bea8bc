import { ArgumentsHost, Catch, ExceptionFilter } from '@nestjs/common';
import { Request, Response } from 'express';
import { OrderDomainError } from '../errors/domain-errors';
import { buildErrorBody } from '../errors/error-response';

/**
 * Converts domain errors thrown by services into the shared error body.
 */
@Catch(OrderDomainError)
export class DomainErrorFilter implements ExceptionFilter {
  catch(exception: OrderDomainError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    response
      .status(exception.status)
      .json(
        buildErrorBody(
          exception.code,
          exception.message,
          request.originalUrl ?? request.url,
          exception.details,
        ),
      );
  }
}
