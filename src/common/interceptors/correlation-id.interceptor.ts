import {
  CallHandler,
  ExecutionContext,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { v4 as uuid } from 'uuid';

export const CORRELATION_HEADER = 'x-request-id';

export type CorrelatedRequest = Request & { correlationId?: string };

@Injectable()
export class CorrelationIdInterceptor implements NestInterceptor {
  private readonly logger = new Logger(CorrelationIdInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<CorrelatedRequest>();
    const response = ctx.getResponse<Response>();

    const existingId = request.header(CORRELATION_HEADER);
    const correlationId = existingId || uuid();

    request.correlationId = correlationId;
    response.setHeader('X-Request-ID', correlationId);

    const startedAt = Date.now();
    return next.handle().pipe(
      tap(() => {
        this.logger.debug(
          `${request.method} ${request.originalUrl} ${response.statusCode} ${
            Date.now() - startedAt
          }ms [${correlationId}]`,
        );
      }),
    );
  }
}
