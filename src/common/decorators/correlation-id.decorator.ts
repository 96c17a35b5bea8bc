import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { CorrelatedRequest } from '../interceptors/correlation-id.interceptor';

export const CorrelationId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string | undefined => {
    const request = ctx.switchToHttp().getRequest<CorrelatedRequest>();
    return request.correlationId;
  },
);
