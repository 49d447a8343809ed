import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { loggingContext, RequestContext } from '../logging.context';

function headerValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim() ? first.trim() : undefined;
}

/**
 * CorrelationIdMiddleware
 *
 * Generates or propagates a trace ID for every incoming HTTP request and
 * stores it in AsyncLocalStorage for the rest of the request lifecycle.
 *
 * Header precedence:
 * 1. x-trace-id
 * 2. x-correlation-id
 * 3. Auto-generated UUID v4
 *
 * The trace ID is always echoed back as the x-trace-id response header.
 */
@Injectable()
export class CorrelationIdMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction): void {
    const traceId =
      headerValue(req.headers['x-trace-id']) ||
      headerValue(req.headers['x-correlation-id']) ||
      uuidv4();

    res.setHeader('x-trace-id', traceId);

    const context: RequestContext = { traceId };

    loggingContext.run(context, () => {
      next();
    });
  }
}
