import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpException,
} from '@nestjs/common';
import { Observable, throwError } from 'rxjs';
import { tap, catchError } from 'rxjs/operators';
import { Request, Response } from 'express';
import { LoggingService } from '../logging.service';
import { bindActorToContext, getTraceId } from '../logging.context';
import { isActor } from '../../auth/interfaces/actor.interface';

/**
 * RequestLoggingInterceptor
 *
 * Logs every request and its outcome with method, path, status code,
 * duration, trace ID and the caller's subject id. Health probes are skipped.
 */
@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  private static readonly SKIP_PATHS = ['/health'];

  constructor(private readonly loggingService: LoggingService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request>();
    const path = request.path || request.url;

    if (
      RequestLoggingInterceptor.SKIP_PATHS.some(
        (skip) => path === skip || path.startsWith(skip + '/'),
      )
    ) {
      return next.handle();
    }

    const method = request.method;
    const startTime = Date.now();
    const traceId = getTraceId();
    // Guards have run by now, so request.user holds the verified actor
    const user: unknown = request.user;
    const userId = isActor(user) ? user.subjectId : undefined;
    if (isActor(user)) {
      bindActorToContext(user.subjectId, user.role);
    }

    this.loggingService.log(
      `Incoming request ${method} ${path}`,
      'RequestLoggingInterceptor',
    );

    return next.handle().pipe(
      tap(() => {
        const response = httpContext.getResponse<Response>();

        this.loggingService.log(
          {
            message: `Request completed ${method} ${path}`,
            method,
            path,
            statusCode: response.statusCode,
            duration: Date.now() - startTime,
            traceId,
            userId,
          },
          'RequestLoggingInterceptor',
        );
      }),
      catchError((error: unknown) => {
        const statusCode = error instanceof HttpException ? error.getStatus() : 500;
        const err = error instanceof Error ? error : undefined;

        this.loggingService.error(
          {
            message: `Request failed ${method} ${path}`,
            method,
            path,
            statusCode,
            duration: Date.now() - startTime,
            traceId,
            userId,
            error: err?.message ?? String(error),
          },
          err?.stack,
          'RequestLoggingInterceptor',
        );

        return throwError(() => error);
      }),
    );
  }
}
