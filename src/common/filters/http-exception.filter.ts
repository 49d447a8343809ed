import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

/**
 * Stable error taxonomy exposed to clients, derived from the HTTP status
 */
export type ErrorKind =
  | 'ValidationError'
  | 'Unauthenticated'
  | 'AccessDenied'
  | 'NotFound'
  | 'ConflictError'
  | 'InvalidTransition'
  | 'TooManyRequests'
  | 'InternalError';

const KIND_BY_STATUS: Partial<Record<number, ErrorKind>> = {
  [HttpStatus.BAD_REQUEST]: 'ValidationError',
  [HttpStatus.UNAUTHORIZED]: 'Unauthenticated',
  [HttpStatus.FORBIDDEN]: 'AccessDenied',
  [HttpStatus.NOT_FOUND]: 'NotFound',
  [HttpStatus.CONFLICT]: 'ConflictError',
  [HttpStatus.UNPROCESSABLE_ENTITY]: 'InvalidTransition',
  [HttpStatus.TOO_MANY_REQUESTS]: 'TooManyRequests',
};

export function errorKindForStatus(status: number): ErrorKind {
  return KIND_BY_STATUS[status] ?? 'InternalError';
}

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  statusCode: number;
  kind: ErrorKind;
  message: string;
  error: string;
  timestamp: string;
  path: string;
}

function extractMessage(exceptionResponse: string | object): string {
  if (typeof exceptionResponse === 'string') {
    return exceptionResponse;
  }
  if ('message' in exceptionResponse) {
    const msg: unknown = exceptionResponse.message;
    if (Array.isArray(msg)) {
      return msg.join(', ');
    }
    if (typeof msg === 'string') {
      return msg;
    }
  }
  return 'An error occurred';
}

/**
 * Global exception filter to standardize error responses.
 * Anything that is not an HttpException is reported as a 500 without its
 * internal message.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const isHttp = exception instanceof HttpException;
    const status = isHttp
      ? exception.getStatus()
      : HttpStatus.INTERNAL_SERVER_ERROR;
    const message = isHttp
      ? extractMessage(exception.getResponse())
      : 'Internal server error';

    const errorResponse: ErrorResponse = {
      statusCode: status,
      kind: errorKindForStatus(status),
      message,
      error: HttpStatus[status] || 'Error',
      timestamp: new Date().toISOString(),
      path: request.url,
    };

    // Log error for monitoring (exclude 4xx client errors except 401/403)
    if (status >= 500 || status === 401 || status === 403) {
      this.logger.error(
        `HTTP ${status} Error: ${message} | Path: ${request.url} | IP: ${request.ip}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    response.status(status).json(errorResponse);
  }
}
