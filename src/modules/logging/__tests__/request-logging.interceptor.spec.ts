import { CallHandler, ExecutionContext, ForbiddenException } from '@nestjs/common';
import { of, throwError } from 'rxjs';
import { RequestLoggingInterceptor } from '../interceptors/request-logging.interceptor';
import { LoggingService } from '../logging.service';
import { getUserId, loggingContext } from '../logging.context';
import { Actor } from '../../auth/interfaces/actor.interface';

describe('RequestLoggingInterceptor', () => {
  let interceptor: RequestLoggingInterceptor;
  let loggingService: LoggingService;

  beforeEach(() => {
    loggingService = new LoggingService();
    jest.spyOn(loggingService.getWinstonLogger(), 'log').mockImplementation();
    interceptor = new RequestLoggingInterceptor(loggingService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function createMockContext(path: string, method = 'GET', user?: Actor): ExecutionContext {
    const request = { path, url: path, method, user };
    const response = { statusCode: 201 };
    return {
      switchToHttp: () => ({
        getRequest: () => request,
        getResponse: () => response,
      }),
    } as unknown as ExecutionContext;
  }

  const okHandler: CallHandler = { handle: () => of({ id: 1 }) };

  it('should log completion with status, duration and the caller', (done) => {
    const logSpy = jest.spyOn(loggingService, 'log');
    const actor: Actor = { subjectId: 's1', role: 'estudiante' };

    interceptor
      .intercept(createMockContext('/api/incidencias', 'POST', actor), okHandler)
      .subscribe({
        complete: () => {
          expect(logSpy).toHaveBeenNthCalledWith(
            1,
            'Incoming request POST /api/incidencias',
            'RequestLoggingInterceptor',
          );
          expect(logSpy).toHaveBeenNthCalledWith(
            2,
            expect.objectContaining({
              message: 'Request completed POST /api/incidencias',
              method: 'POST',
              path: '/api/incidencias',
              statusCode: 201,
              userId: 's1',
              duration: expect.any(Number),
            }),
            'RequestLoggingInterceptor',
          );
          done();
        },
      });
  });

  it('should log failures with the exception status and rethrow', (done) => {
    const errorSpy = jest.spyOn(loggingService, 'error');
    const failing: CallHandler = {
      handle: () => throwError(() => new ForbiddenException('Only administrators can delete incidencias')),
    };

    interceptor.intercept(createMockContext('/api/incidencias/3', 'DELETE'), failing).subscribe({
      error: (error: unknown) => {
        expect(error).toBeInstanceOf(ForbiddenException);
        expect(errorSpy).toHaveBeenCalledWith(
          expect.objectContaining({
            message: 'Request failed DELETE /api/incidencias/3',
            statusCode: 403,
            error: 'Only administrators can delete incidencias',
            userId: undefined,
          }),
          expect.any(String),
          'RequestLoggingInterceptor',
        );
        done();
      },
    });
  });

  it('should skip health probes', () => {
    const logSpy = jest.spyOn(loggingService, 'log');

    interceptor.intercept(createMockContext('/health/db'), okHandler).subscribe();

    expect(logSpy).not.toHaveBeenCalled();
  });

  it('should bind the caller to the request context', () => {
    const actor: Actor = { subjectId: 'admin1', role: 'administrador' };

    loggingContext.run({ traceId: 'trace-9' }, () => {
      interceptor.intercept(createMockContext('/api/incidencias', 'GET', actor), okHandler);
      expect(getUserId()).toBe('admin1');
    });
  });
});
