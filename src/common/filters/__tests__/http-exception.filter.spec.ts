import { ArgumentsHost, BadRequestException, Logger } from '@nestjs/common';
import { HttpExceptionFilter, errorKindForStatus } from '../http-exception.filter';
import {
  AccessDeniedException,
  ConcurrentModificationException,
  IncidenciaNotFoundException,
  InvalidTransitionException,
} from '../../../modules/incidencias/exceptions/incidencia.exceptions';

describe('HttpExceptionFilter', () => {
  let filter: HttpExceptionFilter;
  let json: jest.Mock;
  let status: jest.Mock;
  let host: ArgumentsHost;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    filter = new HttpExceptionFilter();
    json = jest.fn();
    status = jest.fn().mockReturnValue({ json });
    host = {
      switchToHttp: () => ({
        getResponse: () => ({ status }),
        getRequest: () => ({ url: '/api/incidencias/7', ip: '127.0.0.1' }),
      }),
    } as unknown as ArgumentsHost;
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should render a not-found incidencia with kind NotFound', () => {
    filter.catch(new IncidenciaNotFoundException(7), host);

    expect(status).toHaveBeenCalledWith(404);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 404,
        kind: 'NotFound',
        message: 'Incidencia 7 not found',
        error: 'NOT_FOUND',
        path: '/api/incidencias/7',
      }),
    );
  });

  it('should render an invalid transition as 422 InvalidTransition', () => {
    filter.catch(new InvalidTransitionException('cerrada', 'pendiente'), host);

    expect(status).toHaveBeenCalledWith(422);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        kind: 'InvalidTransition',
        message: 'Transition from "cerrada" to "pendiente" is not allowed',
      }),
    );
  });

  it('should join validation pipe messages', () => {
    filter.catch(
      new BadRequestException(['title should not be empty', 'limit must not be greater than 100']),
      host,
    );

    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        kind: 'ValidationError',
        message: 'title should not be empty, limit must not be greater than 100',
      }),
    );
  });

  it('should log access denials', () => {
    filter.catch(new AccessDeniedException('Administrator role required'), host);

    expect(json).toHaveBeenCalledWith(expect.objectContaining({ kind: 'AccessDenied' }));
    expect(Logger.prototype.error).toHaveBeenCalled();
  });

  it('should hide the message of a non-HTTP error', () => {
    filter.catch(new Error('Catalog state 9 is missing or unknown'), host);

    expect(status).toHaveBeenCalledWith(500);
    expect(json).toHaveBeenCalledWith(
      expect.objectContaining({
        statusCode: 500,
        kind: 'InternalError',
        message: 'Internal server error',
      }),
    );
  });

  it('should map a version conflict to ConflictError', () => {
    filter.catch(new ConcurrentModificationException(3), host);

    expect(status).toHaveBeenCalledWith(409);
    expect(json).toHaveBeenCalledWith(expect.objectContaining({ kind: 'ConflictError' }));
  });
});

describe('errorKindForStatus', () => {
  it('should fall back to InternalError for unmapped statuses', () => {
    expect(errorKindForStatus(401)).toBe('Unauthenticated');
    expect(errorKindForStatus(429)).toBe('TooManyRequests');
    expect(errorKindForStatus(502)).toBe('InternalError');
  });
});
