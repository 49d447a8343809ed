import { LoggingService } from '../logging.service';
import { bindActorToContext, loggingContext } from '../logging.context';

describe('LoggingService', () => {
  let service: LoggingService;
  let originalEnv: NodeJS.ProcessEnv;

  beforeAll(() => {
    originalEnv = { ...process.env };
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    jest.restoreAllMocks();
  });

  beforeEach(() => {
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_FORMAT;
    delete process.env.LOG_SERVICE_NAME;
    service = new LoggingService();
  });

  const spyOnWinston = (target: LoggingService = service) =>
    jest.spyOn(target.getWinstonLogger(), 'log').mockImplementation(() => target.getWinstonLogger());

  it('should default to info level and the incidencias service name', () => {
    expect(service.getWinstonLogger().level).toBe('info');
    expect(service.getServiceName()).toBe('incidencias-api');
  });

  it('should respect LOG_SERVICE_NAME', () => {
    process.env.LOG_SERVICE_NAME = 'incidencias-staging';

    expect(new LoggingService().getServiceName()).toBe('incidencias-staging');
  });

  it('should swap Nest debug and verbose levels onto Winston', () => {
    process.env.LOG_LEVEL = 'verbose';
    expect(new LoggingService().getWinstonLogger().level).toBe('debug');

    process.env.LOG_LEVEL = 'debug';
    expect(new LoggingService().getWinstonLogger().level).toBe('verbose');

    process.env.LOG_LEVEL = 'chatty';
    expect(new LoggingService().getWinstonLogger().level).toBe('info');
  });

  it('should log messages with their context', () => {
    const logSpy = spyOnWinston();

    service.log('Incidencia 4 created', 'IncidenciasService');
    service.warn('Stale version', 'IncidenciasService');

    expect(logSpy).toHaveBeenNthCalledWith(1, 'info', 'Incidencia 4 created', {
      context: 'IncidenciasService',
    });
    expect(logSpy).toHaveBeenNthCalledWith(2, 'warn', 'Stale version', {
      context: 'IncidenciasService',
    });
  });

  it('should attach the stack trace to errors', () => {
    const logSpy = spyOnWinston();

    service.error('Boom', 'Error: Boom\n    at x', 'HttpExceptionFilter');

    expect(logSpy).toHaveBeenCalledWith('error', 'Boom', {
      context: 'HttpExceptionFilter',
      error: 'Error: Boom\n    at x',
    });
  });

  it('should flatten object messages into top-level fields', () => {
    const logSpy = spyOnWinston();

    service.log(
      { message: 'Request completed GET /api/incidencias', method: 'GET', statusCode: 200 },
      'RequestLoggingInterceptor',
    );

    expect(logSpy).toHaveBeenCalledWith('info', 'Request completed GET /api/incidencias', {
      context: 'RequestLoggingInterceptor',
      method: 'GET',
      statusCode: 200,
    });
  });

  it('should stringify null and undefined messages', () => {
    const logSpy = spyOnWinston();

    service.log(undefined);
    service.log(null);

    expect(logSpy).toHaveBeenNthCalledWith(1, 'info', 'undefined', {});
    expect(logSpy).toHaveBeenNthCalledWith(2, 'info', 'null', {});
  });

  it('should redact sensitive fields, including nested ones', () => {
    expect(
      service.sanitize({
        subjectId: 's1',
        password: 'test-password',
        accessToken: 'test-token',
        headers: { Authorization: 'Bearer test-token', accept: 'json' },
        items: [{ jwtSecret: 'test-secret', id: 1 }],
      }),
    ).toEqual({
      subjectId: 's1',
      password: '[REDACTED]',
      accessToken: '[REDACTED]',
      headers: { Authorization: '[REDACTED]', accept: 'json' },
      items: [{ jwtSecret: '[REDACTED]', id: 1 }],
    });
  });

  it('should include trace and caller from the request context', () => {
    const logSpy = spyOnWinston();

    loggingContext.run({ traceId: 'trace-1' }, () => {
      bindActorToContext('admin1', 'administrador');
      service.log('Traced', 'IncidenciasService');
    });

    expect(logSpy).toHaveBeenCalledWith('info', 'Traced', {
      context: 'IncidenciasService',
      traceId: 'trace-1',
      userId: 'admin1',
      role: 'administrador',
    });
  });
});
