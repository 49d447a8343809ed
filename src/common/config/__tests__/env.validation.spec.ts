import { Logger } from '@nestjs/common';
import { validateEnvironmentVariables } from '../env.validation';

const VALID_ENV: NodeJS.ProcessEnv = {
  JWT_SECRET: 'test-secret-test-secret-test-secret',
  DATABASE_PASSWORD: 'test-password',
  DATABASE_HOST: 'db',
  DATABASE_NAME: 'incidencias_test',
  DATABASE_USER: 'incidencias',
};

describe('validateEnvironmentVariables', () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should pass with a complete configuration', () => {
    expect(() => validateEnvironmentVariables(VALID_ENV)).not.toThrow();
    expect(Logger.prototype.warn).not.toHaveBeenCalled();
    expect(Logger.prototype.log).toHaveBeenCalledWith('Environment validation passed');
  });

  it('should reject a short JWT secret', () => {
    expect(() =>
      validateEnvironmentVariables({ ...VALID_ENV, JWT_SECRET: 'test-secret' }),
    ).toThrow('Environment validation failed with 1 error(s). Application cannot start.');
    expect(Logger.prototype.error).toHaveBeenCalledWith(
      '  1. JWT_SECRET must be at least 32 characters long. Current length: 11',
    );
  });

  it('should count every error', () => {
    expect(() =>
      validateEnvironmentVariables({
        DATABASE_HOST: 'db',
        DATABASE_NAME: 'incidencias_test',
        DATABASE_USER: 'incidencias',
        JWT_ALGORITHM: 'RS256',
        HISTORY_ON_DELETE: 'archive',
      }),
    ).toThrow('Environment validation failed with 4 error(s). Application cannot start.');
  });

  it('should accept both history retention modes', () => {
    expect(() =>
      validateEnvironmentVariables({ ...VALID_ENV, HISTORY_ON_DELETE: 'cascade' }),
    ).not.toThrow();
    expect(() =>
      validateEnvironmentVariables({ ...VALID_ENV, HISTORY_ON_DELETE: 'retain' }),
    ).not.toThrow();
  });

  it('should require CORS_ORIGIN in production', () => {
    expect(() =>
      validateEnvironmentVariables({ ...VALID_ENV, NODE_ENV: 'production' }),
    ).toThrow('Environment validation failed with 1 error(s). Application cannot start.');
  });

  it('should only warn about a default password outside production', () => {
    validateEnvironmentVariables({ ...VALID_ENV, DATABASE_PASSWORD: 'postgres' });

    expect(Logger.prototype.warn).toHaveBeenCalledWith(
      '  1. DATABASE_PASSWORD uses a default value. This is acceptable for development but MUST be changed for production.',
    );
  });

  it('should reject a non-numeric health check timeout', () => {
    expect(() =>
      validateEnvironmentVariables({ ...VALID_ENV, HEALTH_PROBE_TIMEOUT_MS: '5s' }),
    ).toThrow('Environment validation failed with 1 error(s). Application cannot start.');
    expect(Logger.prototype.error).toHaveBeenCalledWith(
      '  1. HEALTH_PROBE_TIMEOUT_MS must be a positive integer (milliseconds). Current value: "5s"',
    );
  });

  it('should accept a numeric health check timeout', () => {
    expect(() =>
      validateEnvironmentVariables({ ...VALID_ENV, HEALTH_PROBE_TIMEOUT_MS: '2500' }),
    ).not.toThrow();
  });
});
