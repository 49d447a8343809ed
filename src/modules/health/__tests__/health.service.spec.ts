import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { HealthCheckService } from '../health.service';

describe('HealthCheckService', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('should report unhealthy when the probe times out', async () => {
    jest.useFakeTimers();
    const dataSource = {
      query: jest.fn().mockReturnValue(new Promise(() => undefined)),
    } as unknown as DataSource;
    const service = new HealthCheckService(
      dataSource,
      new ConfigService({ HEALTH_PROBE_TIMEOUT_MS: '50' }),
    );

    const pending = service.probeDatabase();
    await jest.advanceTimersByTimeAsync(50);
    const result = await pending;

    expect(result.status).toBe('unhealthy');
    expect(result.error).toBe('Probe timed out after 50ms');
  });

  it('should report a non-Error rejection with a generic message', async () => {
    const dataSource = {
      query: jest.fn().mockRejectedValue('boom'),
    } as unknown as DataSource;
    const service = new HealthCheckService(dataSource, new ConfigService({}));

    const result = await service.probeDatabase();

    expect(result.error).toBe('Database probe failed');
  });

  it('should use the default timeout when the configured one is not a number', async () => {
    jest.useFakeTimers();
    const dataSource = {
      query: jest.fn().mockReturnValue(new Promise(() => undefined)),
    } as unknown as DataSource;
    const service = new HealthCheckService(
      dataSource,
      new ConfigService({ HEALTH_PROBE_TIMEOUT_MS: 'soon' }),
    );

    const pending = service.probeDatabase();
    await jest.advanceTimersByTimeAsync(5000);
    const result = await pending;

    expect(result.error).toBe('Probe timed out after 5000ms');
  });
});
