import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { HealthProbeResult } from './dto/health-check.dto';

const DEFAULT_TIMEOUT_MS = 5000;

/**
 * HealthCheckService
 *
 * Database probe for the readiness endpoint. The probe is raced against
 * HEALTH_PROBE_TIMEOUT_MS; a hung connection reports unhealthy.
 */
@Injectable()
export class HealthCheckService {
  private readonly logger = new Logger(HealthCheckService.name);
  private readonly probeTimeout: number;

  private readonly thresholds = { degraded: 100, unhealthy: 500 };

  constructor(
    private readonly dataSource: DataSource,
    private readonly configService: ConfigService,
  ) {
    const configured = Number(
      this.configService.get<string>('HEALTH_PROBE_TIMEOUT_MS', String(DEFAULT_TIMEOUT_MS)),
    );
    this.probeTimeout =
      Number.isInteger(configured) && configured > 0
        ? configured
        : DEFAULT_TIMEOUT_MS;
  }

  async probeDatabase(): Promise<HealthProbeResult> {
    const startTime = Date.now();
    try {
      await this.withTimeout(this.dataSource.query('SELECT 1'));
      const responseTimeMs = Date.now() - startTime;

      let status: HealthProbeResult['status'] = 'healthy';
      if (responseTimeMs >= this.thresholds.unhealthy) {
        status = 'unhealthy';
      } else if (responseTimeMs >= this.thresholds.degraded) {
        status = 'degraded';
      }

      return {
        status,
        responseTimeMs,
        lastChecked: new Date().toISOString(),
      };
    } catch (err: unknown) {
      const message =
        err instanceof Error ? err.message : 'Database probe failed';
      this.logger.warn(`Database probe failed: ${message}`);
      return {
        status: 'unhealthy',
        responseTimeMs: Date.now() - startTime,
        error: message,
        lastChecked: new Date().toISOString(),
      };
    }
  }

  private async withTimeout<T>(promise: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Probe timed out after ${this.probeTimeout}ms`)),
        this.probeTimeout,
      );
    });
    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
