import { Controller, Get, HttpCode, HttpStatus, Res } from '@nestjs/common';
import { Response } from 'express';
import { SkipThrottle } from '@nestjs/throttler';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { HealthCheckService } from './health.service';
import { DatabaseHealthDto, HealthLivenessDto } from './dto/health-check.dto';

/**
 * HealthController
 *
 * Liveness and database readiness probes. Unauthenticated, not throttled.
 */
@Controller('health')
@SkipThrottle()
@ApiTags('Health')
export class HealthController {
  constructor(private readonly healthCheckService: HealthCheckService) {}

  /**
   * Liveness Probe: GET /health
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Liveness probe' })
  getLiveness(): HealthLivenessDto {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  }

  /**
   * Readiness Probe: GET /health/db
   * HTTP 503 when the database does not answer `SELECT 1`.
   */
  @Get('db')
  @ApiOperation({ summary: 'Database readiness probe' })
  @ApiResponse({ status: 200, description: 'Database reachable' })
  @ApiResponse({ status: 503, description: 'Database unreachable' })
  async getDatabaseHealth(
    @Res({ passthrough: true }) res: Response,
  ): Promise<DatabaseHealthDto> {
    const database = await this.healthCheckService.probeDatabase();
    const ready = database.status !== 'unhealthy';

    if (!ready) {
      res.status(HttpStatus.SERVICE_UNAVAILABLE);
    }

    return {
      status: ready ? 'ready' : 'not_ready',
      timestamp: new Date().toISOString(),
      database,
    };
  }
}
