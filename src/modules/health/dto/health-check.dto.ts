/**
 * Health check response types
 */

export interface HealthProbeResult {
  status: 'healthy' | 'degraded' | 'unhealthy';
  responseTimeMs: number;
  error?: string;
  lastChecked: string; // ISO timestamp
}

export interface HealthLivenessDto {
  status: 'ok';
  timestamp: string;
  uptime: number;
}

export interface DatabaseHealthDto {
  status: 'ready' | 'not_ready';
  timestamp: string;
  database: HealthProbeResult;
}
