import { Logger } from '@nestjs/common';
import {
  HISTORY_RETENTION_MODES,
  isHistoryRetention,
} from '../../modules/incidencias/incidencias.config';

const SUPPORTED_JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'];

/**
 * Validates critical environment variables on application startup
 * Prevents application from starting with insecure or missing configuration
 */
export function validateEnvironmentVariables(
  env: NodeJS.ProcessEnv = process.env,
): void {
  const logger = new Logger('EnvironmentValidation');
  const errors: string[] = [];
  const warnings: string[] = [];

  // Critical: JWT secret shared with the identity service
  const jwtSecret = env.JWT_SECRET;
  if (!jwtSecret) {
    errors.push('JWT_SECRET is not defined. Use the signing secret of the identity service (min 32 characters).');
  } else if (jwtSecret.length < 32) {
    errors.push(`JWT_SECRET must be at least 32 characters long. Current length: ${jwtSecret.length}`);
  }

  const jwtAlgorithm = env.JWT_ALGORITHM;
  if (jwtAlgorithm && !SUPPORTED_JWT_ALGORITHMS.includes(jwtAlgorithm)) {
    errors.push(
      `JWT_ALGORITHM "${jwtAlgorithm}" is not supported. Use one of: ${SUPPORTED_JWT_ALGORITHMS.join(', ')}`,
    );
  }

  // Critical: Database Password
  if (!env.DATABASE_PASSWORD) {
    errors.push('DATABASE_PASSWORD is not defined.');
  } else if (['password', 'postgres', 'admin'].includes(env.DATABASE_PASSWORD)) {
    if (env.NODE_ENV === 'production') {
      errors.push('DATABASE_PASSWORD uses a default/insecure value in production. Change immediately!');
    } else {
      warnings.push('DATABASE_PASSWORD uses a default value. This is acceptable for development but MUST be changed for production.');
    }
  }

  if (!env.DATABASE_HOST) {
    warnings.push('DATABASE_HOST not set, using default: localhost');
  }
  if (!env.DATABASE_NAME) {
    warnings.push('DATABASE_NAME not set, using default: incidencias_db');
  }
  if (!env.DATABASE_USER) {
    warnings.push('DATABASE_USER not set, using default: postgres');
  }

  const historyOnDelete = env.HISTORY_ON_DELETE;
  if (historyOnDelete && !isHistoryRetention(historyOnDelete)) {
    errors.push(
      `HISTORY_ON_DELETE must be one of: ${HISTORY_RETENTION_MODES.join(', ')}`,
    );
  }

  const healthTimeout = env.HEALTH_PROBE_TIMEOUT_MS;
  if (healthTimeout !== undefined && !/^[1-9]\d*$/.test(healthTimeout)) {
    errors.push(
      `HEALTH_PROBE_TIMEOUT_MS must be a positive integer (milliseconds). Current value: "${healthTimeout}"`,
    );
  }

  if (env.NODE_ENV === 'production') {
    if (!env.CORS_ORIGIN) {
      errors.push('CORS_ORIGIN must be set in production to restrict API access.');
    }

    if (env.DATABASE_HOST === 'localhost') {
      warnings.push('DATABASE_HOST is localhost in production. This may be incorrect.');
    }
  }

  if (warnings.length > 0) {
    logger.warn('Environment configuration warnings:');
    warnings.forEach((warning, index) => {
      logger.warn(`  ${index + 1}. ${warning}`);
    });
  }

  if (errors.length > 0) {
    logger.error('Environment configuration errors:');
    errors.forEach((error, index) => {
      logger.error(`  ${index + 1}. ${error}`);
    });
    throw new Error(
      `Environment validation failed with ${errors.length} error(s). Application cannot start.`,
    );
  }

  logger.log('Environment validation passed');
}
