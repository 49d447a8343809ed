import { LoggerService, Injectable } from '@nestjs/common';
import * as winston from 'winston';
import { getRole, getTraceId, getUserId } from './logging.context';

/**
 * LoggingService
 *
 * NestJS LoggerService implementation backed by Winston.
 * Produces structured JSON logs with the trace ID, service name and
 * caller identity of the current request. Sensitive fields are redacted.
 *
 * Environment variables:
 * - LOG_LEVEL: error | warn | info | debug | verbose (default: "info")
 * - LOG_FORMAT: "json" (default) | "pretty"
 * - LOG_SERVICE_NAME: service identifier (default: "incidencias-api")
 */

type LogMeta = Record<string, unknown>;

/** Fields that must be redacted from log output */
const SENSITIVE_FIELDS = [
  'password',
  'token',
  'secret',
  'authorization',
  'cookie',
];

function isPlainRecord(value: unknown): value is LogMeta {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

@Injectable()
export class LoggingService implements LoggerService {
  private readonly logger: winston.Logger;
  private readonly serviceName: string;

  constructor() {
    this.serviceName = process.env.LOG_SERVICE_NAME || 'incidencias-api';
    const level = this.mapLogLevel(process.env.LOG_LEVEL || 'info');
    const formatType = process.env.LOG_FORMAT || 'json';

    const formatters =
      formatType === 'pretty'
        ? winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.colorize(),
            winston.format.printf(({ timestamp, level: lvl, message, ...meta }) => {
              const ctx = meta.context ? `[${String(meta.context)}]` : '';
              const traceId = meta.traceId ? `(${String(meta.traceId)})` : '';
              return `${String(timestamp)} ${lvl} ${ctx} ${traceId} ${String(message)}`;
            }),
          )
        : winston.format.combine(
            winston.format.timestamp(),
            winston.format.json(),
          );

    this.logger = winston.createLogger({
      level,
      defaultMeta: { service: this.serviceName },
      format: formatters,
      transports: [new winston.transports.Console()],
    });
  }

  /**
   * Nest's "verbose" is its most permissive level while Winston's "verbose"
   * sits below "debug", so the two are swapped.
   */
  private mapLogLevel(level: string): string {
    const mapping: Record<string, string> = {
      error: 'error',
      warn: 'warn',
      info: 'info',
      debug: 'verbose',
      verbose: 'debug',
    };
    return mapping[level] || 'info';
  }

  log(message: unknown, context?: string): void {
    this.logMessage('info', message, this.buildMeta(context));
  }

  error(message: unknown, trace?: string, context?: string): void {
    const meta = this.buildMeta(context);
    if (trace) {
      meta.error = trace;
    }
    this.logMessage('error', message, meta);
  }

  warn(message: unknown, context?: string): void {
    this.logMessage('warn', message, this.buildMeta(context));
  }

  debug(message: unknown, context?: string): void {
    this.logMessage('debug', message, this.buildMeta(context));
  }

  verbose(message: unknown, context?: string): void {
    this.logMessage('verbose', message, this.buildMeta(context));
  }

  /**
   * Object messages are flattened into top-level fields, with their
   * `message` property used as the log line.
   */
  private logMessage(level: string, message: unknown, meta: LogMeta): void {
    const sanitized = this.sanitize(message);
    if (isPlainRecord(sanitized)) {
      const { message: msg, ...rest } = sanitized;
      Object.assign(meta, rest);
      this.logger.log(level, typeof msg === 'string' ? msg : '', meta);
    } else {
      this.logger.log(level, String(sanitized), meta);
    }
  }

  private buildMeta(context?: string): LogMeta {
    const meta: LogMeta = {};
    if (context) {
      meta.context = context;
    }
    const traceId = getTraceId();
    if (traceId) {
      meta.traceId = traceId;
    }
    const userId = getUserId();
    if (userId) {
      meta.userId = userId;
    }
    const role = getRole();
    if (role) {
      meta.role = role;
    }
    return meta;
  }

  /**
   * Strip sensitive fields from a log message or object.
   */
  sanitize(data: unknown): unknown {
    if (data === null || data === undefined) {
      return String(data);
    }
    if (Array.isArray(data)) {
      return data.map((item) => (isPlainRecord(item) ? this.sanitizeObject(item) : item));
    }
    if (isPlainRecord(data)) {
      return this.sanitizeObject(data);
    }
    return data;
  }

  /**
   * Copy of `obj` with sensitive values replaced by '[REDACTED]',
   * recursing into nested objects and arrays.
   */
  private sanitizeObject(obj: LogMeta): LogMeta {
    const result: LogMeta = {};
    for (const [key, value] of Object.entries(obj)) {
      if (SENSITIVE_FIELDS.some((f) => key.toLowerCase().includes(f))) {
        result[key] = '[REDACTED]';
      } else if (Array.isArray(value) || isPlainRecord(value)) {
        result[key] = this.sanitize(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  /**
   * Get the underlying Winston logger instance (for testing).
   */
  getWinstonLogger(): winston.Logger {
    return this.logger;
  }

  getServiceName(): string {
    return this.serviceName;
  }
}
