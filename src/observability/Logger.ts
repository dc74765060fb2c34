// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
  silent?: boolean;
}

// Feed text can be megabytes; log lines keep only a prefix
const MAX_META_STRING_LENGTH = 200;

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      silent: config.silent ?? false,
      transports: [new winston.transports.Console()],
    });
  }

  private sanitize(obj: unknown): unknown {
    if (!obj || typeof obj !== 'object') return obj;

    const sanitized: Record<string, unknown> = { ...obj };

    for (const [key, value] of Object.entries(sanitized)) {
      if (typeof value === 'string' && value.length > MAX_META_STRING_LENGTH) {
        const omitted = value.length - MAX_META_STRING_LENGTH;
        sanitized[key] = `${value.slice(0, MAX_META_STRING_LENGTH)}... [${omitted} more chars]`;
      } else if (value instanceof Error) {
        // Errors serialize to {} under the JSON format
        const code = 'code' in value ? value.code : undefined;
        sanitized[key] = { name: value.name, message: value.message, code };
      }
    }

    return sanitized;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.sanitize(meta) : {};
    this.logger.debug(message, sanitized);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.sanitize(meta) : {};
    this.logger.info(message, sanitized);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.sanitize(meta) : {};
    this.logger.warn(message, sanitized);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    const sanitized = meta ? this.sanitize(meta) : {};
    this.logger.error(message, sanitized);
  }
}
