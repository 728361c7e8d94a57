/**
 * Structured logging with Pino and OpenTelemetry trace correlation
 */

import pino from 'pino';
import { trace } from '@opentelemetry/api';
import { getObservabilityConfig, type LogLevel, type ObservabilityConfig } from './config.js';

export type { LogLevel };

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'key', 'auth', 'credential'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pino-backed logger shared by every package in the workspace
 */
export class ObservabilityLogger {
  private pino: pino.Logger;
  private config: ObservabilityConfig;
  private isProduction: boolean;

  /**
   * @param destination - explicit sink; bypasses the silent test-mode logger
   */
  constructor(config?: ObservabilityConfig, destination?: pino.DestinationStream) {
    this.config = config ?? getObservabilityConfig();
    this.isProduction = this.config.environment === 'production';
    this.pino = this.createPinoLogger(destination);
  }

  private createPinoLogger(destination?: pino.DestinationStream): pino.Logger {
    const baseOptions: pino.LoggerOptions = {
      level: this.config.logLevel,
      base: { service: this.config.service.name, version: this.config.service.version },
      formatters: {
        level: (label) => ({ level: label }),
        log: (object) => this.addTraceContext(object)
      }
    };

    if (destination) {
      return pino(baseOptions, destination);
    }

    // Keep test output concise
    if (this.config.environment === 'test') {
      return pino(
        { level: 'silent' },
        pino.destination('/dev/null')
      );
    }

    if (this.config.exporters.console) {
      // Custom formatters are not allowed together with transports
      return pino({
        level: this.config.logLevel,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2
          }
        }
      });
    }

    return pino(baseOptions);
  }

  /**
   * Add OpenTelemetry trace context to log entries
   */
  private addTraceContext(logObject: Record<string, unknown>): Record<string, unknown> {
    const span = trace.getActiveSpan();
    if (span) {
      const spanContext = span.spanContext();
      return {
        ...logObject,
        trace_id: spanContext.traceId,
        span_id: spanContext.spanId,
        trace_flags: spanContext.traceFlags
      };
    }
    return logObject;
  }

  /**
   * Sanitize sensitive information for production
   */
  private sanitizeForProduction(message: string, data?: unknown): { message: string; data?: unknown } {
    if (!this.isProduction) {
      return { message, data };
    }

    const sanitizedMessage = message
      .replace(/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b/g, '[EMAIL]')
      .replace(/\b\d{4,}\b/g, '[NUMBER]')
      .replace(/Bearer\s+[A-Za-z0-9\-._~+/]+=*/g, 'Bearer [TOKEN]')
      .replace(/[A-Za-z0-9\-._~+/]{32,}/g, '[TOKEN]');

    let sanitizedData = data;
    if (data && typeof data === 'object') {
      sanitizedData = this.sanitizeObject(data);
    }

    return { message: sanitizedMessage, data: sanitizedData };
  }

  private sanitizeObject(obj: unknown, visited: WeakSet<object> = new WeakSet()): unknown {
    if (typeof obj !== 'object' || obj === null) {
      return obj;
    }

    if (visited.has(obj)) {
      return '[Circular Reference]';
    }
    visited.add(obj);

    if (Array.isArray(obj)) {
      return obj.map(item => this.sanitizeObject(item, visited));
    }

    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase();

      if (SENSITIVE_KEYS.some(sensitiveKey => lowerKey.includes(sensitiveKey))) {
        sanitized[key] = '[REDACTED]';
      } else if (typeof value === 'object' && value !== null) {
        sanitized[key] = this.sanitizeObject(value, visited);
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }

  private toMergingObject(data: unknown): Record<string, unknown> {
    if (data === undefined) {
      return {};
    }
    return isRecord(data) ? data : { data };
  }

  debug(message: string, data?: unknown): void {
    const { message: sanitizedMessage, data: sanitizedData } = this.sanitizeForProduction(message, data);
    this.pino.debug(this.toMergingObject(sanitizedData), sanitizedMessage);
  }

  info(message: string, data?: unknown): void {
    const { message: sanitizedMessage, data: sanitizedData } = this.sanitizeForProduction(message, data);
    this.pino.info(this.toMergingObject(sanitizedData), sanitizedMessage);
  }

  warn(message: string, data?: unknown): void {
    const { message: sanitizedMessage, data: sanitizedData } = this.sanitizeForProduction(message, data);
    this.pino.warn(this.toMergingObject(sanitizedData), sanitizedMessage);
  }

  error(message: string, error?: Error | unknown): void {
    const { message: sanitizedMessage } = this.sanitizeForProduction(message);

    if (error instanceof Error) {
      const errorInfo = this.isProduction
        ? { name: error.name, message: 'Internal server error' }
        : { name: error.name, message: error.message, stack: error.stack };
      this.pino.error(errorInfo, sanitizedMessage);
    } else if (error) {
      const { data: sanitizedError } = this.sanitizeForProduction('', error);
      this.pino.error(this.toMergingObject(sanitizedError), sanitizedMessage);
    } else {
      this.pino.error({}, sanitizedMessage);
    }
  }

  oauthDebug(message: string, data?: unknown): void {
    this.debug(`[OAuth] ${message}`, data);
  }

  oauthInfo(message: string, data?: unknown): void {
    this.info(`[OAuth] ${message}`, data);
  }

  oauthWarn(message: string, data?: unknown): void {
    this.warn(`[OAuth] ${message}`, data);
  }

  oauthError(message: string, error?: Error | unknown): void {
    this.error(`[OAuth] ${message}`, error);
  }

  /**
   * Get underlying Pino logger for advanced usage
   */
  getPino(): pino.Logger {
    return this.pino;
  }
}

let loggerInstance: ObservabilityLogger | null = null;

export function getLogger(): ObservabilityLogger {
  if (!loggerInstance) {
    loggerInstance = new ObservabilityLogger();
  }
  return loggerInstance;
}

export const logger = getLogger();
