/**
 * Observability configuration with environment detection
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ObservabilityConfig {
  environment: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  exporters: {
    console: boolean;
  };
  service: {
    name: string;
    version: string;
  };
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.some(level => level === value);
}

/**
 * Detect deployment environment
 */
export function detectEnvironment(): 'development' | 'production' | 'test' {
  if (process.env.NODE_ENV === 'test') {
    return 'test';
  }
  if (process.env.NODE_ENV === 'production') {
    return 'production';
  }
  return 'development';
}

/**
 * Get observability configuration based on environment
 */
export function getObservabilityConfig(): ObservabilityConfig {
  const environment = detectEnvironment();
  const requestedLevel = process.env.LOG_LEVEL;

  const config: ObservabilityConfig = {
    environment,
    logLevel: environment === 'development' ? 'debug' : 'info',
    service: {
      name: process.env.OTEL_SERVICE_NAME ?? 'social-identity',
      version: process.env.npm_package_version ?? '1.0.0'
    },
    exporters: {
      console: environment === 'development'
    }
  };

  if (isLogLevel(requestedLevel)) {
    config.logLevel = requestedLevel;
  }

  return config;
}
