/**
 * @social-identity/observability
 *
 * Structured logging shared by the workspace packages
 */

export { ObservabilityLogger, getLogger, logger } from './logger.js';
export {
  getObservabilityConfig,
  detectEnvironment,
  isLogLevel,
  type ObservabilityConfig,
  type LogLevel
} from './config.js';
