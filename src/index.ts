/**
 * Alert Relay – Package Entry Point
 *
 * Re-exports the alerting core, its configuration loaders, the logger and
 * the composition root that wires them together.
 *
 * @module alert-relay
 */

// ─── Alerting ───
export * from './alerting/index.js';

// ─── Configuration ───
export {
  ConfigValidationError,
  DEFAULT_MAX_ALERTS_PER_DAY,
  DEFAULT_MAX_ALERTS_PER_HOUR,
  DEFAULT_SMTP_TIMEOUT_MS,
  MAX_SMTP_TIMEOUT_MS,
  enabledCategories,
  loadAlertConfig,
  loadEmailCredentials,
  parseAlertConfig,
  type AlertConfig,
  type CategoryConfig,
  type EmailAlertsConfig,
  type EmailCredentials,
  type RateLimitingConfig,
} from './config/alertConfig.js';

// ─── Logging ───
export {
  createLogger,
  createMemoryLogOutput,
  isLogLevel,
  type ErrorInfo,
  type LogContext,
  type LogEntry,
  type LogLevel,
  type LogMetadata,
  type LogOutput,
  type Logger,
  type LoggerOptions,
} from './logging/logger.js';

// ─── Database ───
export { createPool, createQuery, getDbConfig, type DbConfig, type QueryFn } from './db/pool.js';

// ─── Composition Root ───
export {
  createAlertingSystem,
  type AlertingSystem,
  type AlertingSystemBaseOptions,
  type AlertingSystemOptions,
  type TransportSource,
} from './alertingSystem.js';
