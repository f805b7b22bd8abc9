/**
 * Alerting Module
 *
 * Alert values and builders, the policy pipeline (filters, rate limiter,
 * circuit breaker), transports, fallback sinks and producer helpers.
 */

export {
  ALERT_CATEGORIES,
  ALERT_SEVERITIES,
  compareSeverity,
  isAlertCategory,
  isAlertSeverity,
  isFilteredOutcome,
  isForcedSecurityAlert,
  isSeverityAtLeast,
  mapCategories,
  type Alert,
  type AlertCategory,
  type AlertMetadata,
  type AlertOutcome,
  type AlertSeverity,
  type MetadataValue,
  type NonDeliveredOutcome,
} from './types.js';

export {
  AlertValidationError,
  CircuitOpenError,
  TransportError,
  isTransportError,
  isTransportFailure,
  toError,
  type TransportErrorKind,
} from './errors.js';

export {
  createAlert,
  createApiErrorAlert,
  createCircuitBreakerAlert,
  createDataFreshnessAlert,
  createDataPipelineErrorAlert,
  createFeatureEngineeringAlert,
  createDatabaseConnectionAlert,
  createOrderFailureAlert,
  createPerformanceAlert,
  createSecurityAlert,
  createSystemShutdownAlert,
  createSystemStartupAlert,
  createTradingErrorAlert,
  normalizeMetadata,
  performanceSeverity,
  DEFAULT_COMPONENT,
  type AlertInput,
  type AlertMetadataInput,
} from './alertFactory.js';

export {
  createAlertRateLimiter,
  startOfDay,
  startOfHour,
  type AlertRateLimiter,
  type ConfigProvider,
  type RateLimitUsage,
  type RateLimitWindow,
} from './rateLimiter.js';

export {
  createCircuitBreaker,
  DEFAULT_FAILURE_THRESHOLD,
  DEFAULT_RECOVERY_TIMEOUT_MS,
  type CircuitBreaker,
  type CircuitBreakerOptions,
  type CircuitBreakerSnapshot,
  type CircuitState,
  type CircuitStateChange,
} from './circuitBreaker.js';

export {
  classifyTransportError,
  createInMemoryEmailTransport,
  createSmtpEmailTransport,
  formatEmailBody,
  formatEmailSubject,
  PRODUCT_NAME,
  type EmailMessage,
  type EmailTransport,
  type InMemoryEmailTransport,
  type MailConnection,
  type MailConnectionFactory,
  type SmtpConnectionOptions,
  type SmtpEmailTransportOptions,
  type TransportProbeResult,
} from './transport.js';

export { createStatsRecorder, type AlertStats, type StatsRecorder } from './stats.js';

export {
  combineFallbackSinks,
  createInMemoryFallbackSink,
  createLoggerFallbackSink,
  createPgFallbackSink,
  serializeAlert,
  FALLBACK_TABLE,
  FALLBACK_TABLE_DDL,
  type FallbackReason,
  type FallbackRecord,
  type FallbackSink,
  type PgFallbackSink,
} from './fallbackSink.js';

export {
  createAlertManager,
  type AlertManager,
  type AlertManagerOptions,
  type AlertManagerStats,
  type AlertStatus,
  type CriticalAlertOptions,
  type SeverityShorthandOptions,
  type ShorthandOptions,
} from './alertManager.js';

export {
  withFailureAlert,
  withRuntimeAlert,
  DEFAULT_RUNTIME_THRESHOLD_MS,
  type FailureAlertOptions,
  type RuntimeAlertOptions,
} from './taskAlerts.js';

export { createAlertStatusEndpoint } from './statusEndpoint.js';
