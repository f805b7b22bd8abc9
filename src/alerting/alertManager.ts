/**
 * Alert Manager
 *
 * Orchestrates the alert pipeline for every producer in the process:
 * global switch, severity threshold, category flag, rate limit, then a
 * circuit-breaker guarded send through the injected transport. Every
 * alert that is not delivered is written to the fallback sink.
 *
 * `process` never throws. The only hard error a producer can see is an
 * {@link AlertValidationError} from the building shorthands.
 *
 * @module alerting/alertManager
 */

import { enabledCategories, type AlertConfig } from '../config/alertConfig.js';
import { createLogger, type Logger } from '../logging/logger.js';
import {
  createAlert,
  createSecurityAlert,
  DEFAULT_COMPONENT,
  type AlertInput,
  type AlertMetadataInput,
} from './alertFactory.js';
import {
  createCircuitBreaker,
  type CircuitBreakerOptions,
  type CircuitBreakerSnapshot,
  type CircuitState,
  type CircuitStateChange,
} from './circuitBreaker.js';
import { toError } from './errors.js';
import type { FallbackReason, FallbackSink } from './fallbackSink.js';
import { createAlertRateLimiter, type RateLimitUsage } from './rateLimiter.js';
import { createStatsRecorder, type AlertStats } from './stats.js';
import type { EmailTransport } from './transport.js';
import {
  isForcedSecurityAlert,
  isSeverityAtLeast,
  type Alert,
  type AlertCategory,
  type AlertOutcome,
  type AlertSeverity,
  type NonDeliveredOutcome,
} from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AlertStatus {
  readonly enabled: boolean;
  /** False while the circuit breaker is open. */
  readonly transportAvailable: boolean;
  /** Whether the transport has what it needs to send (enabled, credentials, recipient). */
  readonly transportConfigured: boolean;
  readonly rateLimitingEnabled: boolean;
  readonly minSeverity: AlertSeverity;
  readonly circuitState: CircuitState;
  readonly categoriesEnabled: Readonly<Record<AlertCategory, boolean>>;
}

export interface AlertManagerStats extends AlertStats {
  readonly rateLimits: Readonly<Record<AlertCategory, RateLimitUsage>>;
  readonly circuitBreaker: CircuitBreakerSnapshot;
}

/** Optional fields shared by the typed shorthands. */
export interface ShorthandOptions {
  component?: string;
  metadata?: AlertMetadataInput;
  correlationId?: string;
}

export interface SeverityShorthandOptions extends ShorthandOptions {
  /** Defaults to the severity configured for the category. */
  severity?: AlertSeverity;
}

export interface CriticalAlertOptions extends ShorthandOptions {
  category?: AlertCategory;
}

export interface AlertManager {
  process(alert: Alert): Promise<AlertOutcome>;
  /** Same as {@link AlertManager.process}. */
  processAlert(alert: Alert): Promise<AlertOutcome>;
  sendAlert(input: AlertInput): Promise<AlertOutcome>;
  sendTradingErrorAlert(
    errorMessage: string,
    component: string,
    metadata?: AlertMetadataInput,
  ): Promise<AlertOutcome>;
  sendSystemHealthAlert(
    title: string,
    message: string,
    options?: SeverityShorthandOptions,
  ): Promise<AlertOutcome>;
  sendDataPipelineAlert(
    title: string,
    message: string,
    options?: SeverityShorthandOptions,
  ): Promise<AlertOutcome>;
  /** Always critical and always in the security category. */
  sendSecurityAlert(title: string, message: string, options?: ShorthandOptions): Promise<AlertOutcome>;
  sendCriticalAlert(
    title: string,
    message: string,
    options?: CriticalAlertOptions,
  ): Promise<AlertOutcome>;
  getStatus(): AlertStatus;
  getStats(): AlertManagerStats;
  /** Push one info alert through the whole pipeline; true when it was sent. */
  testAlertSystem(): Promise<boolean>;
  /** Swap the configuration snapshot. Calls already in progress keep the old one. */
  reconfigure(config: AlertConfig): void;
  getConfig(): AlertConfig;
}

export interface AlertManagerOptions {
  config: AlertConfig;
  transport: EmailTransport;
  fallbackSink: FallbackSink;
  logger?: Logger;
  /** Settings for the breaker that guards the transport. */
  circuitBreaker?: CircuitBreakerOptions;
  now?: () => number;
}

type Gate = { outcome: 'pass' } | { outcome: NonDeliveredOutcome; detail: string };

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function createAlertManager(options: AlertManagerOptions): AlertManager {
  const { transport, fallbackSink } = options;
  const now = options.now ?? Date.now;
  const logger = (options.logger ?? createLogger()).child({ component: 'alert-manager' });

  let config = options.config;

  const breakerOptions = options.circuitBreaker ?? {};
  const breaker = createCircuitBreaker({
    now,
    ...breakerOptions,
    onStateChange: (change: CircuitStateChange) => {
      logStateChange(change);
      breakerOptions.onStateChange?.(change);
    },
  });
  const rateLimiter = createAlertRateLimiter(() => config, now);
  const stats = createStatsRecorder();

  function logStateChange(change: CircuitStateChange): void {
    const meta = { breaker: change.name, from: change.from, failureCount: change.failureCount };
    if (change.to === 'open') {
      logger.warn(`Circuit breaker opened for transport ${transport.name}`, meta);
    } else {
      logger.info(`Circuit breaker ${change.to} for transport ${transport.name}`, meta);
    }
  }

  /**
   * Synchronous policy gate. Runs filters and the rate-limit
   * check-and-increment without yielding.
   */
  function gate(alert: Alert, current: AlertConfig): Gate {
    const forced = isForcedSecurityAlert(alert);

    if (!current.enabled && !forced) {
      return { outcome: 'filtered_disabled', detail: 'Alerting is disabled' };
    }
    if (!isSeverityAtLeast(alert.severity, current.minSeverity)) {
      return {
        outcome: 'filtered_severity',
        detail: `Severity ${alert.severity} is below minimum ${current.minSeverity}`,
      };
    }
    if (!current.categories[alert.category].enabled && !forced) {
      return { outcome: 'filtered_category', detail: `Category ${alert.category} is disabled` };
    }
    if (!rateLimiter.allow(alert.category)) {
      return {
        outcome: 'rate_limited',
        detail: `Rate limit exceeded for category ${alert.category}`,
      };
    }
    return { outcome: 'pass' };
  }

  async function toFallback(alert: Alert, reason: FallbackReason): Promise<void> {
    try {
      await fallbackSink.log(alert, reason);
    } catch (err) {
      logger.error('Fallback sink failed to record alert', toError(err), {
        alertId: alert.id,
        outcome: reason.outcome,
      });
    }
  }

  async function process(alert: Alert): Promise<AlertOutcome> {
    const current = config;
    const meta = { alertId: alert.id, severity: alert.severity, category: alert.category };

    const decision = gate(alert, current);
    if (decision.outcome !== 'pass') {
      stats.record(alert, decision.outcome);
      if (decision.outcome === 'rate_limited') {
        logger.info(`Alert rate limited: ${alert.title}`, meta);
      } else {
        logger.debug(`Alert filtered (${decision.outcome}): ${alert.title}`, meta);
      }
      await toFallback(alert, { outcome: decision.outcome, detail: decision.detail });
      return decision.outcome;
    }

    try {
      await breaker.call(() => transport.send(alert));
    } catch (err) {
      const error = toError(err);
      stats.record(alert, 'failed');
      logger.error(`Alert delivery failed: ${alert.title}`, error, meta);
      await toFallback(alert, { outcome: 'failed', detail: error.message });
      return 'failed';
    }

    stats.record(alert, 'sent');
    logger.info(`Alert sent: ${alert.title}`, meta);
    return 'sent';
  }

  async function sendAlert(input: AlertInput): Promise<AlertOutcome> {
    return process(createAlert(input));
  }

  return {
    process,
    processAlert: process,
    sendAlert,

    async sendTradingErrorAlert(errorMessage, component, metadata) {
      return sendAlert({
        title: 'Trading System Error',
        message: errorMessage,
        severity: 'high',
        category: 'trading_errors',
        component,
        metadata,
      });
    },

    async sendSystemHealthAlert(title, message, opts = {}) {
      return sendAlert({
        ...opts,
        title,
        message,
        severity: opts.severity ?? config.categories.system_health.severity,
        category: 'system_health',
      });
    },

    async sendDataPipelineAlert(title, message, opts = {}) {
      return sendAlert({
        ...opts,
        title,
        message,
        severity: opts.severity ?? config.categories.data_pipeline.severity,
        category: 'data_pipeline',
      });
    },

    async sendSecurityAlert(title, message, opts = {}) {
      const alert = createSecurityAlert(
        title,
        message,
        opts.component ?? DEFAULT_COMPONENT,
        opts.metadata,
      );
      if (opts.correlationId === undefined) return process(alert);
      return sendAlert({
        title: alert.title,
        message: alert.message,
        severity: alert.severity,
        category: alert.category,
        component: alert.component,
        metadata: alert.metadata,
        correlationId: opts.correlationId,
      });
    },

    async sendCriticalAlert(title, message, opts = {}) {
      return sendAlert({
        ...opts,
        title,
        message,
        severity: 'critical',
        category: opts.category ?? 'general',
      });
    },

    getStatus(): AlertStatus {
      const current = config;
      return Object.freeze({
        enabled: current.enabled,
        transportAvailable: breaker.state !== 'open',
        transportConfigured: transport.isAvailable(),
        rateLimitingEnabled: current.rateLimiting.enabled,
        minSeverity: current.minSeverity,
        circuitState: breaker.state,
        categoriesEnabled: Object.freeze(enabledCategories(current)),
      });
    },

    getStats(): AlertManagerStats {
      return Object.freeze({
        ...stats.snapshot(),
        rateLimits: rateLimiter.getUsage(),
        circuitBreaker: breaker.getSnapshot(),
      });
    },

    async testAlertSystem(): Promise<boolean> {
      logger.info('Testing alert system');
      const outcome = await sendAlert({
        title: 'Alert System Test',
        message: 'This is a test alert to verify the alert system is working correctly.',
        severity: 'info',
        category: 'system_health',
        component: 'AlertManager',
        metadata: { test: true, timestamp: new Date(now()).toISOString() },
      });
      const success = outcome === 'sent';
      logger.info(`Alert system test ${success ? 'passed' : 'failed'}: ${outcome}`);
      return success;
    },

    reconfigure(next: AlertConfig): void {
      config = next;
      logger.info('Alert configuration replaced', {
        enabled: next.enabled,
        minSeverity: next.minSeverity,
      });
    },

    getConfig(): AlertConfig {
      return config;
    },
  };
}
