/**
 * Alert Factory
 *
 * Pure builders that produce validated, frozen {@link Alert} values for the
 * common alerting scenarios. Nothing here touches shared state; invalid
 * input is rejected with {@link AlertValidationError} before an alert
 * exists.
 *
 * @module alerting/alertFactory
 */

import { randomUUID } from 'node:crypto';
import { AlertValidationError } from './errors.js';
import {
  isAlertCategory,
  isAlertSeverity,
  type Alert,
  type AlertCategory,
  type AlertMetadata,
  type AlertSeverity,
  type MetadataValue,
} from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Metadata as accepted from producers; validated into {@link AlertMetadata}. */
export type AlertMetadataInput = Readonly<Record<string, unknown>>;

export interface AlertInput {
  title: string;
  message: string;
  severity: AlertSeverity;
  category?: AlertCategory;
  component?: string;
  metadata?: AlertMetadataInput;
  correlationId?: string;
  createdAt?: Date;
}

export const DEFAULT_COMPONENT = 'unknown';

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function requireText(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new AlertValidationError(`Alert ${field} cannot be empty`, field);
  }
  return value;
}

function requireFinite(value: number, field: string): number {
  if (!Number.isFinite(value)) {
    throw new AlertValidationError(`${field} must be a finite number`, field);
  }
  return value;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Copy `value` into a frozen JSON-representable structure. Dates become
 * ISO strings; anything else that JSON cannot carry is rejected.
 */
function toMetadataValue(value: unknown, path: string, ancestors: Set<object>): MetadataValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new AlertValidationError(`Metadata value at ${path} must be a finite number`, path);
    }
    return value;
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new AlertValidationError(`Metadata value at ${path} is an invalid date`, path);
    }
    return value.toISOString();
  }
  if (typeof value !== 'object') {
    throw new AlertValidationError(
      `Metadata value at ${path} has unsupported type ${typeof value}`,
      path,
    );
  }
  if (ancestors.has(value)) {
    throw new AlertValidationError(`Metadata at ${path} contains a circular reference`, path);
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return Object.freeze(value.map((item, i) => toMetadataValue(item, `${path}[${i}]`, ancestors)));
    }
    if (!isPlainObject(value)) {
      throw new AlertValidationError(`Metadata value at ${path} must be a plain object`, path);
    }
    const entries = Object.entries(value).map(
      ([key, nested]): [string, MetadataValue] => [
        key,
        toMetadataValue(nested, `${path}.${key}`, ancestors),
      ],
    );
    return Object.freeze(Object.fromEntries(entries));
  } finally {
    ancestors.delete(value);
  }
}

/** Validate producer metadata, preserving key order. */
export function normalizeMetadata(metadata: AlertMetadataInput = {}): AlertMetadata {
  const ancestors = new Set<object>([metadata]);
  // fromEntries defines own properties, so a "__proto__" key stays a plain key
  const entries = Object.entries(metadata).map(
    ([key, value]): [string, MetadataValue] => [
      key,
      toMetadataValue(value, `metadata.${key}`, ancestors),
    ],
  );
  return Object.freeze(Object.fromEntries(entries));
}

// ---------------------------------------------------------------------------
// Generic builder
// ---------------------------------------------------------------------------

/**
 * Build an alert from loosely-typed producer input.
 *
 * @throws {AlertValidationError} when a field is empty, the severity or
 *   category is unknown, or metadata cannot be serialised
 */
export function createAlert(input: AlertInput): Alert {
  const title = requireText(input.title, 'title');
  const message = requireText(input.message, 'message');
  const component = requireText(input.component ?? DEFAULT_COMPONENT, 'component');

  if (!isAlertSeverity(input.severity)) {
    throw new AlertValidationError(`Invalid severity: ${String(input.severity)}`, 'severity');
  }
  const category = input.category ?? 'general';
  if (!isAlertCategory(category)) {
    throw new AlertValidationError(`Invalid category: ${String(category)}`, 'category');
  }
  if (input.correlationId !== undefined) {
    requireText(input.correlationId, 'correlationId');
  }

  const createdAt = input.createdAt ?? new Date();
  if (Number.isNaN(createdAt.getTime())) {
    throw new AlertValidationError('Alert createdAt is an invalid date', 'createdAt');
  }
  const createdAtMs = createdAt.getTime();
  const alert: Alert = {
    id: randomUUID(),
    title,
    message,
    severity: input.severity,
    category,
    component,
    metadata: normalizeMetadata(input.metadata),
    // Date is mutable; every read gets its own copy
    get createdAt(): Date {
      return new Date(createdAtMs);
    },
    ...(input.correlationId !== undefined ? { correlationId: input.correlationId } : {}),
  };
  return Object.freeze(alert);
}

// ---------------------------------------------------------------------------
// Trading
// ---------------------------------------------------------------------------

export function createTradingErrorAlert(
  errorMessage: string,
  component: string,
  errorType = 'Trading Error',
  metadata?: AlertMetadataInput,
): Alert {
  requireText(component, 'component');
  return createAlert({
    title: `${requireText(errorType, 'errorType')} in ${component}`,
    message: errorMessage,
    severity: 'high',
    category: 'trading_errors',
    component,
    metadata,
  });
}

export function createOrderFailureAlert(
  symbol: string,
  orderType: string,
  errorMessage: string,
  metadata: AlertMetadataInput = {},
  component = 'TradingSystem',
): Alert {
  requireText(symbol, 'symbol');
  requireText(orderType, 'orderType');
  requireText(errorMessage, 'errorMessage');
  return createAlert({
    title: `Order Failure: ${orderType} ${symbol}`,
    message: `Failed to execute ${orderType} order for ${symbol}: ${errorMessage}`,
    severity: 'high',
    category: 'trading_errors',
    component,
    metadata: { ...metadata, symbol, order_type: orderType },
  });
}

// ---------------------------------------------------------------------------
// System health
// ---------------------------------------------------------------------------

/**
 * Severity grows with how far `currentValue` overshoots `threshold`:
 * 2x or more is critical, 1.5x high, 1.2x medium, anything above low.
 * Values at or under the threshold are informational.
 */
export function performanceSeverity(currentValue: number, threshold: number): AlertSeverity {
  if (currentValue <= threshold) return 'info';
  if (threshold <= 0) return 'medium';

  const ratio = currentValue / threshold;
  if (ratio >= 2) return 'critical';
  if (ratio >= 1.5) return 'high';
  if (ratio >= 1.2) return 'medium';
  return 'low';
}

export function createPerformanceAlert(
  metricName: string,
  currentValue: number,
  threshold: number,
  component: string,
  metadata: AlertMetadataInput = {},
): Alert {
  requireText(metricName, 'metricName');
  requireFinite(currentValue, 'currentValue');
  requireFinite(threshold, 'threshold');
  return createAlert({
    title: `Performance Alert: ${metricName}`,
    message: `${metricName} has exceeded threshold: ${currentValue} > ${threshold}`,
    severity: performanceSeverity(currentValue, threshold),
    category: 'system_health',
    component,
    metadata: { ...metadata, metric: metricName, current_value: currentValue, threshold },
  });
}

export function createDatabaseConnectionAlert(
  errorMessage: string,
  component = 'Database',
  metadata?: AlertMetadataInput,
): Alert {
  return createAlert({
    title: 'Database Connection Error',
    message: `Database connection failed: ${requireText(errorMessage, 'errorMessage')}`,
    severity: 'high',
    category: 'system_health',
    component,
    metadata,
  });
}

export function createApiErrorAlert(
  apiName: string,
  errorMessage: string,
  component: string,
  metadata?: AlertMetadataInput,
): Alert {
  return createAlert({
    title: `API Error: ${requireText(apiName, 'apiName')}`,
    message: errorMessage,
    severity: 'medium',
    category: 'system_health',
    component,
    metadata,
  });
}

export function createCircuitBreakerAlert(
  serviceName: string,
  component: string,
  metadata?: AlertMetadataInput,
): Alert {
  requireText(serviceName, 'serviceName');
  return createAlert({
    title: `Circuit Breaker Opened: ${serviceName}`,
    message: `Circuit breaker for ${serviceName} has been opened due to repeated failures`,
    severity: 'high',
    category: 'system_health',
    component,
    metadata,
  });
}

export function createSystemStartupAlert(
  component: string,
  version?: string,
  metadata?: AlertMetadataInput,
): Alert {
  requireText(component, 'component');
  const versionText = version ? ` (v${version})` : '';
  return createAlert({
    title: `System Started: ${component}${versionText}`,
    message: `${component} has started successfully and is ready to process requests`,
    severity: 'info',
    category: 'system_health',
    component,
    metadata,
  });
}

export function createSystemShutdownAlert(
  component: string,
  reason = 'Normal shutdown',
  metadata?: AlertMetadataInput,
): Alert {
  requireText(component, 'component');
  return createAlert({
    title: `System Shutdown: ${component}`,
    message: `${component} is shutting down: ${reason}`,
    severity: 'medium',
    category: 'system_health',
    component,
    metadata,
  });
}

// ---------------------------------------------------------------------------
// Data pipeline
// ---------------------------------------------------------------------------

export function createDataPipelineErrorAlert(
  pipelineName: string,
  errorMessage: string,
  component: string,
  metadata?: AlertMetadataInput,
): Alert {
  return createAlert({
    title: `Data Pipeline Error: ${requireText(pipelineName, 'pipelineName')}`,
    message: errorMessage,
    severity: 'medium',
    category: 'data_pipeline',
    component,
    metadata,
  });
}

export function createFeatureEngineeringAlert(
  pipelineName: string,
  message: string,
  severity: AlertSeverity = 'medium',
  component = 'FeatureEngineering',
  metadata?: AlertMetadataInput,
): Alert {
  return createAlert({
    title: `Feature Engineering: ${requireText(pipelineName, 'pipelineName')}`,
    message,
    severity,
    category: 'data_pipeline',
    component,
    metadata,
  });
}

/** Computed freshness fields take precedence over same-named keys in `metadata`. */
export function createDataFreshnessAlert(
  dataSource: string,
  lastUpdate: Date,
  thresholdHours: number,
  component = 'DataMonitor',
  metadata: AlertMetadataInput = {},
  now: Date = new Date(),
): Alert {
  requireText(dataSource, 'dataSource');
  requireFinite(thresholdHours, 'thresholdHours');
  const hoursOld = (now.getTime() - lastUpdate.getTime()) / 3_600_000;
  requireFinite(hoursOld, 'lastUpdate');

  return createAlert({
    title: `Stale Data Alert: ${dataSource}`,
    message: `Data from ${dataSource} is ${hoursOld.toFixed(1)} hours old (threshold: ${thresholdHours}h)`,
    severity: 'medium',
    category: 'data_pipeline',
    component,
    metadata: {
      ...metadata,
      data_source: dataSource,
      last_update: lastUpdate,
      hours_old: Math.round(hoursOld * 10) / 10,
      threshold_hours: thresholdHours,
    },
    createdAt: now,
  });
}

// ---------------------------------------------------------------------------
// Security
// ---------------------------------------------------------------------------

/** Always critical and always in the security category. */
export function createSecurityAlert(
  title: string,
  message: string,
  component: string,
  metadata?: AlertMetadataInput,
): Alert {
  return createAlert({
    title: `Security Alert: ${requireText(title, 'title')}`,
    message,
    severity: 'critical',
    category: 'security',
    component,
    metadata,
  });
}
