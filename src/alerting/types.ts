/**
 * Alert Types
 *
 * Core value types shared by every part of the alerting pipeline: the
 * alert itself, its severity and category taxonomies, and the outcome
 * of processing one alert.
 *
 * @module alerting/types
 */

// ---------------------------------------------------------------------------
// Severity
// ---------------------------------------------------------------------------

export const ALERT_SEVERITIES = ['info', 'low', 'medium', 'high', 'critical'] as const;

export type AlertSeverity = (typeof ALERT_SEVERITIES)[number];

const SEVERITY_PRIORITY: Record<AlertSeverity, number> = {
  info: 1,
  low: 2,
  medium: 3,
  high: 4,
  critical: 5,
};

/** Negative when `a` is less urgent than `b`, zero when equal. */
export function compareSeverity(a: AlertSeverity, b: AlertSeverity): number {
  return SEVERITY_PRIORITY[a] - SEVERITY_PRIORITY[b];
}

export function isSeverityAtLeast(severity: AlertSeverity, minimum: AlertSeverity): boolean {
  return compareSeverity(severity, minimum) >= 0;
}

export function isAlertSeverity(value: unknown): value is AlertSeverity {
  return ALERT_SEVERITIES.some((severity) => severity === value);
}

// ---------------------------------------------------------------------------
// Category
// ---------------------------------------------------------------------------

export const ALERT_CATEGORIES = [
  'trading_errors',
  'system_health',
  'data_pipeline',
  'security',
  'general',
] as const;

export type AlertCategory = (typeof ALERT_CATEGORIES)[number];

export function isAlertCategory(value: unknown): value is AlertCategory {
  return ALERT_CATEGORIES.some((category) => category === value);
}

/** Build a record with one entry per category. */
export function mapCategories<T>(fn: (category: AlertCategory) => T): Record<AlertCategory, T> {
  return {
    trading_errors: fn('trading_errors'),
    system_health: fn('system_health'),
    data_pipeline: fn('data_pipeline'),
    security: fn('security'),
    general: fn('general'),
  };
}

// ---------------------------------------------------------------------------
// Alert
// ---------------------------------------------------------------------------

/** JSON-representable metadata value. */
export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | readonly MetadataValue[]
  | { readonly [key: string]: MetadataValue };

export type AlertMetadata = Readonly<Record<string, MetadataValue>>;

export interface Alert {
  readonly id: string;
  readonly title: string;
  readonly message: string;
  readonly severity: AlertSeverity;
  readonly category: AlertCategory;
  /** Subsystem that raised the alert, e.g. "OrderRouter". */
  readonly component: string;
  readonly metadata: AlertMetadata;
  /** Each read returns a fresh copy. */
  readonly createdAt: Date;
  readonly correlationId?: string;
}

/** Critical security alerts cannot be silenced by category or global switches. */
export function isForcedSecurityAlert(alert: Pick<Alert, 'severity' | 'category'>): boolean {
  return alert.severity === 'critical' && alert.category === 'security';
}

// ---------------------------------------------------------------------------
// Outcome
// ---------------------------------------------------------------------------

export type AlertOutcome =
  | 'sent'
  | 'filtered_disabled'
  | 'filtered_severity'
  | 'filtered_category'
  | 'rate_limited'
  | 'failed';

export type NonDeliveredOutcome = Exclude<AlertOutcome, 'sent'>;

export function isFilteredOutcome(outcome: AlertOutcome): boolean {
  return (
    outcome === 'filtered_disabled' ||
    outcome === 'filtered_severity' ||
    outcome === 'filtered_category'
  );
}
