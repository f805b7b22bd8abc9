/**
 * Alerting Configuration
 *
 * Builds the immutable configuration snapshot consumed by the alerting
 * core. Snapshots are deep-frozen; reconfiguration means building a new
 * snapshot and handing it to the manager, never editing a live one.
 *
 * Sender credentials are loaded separately and never become part of a
 * snapshot.
 *
 * @module config/alertConfig
 */

import {
  isAlertCategory,
  mapCategories,
  isAlertSeverity,
  type AlertCategory,
  type AlertSeverity,
} from '../alerting/types.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface RateLimitingConfig {
  readonly enabled: boolean;
  readonly maxAlertsPerHour: number;
  readonly maxAlertsPerDay: number;
}

export interface CategoryConfig {
  readonly enabled: boolean;
  /** Default severity used by the typed shorthands for this category. */
  readonly severity: AlertSeverity;
  /** When false the category is exempt from rate limiting. */
  readonly rateLimitEnabled: boolean;
}

export interface EmailAlertsConfig {
  readonly enabled: boolean;
  readonly smtpServer: string;
  readonly smtpPort: number;
  readonly useTls: boolean;
  readonly timeoutMs: number;
}

export interface AlertConfig {
  readonly enabled: boolean;
  readonly minSeverity: AlertSeverity;
  readonly rateLimiting: RateLimitingConfig;
  readonly categories: Readonly<Record<AlertCategory, CategoryConfig>>;
  readonly emailAlerts: EmailAlertsConfig;
  readonly recipient: string;
}

export interface EmailCredentials {
  readonly sender: string;
  readonly password: string;
}

export class ConfigValidationError extends Error {
  public readonly code = 'CONFIG_VALIDATION_ERROR';

  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

// ─── Defaults ────────────────────────────────────────────────────────────────

export const DEFAULT_MAX_ALERTS_PER_HOUR = 10;
export const DEFAULT_MAX_ALERTS_PER_DAY = 50;
export const DEFAULT_SMTP_TIMEOUT_MS = 30_000;
/** Largest delay a timer accepts; Node fires longer ones after 1ms. */
export const MAX_SMTP_TIMEOUT_MS = 2_147_483_647;
const MAX_PORT = 65_535;

const DEFAULT_CATEGORY_SEVERITY: Record<AlertCategory, AlertSeverity> = {
  trading_errors: 'high',
  system_health: 'medium',
  data_pipeline: 'medium',
  security: 'critical',
  general: 'medium',
};

// ─── Validation helpers ──────────────────────────────────────────────────────

type RawObject = Record<string, unknown>;

function isRecord(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(raw: RawObject, key: string, path: string): RawObject {
  const value = raw[key];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new ConfigValidationError(`${path}.${key} must be an object`, `${path}.${key}`);
  }
  return value;
}

function readBoolean(raw: RawObject, key: string, fallback: boolean, path: string): boolean {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigValidationError(`${path}.${key} must be a boolean`, `${path}.${key}`);
  }
  return value;
}

function readPositiveInt(raw: RawObject, key: string, fallback: number, path: string): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigValidationError(`${path}.${key} must be a positive integer`, `${path}.${key}`);
  }
  return value;
}

function readBoundedInt(
  raw: RawObject,
  key: string,
  fallback: number,
  max: number,
  path: string,
): number {
  const value = readPositiveInt(raw, key, fallback, path);
  if (value > max) {
    throw new ConfigValidationError(`${path}.${key} must be at most ${max}`, `${path}.${key}`);
  }
  return value;
}

function readString(raw: RawObject, key: string, fallback: string, path: string): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') {
    throw new ConfigValidationError(`${path}.${key} must be a string`, `${path}.${key}`);
  }
  return value;
}

function readSeverity(
  raw: RawObject,
  key: string,
  fallback: AlertSeverity,
  path: string,
): AlertSeverity {
  const value = raw[key];
  if (value === undefined) return fallback;
  const normalised = typeof value === 'string' ? value.toLowerCase() : value;
  if (!isAlertSeverity(normalised)) {
    throw new ConfigValidationError(
      `${path}.${key} must be one of info, low, medium, high, critical (got ${String(value)})`,
      `${path}.${key}`,
    );
  }
  return normalised;
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

function parseCategories(raw: RawObject): Record<AlertCategory, CategoryConfig> {
  const section = readSection(raw, 'categories', 'alerts');

  for (const key of Object.keys(section)) {
    if (!isAlertCategory(key)) {
      throw new ConfigValidationError(
        `Unknown alert category: ${key}`,
        `alerts.categories.${key}`,
      );
    }
  }

  return mapCategories((category) => {
    const path = `alerts.categories.${category}`;
    const entry = readSection(section, category, 'alerts.categories');
    return Object.freeze({
      enabled: readBoolean(entry, 'enabled', true, path),
      severity: readSeverity(entry, 'severity', DEFAULT_CATEGORY_SEVERITY[category], path),
      rateLimitEnabled: readBoolean(entry, 'rateLimitEnabled', true, path),
    });
  });
}

/**
 * Validate a plain configuration object (e.g. parsed from JSON) and return
 * a deep-frozen snapshot with defaults filled in.
 *
 * @throws {ConfigValidationError} on unknown categories, bad severities or
 *   non-positive limits
 */
export function parseAlertConfig(raw: unknown = {}): AlertConfig {
  if (!isRecord(raw)) {
    throw new ConfigValidationError('Alert configuration must be an object', 'alerts');
  }

  const rateSection = readSection(raw, 'rateLimiting', 'alerts');
  const emailSection = readSection(raw, 'emailAlerts', 'alerts');

  const config: AlertConfig = {
    enabled: readBoolean(raw, 'enabled', true, 'alerts'),
    minSeverity: readSeverity(raw, 'minSeverity', 'medium', 'alerts'),
    rateLimiting: Object.freeze({
      enabled: readBoolean(rateSection, 'enabled', true, 'alerts.rateLimiting'),
      maxAlertsPerHour: readPositiveInt(
        rateSection,
        'maxAlertsPerHour',
        DEFAULT_MAX_ALERTS_PER_HOUR,
        'alerts.rateLimiting',
      ),
      maxAlertsPerDay: readPositiveInt(
        rateSection,
        'maxAlertsPerDay',
        DEFAULT_MAX_ALERTS_PER_DAY,
        'alerts.rateLimiting',
      ),
    }),
    categories: Object.freeze(parseCategories(raw)),
    emailAlerts: Object.freeze({
      enabled: readBoolean(emailSection, 'enabled', false, 'alerts.emailAlerts'),
      smtpServer: readString(emailSection, 'smtpServer', 'smtp.mail.yahoo.com', 'alerts.emailAlerts'),
      smtpPort: readBoundedInt(emailSection, 'smtpPort', 587, MAX_PORT, 'alerts.emailAlerts'),
      useTls: readBoolean(emailSection, 'useTls', true, 'alerts.emailAlerts'),
      timeoutMs: readBoundedInt(
        emailSection,
        'timeoutMs',
        DEFAULT_SMTP_TIMEOUT_MS,
        MAX_SMTP_TIMEOUT_MS,
        'alerts.emailAlerts',
      ),
    }),
    recipient: readString(raw, 'recipient', '', 'alerts'),
  };

  return Object.freeze(config);
}

// ─── Environment loading ─────────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

function envFlag(env: Env, key: string): boolean | undefined {
  const value = env[key];
  if (value === undefined || value === '') return undefined;
  return value.toLowerCase() === 'true';
}

function envInt(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value === '') return undefined;
  return parseInt(value, 10);
}

/**
 * Build a snapshot from environment variables. Unset variables fall back
 * to the defaults of {@link parseAlertConfig}.
 */
export function loadAlertConfig(env: Env = process.env): AlertConfig {
  const disabled = (env['ALERTS_DISABLED_CATEGORIES'] ?? '')
    .split(',')
    .map((c) => c.trim().toLowerCase())
    .filter((c) => c.length > 0);

  const categories: RawObject = {};
  for (const category of disabled) {
    categories[category] = { enabled: false };
  }

  return parseAlertConfig({
    enabled: envFlag(env, 'ALERTS_ENABLED'),
    minSeverity: env['ALERTS_MIN_SEVERITY'] || undefined,
    rateLimiting: {
      enabled: envFlag(env, 'ALERTS_RATE_LIMIT_ENABLED'),
      maxAlertsPerHour: envInt(env, 'ALERTS_MAX_PER_HOUR'),
      maxAlertsPerDay: envInt(env, 'ALERTS_MAX_PER_DAY'),
    },
    categories,
    emailAlerts: {
      enabled: envFlag(env, 'EMAIL_ALERTS_ENABLED'),
      smtpServer: env['SMTP_SERVER'] || undefined,
      smtpPort: envInt(env, 'SMTP_PORT'),
      useTls: envFlag(env, 'SMTP_USE_TLS'),
      timeoutMs: envInt(env, 'SMTP_TIMEOUT_MS'),
    },
    recipient: env['ALERT_RECIPIENT_EMAIL'] ?? '',
  });
}

/** Sender credentials come from the environment only. */
export function loadEmailCredentials(env: Env = process.env): EmailCredentials {
  return {
    sender: env['EMAIL_SENDER'] ?? '',
    password: env['EMAIL_PASSWORD'] ?? '',
  };
}

/** Names of the categories currently switched on, for status reporting. */
export function enabledCategories(config: AlertConfig): Record<AlertCategory, boolean> {
  return mapCategories((category) => config.categories[category].enabled);
}
