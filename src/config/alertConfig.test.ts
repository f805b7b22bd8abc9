import { describe, it, expect } from 'vitest';
import {
  ConfigValidationError,
  enabledCategories,
  loadAlertConfig,
  loadEmailCredentials,
  MAX_SMTP_TIMEOUT_MS,
  parseAlertConfig,
} from './alertConfig.js';

describe('parseAlertConfig', () => {
  it('fills every default', () => {
    const config = parseAlertConfig({});

    expect(config.enabled).toBe(true);
    expect(config.minSeverity).toBe('medium');
    expect(config.rateLimiting).toEqual({
      enabled: true,
      maxAlertsPerHour: 10,
      maxAlertsPerDay: 50,
    });
    expect(config.emailAlerts).toEqual({
      enabled: false,
      smtpServer: 'smtp.mail.yahoo.com',
      smtpPort: 587,
      useTls: true,
      timeoutMs: 30000,
    });
    expect(config.recipient).toBe('');
    expect(config.categories.trading_errors).toEqual({
      enabled: true,
      severity: 'high',
      rateLimitEnabled: true,
    });
    expect(config.categories.security.severity).toBe('critical');
  });

  it('returns a deep-frozen snapshot', () => {
    const config = parseAlertConfig({ categories: { general: { enabled: false } } });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.rateLimiting)).toBe(true);
    expect(Object.isFrozen(config.categories)).toBe(true);
    expect(Object.isFrozen(config.categories.general)).toBe(true);
    expect(Object.isFrozen(config.emailAlerts)).toBe(true);
  });

  it('accepts severities case-insensitively', () => {
    expect(parseAlertConfig({ minSeverity: 'HIGH' }).minSeverity).toBe('high');
  });

  it('rejects an unknown severity', () => {
    expect(() => parseAlertConfig({ minSeverity: 'urgent' })).toThrow(ConfigValidationError);
    try {
      parseAlertConfig({ minSeverity: 'urgent' });
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError);
      if (err instanceof ConfigValidationError) {
        expect(err.path).toBe('alerts.minSeverity');
        expect(err.code).toBe('CONFIG_VALIDATION_ERROR');
      }
    }
  });

  it('rejects an unknown category', () => {
    expect(() => parseAlertConfig({ categories: { billing: { enabled: false } } })).toThrow(
      'Unknown alert category: billing',
    );
  });

  it.each([0, -5, 2.5, '10'])('rejects maxAlertsPerHour = %s', (value) => {
    expect(() => parseAlertConfig({ rateLimiting: { maxAlertsPerHour: value } })).toThrow(
      'alerts.rateLimiting.maxAlertsPerHour must be a positive integer',
    );
  });

  it('accepts the largest timeout a timer can hold', () => {
    const config = parseAlertConfig({ emailAlerts: { timeoutMs: MAX_SMTP_TIMEOUT_MS } });
    expect(config.emailAlerts.timeoutMs).toBe(2_147_483_647);
  });

  it('rejects a timeout longer than a timer can hold', () => {
    expect(() => parseAlertConfig({ emailAlerts: { timeoutMs: 3_000_000_000 } })).toThrow(
      'alerts.emailAlerts.timeoutMs must be at most 2147483647',
    );
  });

  it('rejects a port outside the TCP range', () => {
    expect(() => parseAlertConfig({ emailAlerts: { smtpPort: 70_000 } })).toThrow(
      'alerts.emailAlerts.smtpPort must be at most 65535',
    );
  });

  it('rejects wrong types', () => {
    expect(() => parseAlertConfig({ enabled: 'yes' })).toThrow('alerts.enabled must be a boolean');
    expect(() => parseAlertConfig({ emailAlerts: 'on' })).toThrow(
      'alerts.emailAlerts must be an object',
    );
    expect(() => parseAlertConfig([])).toThrow('Alert configuration must be an object');
  });
});

describe('loadAlertConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadAlertConfig({})).toEqual(parseAlertConfig({}));
  });

  it('reads every variable', () => {
    const config = loadAlertConfig({
      ALERTS_ENABLED: 'false',
      ALERTS_MIN_SEVERITY: 'low',
      ALERTS_RATE_LIMIT_ENABLED: 'False',
      ALERTS_MAX_PER_HOUR: '4',
      ALERTS_MAX_PER_DAY: '20',
      ALERTS_DISABLED_CATEGORIES: 'general, data_pipeline',
      EMAIL_ALERTS_ENABLED: 'TRUE',
      SMTP_SERVER: 'mail.example.test',
      SMTP_PORT: '465',
      SMTP_USE_TLS: 'true',
      SMTP_TIMEOUT_MS: '5000',
      ALERT_RECIPIENT_EMAIL: 'ops@example.test',
    });

    expect(config.enabled).toBe(false);
    expect(config.minSeverity).toBe('low');
    expect(config.rateLimiting).toEqual({ enabled: false, maxAlertsPerHour: 4, maxAlertsPerDay: 20 });
    expect(config.categories.general.enabled).toBe(false);
    expect(config.categories.data_pipeline.enabled).toBe(false);
    expect(config.categories.security.enabled).toBe(true);
    expect(config.emailAlerts).toEqual({
      enabled: true,
      smtpServer: 'mail.example.test',
      smtpPort: 465,
      useTls: true,
      timeoutMs: 5000,
    });
    expect(config.recipient).toBe('ops@example.test');
  });

  it('rejects a non-numeric limit', () => {
    expect(() => loadAlertConfig({ ALERTS_MAX_PER_HOUR: 'many' })).toThrow(ConfigValidationError);
  });

  it('rejects an SMTP_TIMEOUT_MS beyond the timer range', () => {
    let caught: unknown;
    try {
      loadAlertConfig({ SMTP_TIMEOUT_MS: '3000000000' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigValidationError);
    expect(caught).toMatchObject({ path: 'alerts.emailAlerts.timeoutMs' });
  });

  it('rejects an unknown disabled category', () => {
    expect(() => loadAlertConfig({ ALERTS_DISABLED_CATEGORIES: 'billing' })).toThrow(
      'Unknown alert category: billing',
    );
  });
});

describe('loadEmailCredentials', () => {
  it('reads sender and password from the environment', () => {
    expect(loadEmailCredentials({ EMAIL_SENDER: 'alerts@example.test', EMAIL_PASSWORD: 'test-secret' })).toEqual({
      sender: 'alerts@example.test',
      password: 'test-secret',
    });
  });

  it('defaults to empty strings', () => {
    expect(loadEmailCredentials({})).toEqual({ sender: '', password: '' });
  });

  it('never ends up in the configuration snapshot', () => {
    const config = loadAlertConfig({ EMAIL_SENDER: 'alerts@example.test', EMAIL_PASSWORD: 'test-secret' });
    expect(JSON.stringify(config)).not.toContain('test-secret');
  });
});

describe('enabledCategories', () => {
  it('maps each category to its flag', () => {
    const config = parseAlertConfig({ categories: { trading_errors: { enabled: false } } });
    expect(enabledCategories(config)).toEqual({
      trading_errors: false,
      system_health: true,
      data_pipeline: true,
      security: true,
      general: true,
    });
  });
});
