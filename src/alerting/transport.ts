/**
 * Email Transport
 *
 * The alerting core only depends on the {@link EmailTransport} interface.
 * This module also provides the SMTP adapter used in production, which
 * delegates the wire protocol to an injected {@link MailConnectionFactory},
 * and an in-memory transport for tests.
 *
 * Each SMTP send opens its own connection, authenticates, transmits and
 * closes it again on every exit path. The whole exchange is bounded by the
 * configured timeout.
 *
 * @module alerting/transport
 */

import {
  ConfigValidationError,
  MAX_SMTP_TIMEOUT_MS,
  type EmailAlertsConfig,
  type EmailCredentials,
} from '../config/alertConfig.js';
import type { Logger } from '../logging/logger.js';
import { TransportError, toError, type TransportErrorKind } from './errors.js';
import type { Alert, MetadataValue } from './types.js';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Result of a lightweight connectivity probe. */
export interface TransportProbeResult {
  ok: boolean;
  latencyMs?: number;
  message?: string;
}

export interface EmailTransport {
  readonly name: string;
  /** Deliver one alert. Rejects with {@link TransportError}. */
  send(alert: Alert): Promise<void>;
  /** Whether the transport is enabled and has everything it needs to send. */
  isAvailable(): boolean;
  /** Connect and authenticate without sending a message. */
  testConnection(): Promise<TransportProbeResult>;
}

export interface EmailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

/** One open, authenticated connection to a mail server. */
export interface MailConnection {
  verify(): Promise<void>;
  sendMail(message: EmailMessage): Promise<void>;
  close(): void | Promise<void>;
}

export interface SmtpConnectionOptions {
  host: string;
  port: number;
  /** Implicit TLS from the first byte (port 465). */
  secure: boolean;
  /** Upgrade with STARTTLS before authenticating. */
  requireTls: boolean;
  auth: { user: string; pass: string };
  timeoutMs: number;
}

/** Opens a connection; plugged in by the host process (SMTP client, API client, ...). */
export type MailConnectionFactory = (options: SmtpConnectionOptions) => Promise<MailConnection>;

// ─── Message Formatting ──────────────────────────────────────────────────────

export const PRODUCT_NAME = 'Alert Relay';

/** Subject line, e.g. `[HIGH] Alert Relay: Order Failure: BUY AAPL`. */
export function formatEmailSubject(alert: Alert): string {
  return `[${alert.severity.toUpperCase()}] ${PRODUCT_NAME}: ${alert.title}`;
}

function formatMetadataValue(value: MetadataValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/** Plain-text body carrying the full alert. */
export function formatEmailBody(alert: Alert, generatedAt: Date = new Date()): string {
  const lines = [
    'Alert Details:',
    '================',
    `Title: ${alert.title}`,
    `Severity: ${alert.severity.toUpperCase()}`,
    `Category: ${alert.category}`,
    `Component: ${alert.component}`,
    `Timestamp: ${alert.createdAt.toISOString()}`,
    `Alert ID: ${alert.id}`,
  ];
  if (alert.correlationId) {
    lines.push(`Correlation ID: ${alert.correlationId}`);
  }

  lines.push('', 'Message:', '--------', alert.message);

  const entries = Object.entries(alert.metadata);
  if (entries.length > 0) {
    lines.push('', 'Additional Information:', '----------------------');
    for (const [key, value] of entries) {
      lines.push(`${key}: ${formatMetadataValue(value)}`);
    }
  }

  lines.push('', '--', PRODUCT_NAME, `Generated at ${generatedAt.toISOString()}`);
  return lines.join('\n');
}

// ─── Error classification ────────────────────────────────────────────────────

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNECTION',
  'ESOCKET',
  'EDNS',
  'ENOTFOUND',
]);
const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ETIMEOUT']);
const AUTH_CODES = new Set(['EAUTH', 'ENOAUTH']);

function readCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function readResponseCode(err: unknown): number | undefined {
  if (
    typeof err === 'object' &&
    err !== null &&
    'responseCode' in err &&
    typeof err.responseCode === 'number'
  ) {
    return err.responseCode;
  }
  return undefined;
}

/** Map a mail client error onto the transport failure taxonomy. */
export function classifyTransportError(err: unknown, stage: string): TransportError {
  if (err instanceof TransportError) return err;

  const code = readCode(err);
  const responseCode = readResponseCode(err);
  const detail = toError(err).message;

  let kind: TransportErrorKind = 'rejected';
  if (code !== undefined && AUTH_CODES.has(code)) kind = 'authentication';
  else if (responseCode === 535 || responseCode === 534) kind = 'authentication';
  else if (code !== undefined && TIMEOUT_CODES.has(code)) kind = 'timeout';
  else if (code !== undefined && CONNECTION_CODES.has(code)) kind = 'connection';
  else if (stage === 'connect') kind = 'connection';

  return new TransportError(`Mail ${stage} failed: ${detail}`, kind, err);
}

function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => void): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout();
      reject(new TransportError(`Mail exchange timed out after ${ms}ms`, 'timeout'));
    }, ms);
    promise.then(
      (val) => {
        clearTimeout(timer);
        resolve(val);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

// ─── SMTP Transport ──────────────────────────────────────────────────────────

export interface SmtpEmailTransportOptions {
  config: EmailAlertsConfig;
  recipient: string;
  credentials: EmailCredentials;
  connect: MailConnectionFactory;
  logger?: Logger;
  now?: () => number;
}

export function createSmtpEmailTransport(options: SmtpEmailTransportOptions): EmailTransport {
  const { config, recipient, credentials, connect, logger } = options;
  const now = options.now ?? Date.now;

  const { timeoutMs } = config;
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > MAX_SMTP_TIMEOUT_MS) {
    throw new ConfigValidationError(
      `emailAlerts.timeoutMs must be an integer between 1 and ${MAX_SMTP_TIMEOUT_MS}`,
      'alerts.emailAlerts.timeoutMs',
    );
  }

  const secure = config.useTls && config.smtpPort === 465;
  const connectionOptions: SmtpConnectionOptions = {
    host: config.smtpServer,
    port: config.smtpPort,
    secure,
    requireTls: config.useTls && !secure,
    auth: { user: credentials.sender, pass: credentials.password },
    timeoutMs: config.timeoutMs,
  };

  function isAvailable(): boolean {
    return (
      config.enabled &&
      credentials.sender.length > 0 &&
      credentials.password.length > 0 &&
      recipient.length > 0
    );
  }

  /**
   * Run `work` against a fresh connection. The connection is closed once,
   * either when `work` settles or when the timeout fires first.
   */
  function exchange(work: (connection: MailConnection) => Promise<void>): Promise<void> {
    let connection: MailConnection | undefined;
    let closed = false;
    let abandoned = false;

    async function closeOnce(): Promise<void> {
      if (!connection || closed) return;
      closed = true;
      try {
        await connection.close();
      } catch (err) {
        logger?.warn('Failed to close mail connection', { error: toError(err).message });
      }
    }

    const run = (async () => {
      const opened = await connect(connectionOptions).catch((err: unknown) => {
        throw classifyTransportError(err, 'connect');
      });
      connection = opened;
      try {
        if (abandoned) return;
        await work(opened);
      } finally {
        await closeOnce();
      }
    })();

    return withTimeout(run, config.timeoutMs, () => {
      abandoned = true;
      void closeOnce();
    });
  }

  return {
    name: 'smtp',

    isAvailable,

    async send(alert: Alert): Promise<void> {
      if (!isAvailable()) {
        throw new TransportError('Email transport is disabled or not configured', 'unavailable');
      }
      const message: EmailMessage = {
        from: credentials.sender,
        to: recipient,
        subject: formatEmailSubject(alert),
        text: formatEmailBody(alert, new Date(now())),
      };
      await exchange(async (connection) => {
        try {
          await connection.sendMail(message);
        } catch (err) {
          throw classifyTransportError(err, 'send');
        }
      });
      logger?.info('Email alert sent', { alertId: alert.id, severity: alert.severity });
    },

    async testConnection(): Promise<TransportProbeResult> {
      if (!isAvailable()) {
        return { ok: false, message: 'Email transport is disabled or not configured' };
      }
      const started = now();
      try {
        await exchange(async (connection) => {
          try {
            await connection.verify();
          } catch (err) {
            throw classifyTransportError(err, 'verify');
          }
        });
        return { ok: true, latencyMs: now() - started };
      } catch (err) {
        return { ok: false, latencyMs: now() - started, message: toError(err).message };
      }
    },
  };
}

// ─── In-Memory Transport (for testing) ───────────────────────────────────────

export interface InMemoryEmailTransport extends EmailTransport {
  /** Alerts delivered so far, in order. */
  readonly sent: Alert[];
  /** Number of send attempts, successful or not. */
  readonly attempts: number;
  /** Make every following send fail with the given kind, or succeed again with null. */
  setFailure(kind: TransportErrorKind | null): void;
  setAvailable(available: boolean): void;
}

export function createInMemoryEmailTransport(): InMemoryEmailTransport {
  const sent: Alert[] = [];
  let attempts = 0;
  let failure: TransportErrorKind | null = null;
  let available = true;

  return {
    name: 'in-memory',
    sent,
    get attempts(): number {
      return attempts;
    },
    setFailure(kind: TransportErrorKind | null): void {
      failure = kind;
    },
    setAvailable(value: boolean): void {
      available = value;
    },
    isAvailable(): boolean {
      return available;
    },
    async send(alert: Alert): Promise<void> {
      attempts += 1;
      if (failure !== null) {
        throw new TransportError(`Simulated ${failure} failure`, failure);
      }
      sent.push(alert);
    },
    async testConnection(): Promise<TransportProbeResult> {
      return failure === null
        ? { ok: true, latencyMs: 0 }
        : { ok: false, latencyMs: 0, message: `Simulated ${failure} failure` };
    },
  };
}
