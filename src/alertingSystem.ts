/**
 * Alerting System
 *
 * Composition root. Builds the logger, transport, fallback sinks and
 * alert manager from one configuration snapshot. The returned object is
 * owned by whoever created it and passed to the call sites that raise
 * alerts; there is no module-level instance.
 *
 * @module alertingSystem
 */

// ── Imports ──────────────────────────────────────────────────────────────────

import type { Router } from 'express';
import type pg from 'pg';
import {
  combineFallbackSinks,
  createAlertManager,
  createAlertStatusEndpoint,
  createLoggerFallbackSink,
  createPgFallbackSink,
  createSmtpEmailTransport,
  type AlertManager,
  type CircuitBreakerOptions,
  type EmailTransport,
  type FallbackSink,
  type MailConnectionFactory,
  type PgFallbackSink,
} from './alerting/index.js';
import {
  loadAlertConfig,
  loadEmailCredentials,
  type AlertConfig,
  type EmailCredentials,
} from './config/alertConfig.js';
import { createPool, createQuery, getDbConfig, type QueryFn } from './db/pool.js';
import { createLogger, type Logger, type LoggerOptions } from './logging/logger.js';

// ── Options ──────────────────────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

/** Either a ready transport, or a mail connection factory for the SMTP adapter. */
export type TransportSource =
  | { transport: EmailTransport; connect?: never }
  | { connect: MailConnectionFactory; transport?: never };

export interface AlertingSystemBaseOptions {
  /** Configuration snapshot. Defaults to {@link loadAlertConfig} over `env`. */
  config?: AlertConfig;
  /** Sender credentials. Defaults to {@link loadEmailCredentials} over `env`. */
  credentials?: EmailCredentials;
  env?: Env;
  logger?: LoggerOptions;
  circuitBreaker?: CircuitBreakerOptions;
  /** Persist undelivered alerts through this query function. */
  query?: QueryFn;
  /**
   * Persist undelivered alerts to a pool built from the DB_* variables in
   * `env`. Ignored when `query` is given. The system owns that pool.
   */
  persistFallback?: boolean;
  /** Extra sink that receives every undelivered alert. */
  fallbackSink?: FallbackSink;
  now?: () => number;
}

export type AlertingSystemOptions = AlertingSystemBaseOptions & TransportSource;

export interface AlertingSystem {
  readonly logger: Logger;
  readonly manager: AlertManager;
  readonly transport: EmailTransport;
  readonly fallbackSink: FallbackSink;
  /** Express router with the operator status routes. */
  readonly router: Router;
  /** Prepare durable storage and log the starting status. */
  start(): Promise<void>;
  /** Release resources the system created itself. */
  shutdown(): Promise<void>;
}

// ── Factory ──────────────────────────────────────────────────────────────────

function resolveTransport(
  options: AlertingSystemOptions,
  config: AlertConfig,
  env: Env,
  logger: Logger,
  now: () => number,
): EmailTransport {
  if (options.transport) return options.transport;
  const { connect } = options;
  if (!connect) {
    throw new Error('An email transport or a mail connection factory is required');
  }
  return createSmtpEmailTransport({
    config: config.emailAlerts,
    recipient: config.recipient,
    credentials: options.credentials ?? loadEmailCredentials(env),
    connect,
    logger: logger.child({ component: 'email-transport' }),
    now,
  });
}

// ── Composition ──────────────────────────────────────────────────────────────

export function createAlertingSystem(options: AlertingSystemOptions): AlertingSystem {
  const env = options.env ?? process.env;
  const config = options.config ?? loadAlertConfig(env);
  const logger = createLogger(options.logger);
  const now = options.now ?? Date.now;

  const transport = resolveTransport(options, config, env, logger, now);

  let ownedPool: pg.Pool | undefined;
  let query = options.query;
  if (!query && options.persistFallback) {
    ownedPool = createPool(getDbConfig(env));
    query = createQuery(ownedPool);
  }
  const pgSink: PgFallbackSink | undefined = query ? createPgFallbackSink(query) : undefined;

  const loggerSink = createLoggerFallbackSink(logger);
  const extraSinks: FallbackSink[] = [];
  if (pgSink) extraSinks.push(pgSink);
  if (options.fallbackSink) extraSinks.push(options.fallbackSink);
  const fallbackSink =
    extraSinks.length === 0 ? loggerSink : combineFallbackSinks(loggerSink, ...extraSinks);

  const manager = createAlertManager({
    config,
    transport,
    fallbackSink,
    logger,
    circuitBreaker: options.circuitBreaker,
    now,
  });

  const router = createAlertStatusEndpoint(manager, logger);

  return {
    logger,
    manager,
    transport,
    fallbackSink,
    router,

    async start(): Promise<void> {
      if (pgSink) {
        await pgSink.ensureSchema();
      }
      const status = manager.getStatus();
      logger.info('Alerting system started', {
        enabled: status.enabled,
        minSeverity: status.minSeverity,
        transport: transport.name,
        transportConfigured: status.transportConfigured,
        durableFallback: pgSink !== undefined,
      });
    },

    async shutdown(): Promise<void> {
      if (ownedPool) {
        const pool = ownedPool;
        ownedPool = undefined;
        await pool.end();
      }
      logger.info('Alerting system stopped');
    },
  };
}
