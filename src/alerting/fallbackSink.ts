/**
 * Fallback Sinks
 *
 * Every alert that is not delivered (filtered, rate limited or failed) is
 * written to a fallback sink so it stays on the operational record.
 *
 * @module alerting/fallbackSink
 */

import type { QueryFn } from '../db/pool.js';
import type { Logger } from '../logging/logger.js';
import { toError } from './errors.js';
import type { Alert, NonDeliveredOutcome } from './types.js';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface FallbackReason {
  outcome: NonDeliveredOutcome;
  /** Error message or policy detail, when there is one. */
  detail?: string;
}

export interface FallbackSink {
  log(alert: Alert, reason: FallbackReason): Promise<void>;
}

/** Plain-object view of an alert suitable for JSON logs. */
export function serializeAlert(alert: Alert): Record<string, unknown> {
  return {
    id: alert.id,
    title: alert.title,
    message: alert.message,
    severity: alert.severity,
    category: alert.category,
    component: alert.component,
    metadata: alert.metadata,
    createdAt: alert.createdAt.toISOString(),
    ...(alert.correlationId !== undefined ? { correlationId: alert.correlationId } : {}),
  };
}

// ─── Logger sink ─────────────────────────────────────────────────────────────

/** Writes one `warn` entry per undelivered alert, carrying the full alert. */
export function createLoggerFallbackSink(logger: Logger): FallbackSink {
  const log = logger.child({ component: 'alert-fallback' });
  return {
    async log(alert: Alert, reason: FallbackReason): Promise<void> {
      log.warn(`Alert not delivered (${reason.outcome}): ${alert.title}`, {
        outcome: reason.outcome,
        ...(reason.detail !== undefined ? { detail: reason.detail } : {}),
        alert: serializeAlert(alert),
      });
    },
  };
}

// ─── In-memory sink (for testing) ────────────────────────────────────────────

export interface FallbackRecord {
  alert: Alert;
  reason: FallbackReason;
  loggedAt: Date;
}

export function createInMemoryFallbackSink(): FallbackSink & { records: FallbackRecord[] } {
  const records: FallbackRecord[] = [];
  return {
    records,
    async log(alert: Alert, reason: FallbackReason): Promise<void> {
      records.push({ alert, reason: { ...reason }, loggedAt: new Date() });
    },
  };
}

// ─── PostgreSQL sink ─────────────────────────────────────────────────────────

export const FALLBACK_TABLE = 'alert_fallback_log';

export const FALLBACK_TABLE_DDL = `
  CREATE TABLE IF NOT EXISTS ${FALLBACK_TABLE} (
    id BIGSERIAL PRIMARY KEY,
    alert_id UUID NOT NULL,
    outcome VARCHAR(32) NOT NULL,
    detail TEXT,
    title TEXT NOT NULL,
    message TEXT NOT NULL,
    severity VARCHAR(16) NOT NULL,
    category VARCHAR(32) NOT NULL,
    component VARCHAR(255) NOT NULL,
    metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
    correlation_id VARCHAR(255),
    alert_created_at TIMESTAMP WITH TIME ZONE NOT NULL,
    logged_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
  )
`;

const INSERT_SQL = `INSERT INTO ${FALLBACK_TABLE}
    (alert_id, outcome, detail, title, message, severity, category, component,
     metadata, correlation_id, alert_created_at)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`;

export interface PgFallbackSink extends FallbackSink {
  /** Create the fallback table if it does not exist yet. */
  ensureSchema(): Promise<void>;
}

export function createPgFallbackSink(query: QueryFn): PgFallbackSink {
  return {
    async ensureSchema(): Promise<void> {
      await query(FALLBACK_TABLE_DDL);
    },

    async log(alert: Alert, reason: FallbackReason): Promise<void> {
      await query(INSERT_SQL, [
        alert.id,
        reason.outcome,
        reason.detail ?? null,
        alert.title,
        alert.message,
        alert.severity,
        alert.category,
        alert.component,
        JSON.stringify(alert.metadata),
        alert.correlationId ?? null,
        alert.createdAt,
      ]);
    },
  };
}

// ─── Fan-out ─────────────────────────────────────────────────────────────────

/**
 * Write to every sink. A failing sink does not prevent the others from
 * running; if any failed, the first error is rethrown afterwards.
 */
export function combineFallbackSinks(...sinks: FallbackSink[]): FallbackSink {
  return {
    async log(alert: Alert, reason: FallbackReason): Promise<void> {
      const results = await Promise.allSettled(sinks.map((sink) => sink.log(alert, reason)));
      const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
      if (failure) {
        throw toError(failure.reason);
      }
    },
  };
}
