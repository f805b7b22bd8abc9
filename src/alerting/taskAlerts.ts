/**
 * Task Alerts
 *
 * Wrappers for scheduled tasks and pipeline steps. They raise alerts about
 * how the wrapped function ran without changing its result: the value is
 * returned as-is and its error is rethrown as-is, even when alerting
 * itself fails.
 *
 * @module alerting/taskAlerts
 */

import { createLogger, type Logger } from '../logging/logger.js';
import type { AlertInput, AlertMetadataInput } from './alertFactory.js';
import type { AlertManager } from './alertManager.js';
import { toError } from './errors.js';
import type { AlertCategory, AlertOutcome, AlertSeverity } from './types.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

interface TaskAlertOptions {
  severity?: AlertSeverity;
  category?: AlertCategory;
  /** Defaults to `Task: <name>`. */
  component?: string;
  metadata?: AlertMetadataInput;
  logger?: Logger;
  now?: () => number;
}

export interface FailureAlertOptions extends TaskAlertOptions {
  /** Also send an info alert when the task succeeds. Default: false. */
  sendSuccessAlert?: boolean;
}

export interface RuntimeAlertOptions extends TaskAlertOptions {
  /** Runs longer than this raise an alert. Default: 5 minutes. */
  thresholdMs?: number;
}

export const DEFAULT_RUNTIME_THRESHOLD_MS = 5 * 60 * 1000;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function seconds(ms: number): string {
  return (ms / 1000).toFixed(1);
}

/** Send an alert on behalf of a task; problems are logged, never thrown. */
async function sendSafely(
  manager: AlertManager,
  input: AlertInput,
  logger: Logger,
): Promise<AlertOutcome | undefined> {
  try {
    return await manager.sendAlert(input);
  } catch (err) {
    logger.error(`Could not raise task alert: ${input.title}`, toError(err));
    return undefined;
  }
}

function errorMetadata(error: Error): AlertMetadataInput {
  return { error_type: error.name, error_message: error.message };
}

// ---------------------------------------------------------------------------
// Wrappers
// ---------------------------------------------------------------------------

/**
 * Run `fn`; if it rejects, send `Task Failed: <name>` and rethrow the
 * original error.
 */
export async function withFailureAlert<T>(
  manager: AlertManager,
  name: string,
  fn: () => Promise<T>,
  options: FailureAlertOptions = {},
): Promise<T> {
  const logger = (options.logger ?? createLogger()).child({ component: 'task-alerts' });
  const now = options.now ?? Date.now;
  const category = options.category ?? 'data_pipeline';
  const component = options.component ?? `Task: ${name}`;
  const started = now();

  let result: T;
  try {
    result = await fn();
  } catch (err) {
    const error = toError(err);
    await sendSafely(
      manager,
      {
        title: `Task Failed: ${name}`,
        message: `Task '${name}' failed with error: ${error.message}`,
        severity: options.severity ?? 'medium',
        category,
        component,
        metadata: { ...errorMetadata(error), ...options.metadata },
      },
      logger,
    );
    throw err;
  }

  if (options.sendSuccessAlert) {
    const duration = now() - started;
    await sendSafely(
      manager,
      {
        title: `Task Completed: ${name}`,
        message: `Task '${name}' completed successfully in ${seconds(duration)}s`,
        severity: 'info',
        category,
        component,
        metadata: { ...options.metadata, duration_ms: duration },
      },
      logger,
    );
  }
  return result;
}

/**
 * Run `fn` and alert when it takes longer than `thresholdMs`, whether it
 * succeeds or fails.
 */
export async function withRuntimeAlert<T>(
  manager: AlertManager,
  name: string,
  fn: () => Promise<T>,
  options: RuntimeAlertOptions = {},
): Promise<T> {
  const logger = (options.logger ?? createLogger()).child({ component: 'task-alerts' });
  const now = options.now ?? Date.now;
  const thresholdMs = options.thresholdMs ?? DEFAULT_RUNTIME_THRESHOLD_MS;
  const base = {
    severity: options.severity ?? 'medium',
    category: options.category ?? 'system_health',
    component: options.component ?? `Task: ${name}`,
  } satisfies Partial<AlertInput>;
  const started = now();

  let result: T;
  try {
    result = await fn();
  } catch (err) {
    const duration = now() - started;
    if (duration > thresholdMs) {
      const error = toError(err);
      await sendSafely(
        manager,
        {
          ...base,
          title: `Long Runtime (Failed): ${name}`,
          message: `Task '${name}' failed after ${seconds(duration)}s (threshold: ${seconds(thresholdMs)}s)`,
          metadata: {
            ...options.metadata,
            duration_ms: duration,
            threshold_ms: thresholdMs,
            task_name: name,
            ...errorMetadata(error),
          },
        },
        logger,
      );
    }
    throw err;
  }

  const duration = now() - started;
  if (duration > thresholdMs) {
    await sendSafely(
      manager,
      {
        ...base,
        title: `Long Runtime: ${name}`,
        message: `Task '${name}' took ${seconds(duration)}s (threshold: ${seconds(thresholdMs)}s)`,
        metadata: {
          ...options.metadata,
          duration_ms: duration,
          threshold_ms: thresholdMs,
          task_name: name,
        },
      },
      logger,
    );
  }
  return result;
}
