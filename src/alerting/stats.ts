/**
 * Alert statistics.
 *
 * Monotonic counters of what happened to every processed alert. Reads
 * return frozen copies; nothing is decremented except by `reset`.
 *
 * @module alerting/stats
 */

import {
  isFilteredOutcome,
  mapCategories,
  type Alert,
  type AlertCategory,
  type AlertOutcome,
  type AlertSeverity,
} from './types.js';

export interface AlertStats {
  readonly total: number;
  readonly sent: number;
  readonly failed: number;
  readonly rateLimited: number;
  /** Filtered by the global switch, severity threshold or category flag. */
  readonly filtered: number;
  readonly byCategory: Readonly<Record<AlertCategory, number>>;
  readonly bySeverity: Readonly<Record<AlertSeverity, number>>;
}

export interface StatsRecorder {
  record(alert: Pick<Alert, 'category' | 'severity'>, outcome: AlertOutcome): void;
  snapshot(): AlertStats;
  reset(): void;
}

function emptySeverityCounts(): Record<AlertSeverity, number> {
  return { info: 0, low: 0, medium: 0, high: 0, critical: 0 };
}

export function createStatsRecorder(): StatsRecorder {
  let total = 0;
  let sent = 0;
  let failed = 0;
  let rateLimited = 0;
  let filtered = 0;
  let byCategory = mapCategories(() => 0);
  let bySeverity = emptySeverityCounts();

  return {
    record(alert, outcome): void {
      total += 1;
      byCategory[alert.category] += 1;
      bySeverity[alert.severity] += 1;

      if (outcome === 'sent') sent += 1;
      else if (outcome === 'failed') failed += 1;
      else if (outcome === 'rate_limited') rateLimited += 1;
      else if (isFilteredOutcome(outcome)) filtered += 1;
    },

    snapshot(): AlertStats {
      return Object.freeze({
        total,
        sent,
        failed,
        rateLimited,
        filtered,
        byCategory: Object.freeze({ ...byCategory }),
        bySeverity: Object.freeze({ ...bySeverity }),
      });
    },

    reset(): void {
      total = 0;
      sent = 0;
      failed = 0;
      rateLimited = 0;
      filtered = 0;
      byCategory = mapCategories(() => 0);
      bySeverity = emptySeverityCounts();
    },
  };
}
