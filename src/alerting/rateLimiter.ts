/**
 * Alert Rate Limiter
 *
 * Per-category hourly and daily budgets over fixed, wall-clock aligned
 * windows: hours start on the hour, days at local midnight. Windows roll
 * over lazily on the first `allow` call that sees the boundary has passed.
 *
 * `allow` is a single synchronous check-and-increment, so concurrent
 * producers on the event loop cannot interleave inside it.
 *
 * @module alerting/rateLimiter
 */

import type { AlertConfig } from '../config/alertConfig.js';
import { mapCategories, type AlertCategory } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RateLimitWindow {
  hourCount: number;
  /** Epoch ms of the start of the current hour window. */
  hourWindowStart: number;
  dayCount: number;
  /** Epoch ms of local midnight that opened the current day window. */
  dayWindowStart: number;
}

export interface RateLimitUsage {
  readonly hourCount: number;
  readonly dayCount: number;
  readonly maxPerHour: number;
  readonly maxPerDay: number;
  readonly hourWindowStart: Date;
  readonly dayWindowStart: Date;
  /** True when rate limiting does not apply to this category. */
  readonly exempt: boolean;
}

export interface AlertRateLimiter {
  /** Consume one unit of budget for `category` if both windows have room. */
  allow(category: AlertCategory): boolean;
  getUsage(): Readonly<Record<AlertCategory, RateLimitUsage>>;
  /** Clear all windows. */
  reset(): void;
}

export type ConfigProvider = () => AlertConfig;

// ---------------------------------------------------------------------------
// Window helpers
// ---------------------------------------------------------------------------

export function startOfHour(epochMs: number): number {
  const d = new Date(epochMs);
  d.setMinutes(0, 0, 0);
  return d.getTime();
}

export function startOfDay(epochMs: number): number {
  const d = new Date(epochMs);
  d.setHours(0, 0, 0, 0);
  return d.getTime();
}

function freshWindow(at: number): RateLimitWindow {
  return {
    hourCount: 0,
    hourWindowStart: startOfHour(at),
    dayCount: 0,
    dayWindowStart: startOfDay(at),
  };
}

/** Advance any window whose boundary has passed. Returns the same object. */
function rollOver(window: RateLimitWindow, at: number): RateLimitWindow {
  const hourStart = startOfHour(at);
  if (hourStart > window.hourWindowStart) {
    window.hourCount = 0;
    window.hourWindowStart = hourStart;
  }
  const dayStart = startOfDay(at);
  if (dayStart > window.dayWindowStart) {
    window.dayCount = 0;
    window.dayWindowStart = dayStart;
  }
  return window;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a rate limiter whose limits are read from `config` on every call,
 * so a swapped configuration snapshot takes effect without losing counts.
 */
export function createAlertRateLimiter(
  config: AlertConfig | ConfigProvider,
  now: () => number = Date.now,
): AlertRateLimiter {
  const getConfig: ConfigProvider = typeof config === 'function' ? config : () => config;
  const windows = new Map<AlertCategory, RateLimitWindow>();

  function isExempt(current: AlertConfig, category: AlertCategory): boolean {
    return !current.rateLimiting.enabled || !current.categories[category].rateLimitEnabled;
  }

  return {
    allow(category: AlertCategory): boolean {
      const current = getConfig();
      if (isExempt(current, category)) return true;

      const at = now();
      const window = rollOver(windows.get(category) ?? freshWindow(at), at);
      windows.set(category, window);

      const { maxAlertsPerHour, maxAlertsPerDay } = current.rateLimiting;
      if (window.hourCount >= maxAlertsPerHour || window.dayCount >= maxAlertsPerDay) {
        return false;
      }

      window.hourCount += 1;
      window.dayCount += 1;
      return true;
    },

    getUsage(): Readonly<Record<AlertCategory, RateLimitUsage>> {
      const current = getConfig();
      const at = now();
      return Object.freeze(
        mapCategories((category) => {
          // Report what the next allow() would see, without mutating state
          const stored = windows.get(category);
          const view = rollOver(stored ? { ...stored } : freshWindow(at), at);
          return Object.freeze({
            hourCount: view.hourCount,
            dayCount: view.dayCount,
            maxPerHour: current.rateLimiting.maxAlertsPerHour,
            maxPerDay: current.rateLimiting.maxAlertsPerDay,
            hourWindowStart: new Date(view.hourWindowStart),
            dayWindowStart: new Date(view.dayWindowStart),
            exempt: isExempt(current, category),
          });
        }),
      );
    },

    reset(): void {
      windows.clear();
    },
  };
}
