import { describe, it, expect } from 'vitest';
import { createAlertRateLimiter, startOfDay, startOfHour } from './rateLimiter.js';
import type { AlertConfig } from '../config/alertConfig.js';
import { buildConfig, createTestClock, DEFAULT_TEST_TIME } from '../test/setup.js';

const HOUR = 60 * 60 * 1000;

function limitedConfig(maxAlertsPerHour: number, maxAlertsPerDay = 50): AlertConfig {
  return buildConfig({ rateLimiting: { maxAlertsPerHour, maxAlertsPerDay } });
}

describe('window helpers', () => {
  it('aligns hours to :00 and days to local midnight', () => {
    const at = new Date(2025, 0, 15, 10, 47, 12, 345).getTime();
    expect(startOfHour(at)).toBe(new Date(2025, 0, 15, 10, 0, 0, 0).getTime());
    expect(startOfDay(at)).toBe(new Date(2025, 0, 15, 0, 0, 0, 0).getTime());
  });
});

describe('createAlertRateLimiter', () => {
  it('allows up to the hourly limit, then rejects', () => {
    const clock = createTestClock();
    const limiter = createAlertRateLimiter(limitedConfig(3), clock.now);

    expect([1, 2, 3, 4].map(() => limiter.allow('general'))).toEqual([true, true, true, false]);
    expect(limiter.getUsage().general.hourCount).toBe(3);
  });

  it('does not consume budget on rejected attempts', () => {
    const clock = createTestClock();
    const limiter = createAlertRateLimiter(limitedConfig(1), clock.now);

    limiter.allow('general');
    limiter.allow('general');
    limiter.allow('general');

    const usage = limiter.getUsage().general;
    expect(usage.hourCount).toBe(1);
    expect(usage.dayCount).toBe(1);
  });

  it('keeps budgets independent per category', () => {
    const clock = createTestClock();
    const limiter = createAlertRateLimiter(limitedConfig(1), clock.now);

    expect(limiter.allow('general')).toBe(true);
    expect(limiter.allow('general')).toBe(false);
    expect(limiter.allow('security')).toBe(true);
  });

  it('allows again at window start + 1 hour + 1 second', () => {
    const hourStart = startOfHour(DEFAULT_TEST_TIME);
    const clock = createTestClock(hourStart);
    const limiter = createAlertRateLimiter(limitedConfig(2), clock.now);

    limiter.allow('data_pipeline');
    limiter.allow('data_pipeline');
    expect(limiter.allow('data_pipeline')).toBe(false);

    clock.set(hourStart + HOUR + 1000);
    expect(limiter.allow('data_pipeline')).toBe(true);
    expect(limiter.getUsage().data_pipeline.hourCount).toBe(1);
  });

  it('rolls over on the wall-clock hour, not an hour after the first alert', () => {
    const clock = createTestClock(new Date(2025, 0, 15, 10, 59, 0).getTime());
    const limiter = createAlertRateLimiter(limitedConfig(1), clock.now);

    expect(limiter.allow('general')).toBe(true);
    clock.set(new Date(2025, 0, 15, 11, 0, 1).getTime());
    expect(limiter.allow('general')).toBe(true);
  });

  it('enforces the daily limit across hours until midnight', () => {
    const clock = createTestClock(new Date(2025, 0, 15, 9, 0, 0).getTime());
    const limiter = createAlertRateLimiter(limitedConfig(5, 2), clock.now);

    expect(limiter.allow('general')).toBe(true);
    clock.advance(HOUR);
    expect(limiter.allow('general')).toBe(true);
    clock.advance(HOUR);
    expect(limiter.allow('general')).toBe(false);

    clock.set(new Date(2025, 0, 16, 0, 0, 5).getTime());
    expect(limiter.allow('general')).toBe(true);
    expect(limiter.getUsage().general.dayCount).toBe(1);
  });

  it('always allows without counting when rate limiting is disabled', () => {
    const clock = createTestClock();
    const limiter = createAlertRateLimiter(
      buildConfig({ rateLimiting: { enabled: false, maxAlertsPerHour: 1 } }),
      clock.now,
    );

    expect([1, 2, 3].map(() => limiter.allow('general'))).toEqual([true, true, true]);
    expect(limiter.getUsage().general.hourCount).toBe(0);
    expect(limiter.getUsage().general.exempt).toBe(true);
  });

  it('exempts a category whose own rate limiting is off', () => {
    const clock = createTestClock();
    const limiter = createAlertRateLimiter(
      buildConfig({
        rateLimiting: { maxAlertsPerHour: 1 },
        categories: { security: { rateLimitEnabled: false } },
      }),
      clock.now,
    );

    expect([1, 2, 3].map(() => limiter.allow('security'))).toEqual([true, true, true]);
    expect(limiter.allow('general')).toBe(true);
    expect(limiter.allow('general')).toBe(false);
  });

  it('reads limits from the current configuration on every call', () => {
    const clock = createTestClock();
    let config = limitedConfig(1);
    const limiter = createAlertRateLimiter(() => config, clock.now);

    expect(limiter.allow('general')).toBe(true);
    expect(limiter.allow('general')).toBe(false);

    config = limitedConfig(3);
    expect(limiter.allow('general')).toBe(true);
    expect(limiter.getUsage().general.hourCount).toBe(2);
    expect(limiter.getUsage().general.maxPerHour).toBe(3);
  });

  it('getUsage reports rolled-over windows without mutating them', () => {
    const hourStart = startOfHour(DEFAULT_TEST_TIME);
    const clock = createTestClock(hourStart);
    const limiter = createAlertRateLimiter(limitedConfig(5), clock.now);

    limiter.allow('general');
    clock.advance(HOUR);

    const usage = limiter.getUsage().general;
    expect(usage.hourCount).toBe(0);
    expect(usage.dayCount).toBe(1);
    expect(usage.hourWindowStart.getTime()).toBe(hourStart + HOUR);
    expect(Object.isFrozen(usage)).toBe(true);
  });

  it('reset clears all windows', () => {
    const clock = createTestClock();
    const limiter = createAlertRateLimiter(limitedConfig(1), clock.now);

    limiter.allow('general');
    limiter.reset();
    expect(limiter.allow('general')).toBe(true);
  });
});
