import { describe, it, expect } from 'vitest';
import pg from 'pg';
import { createPool, getDbConfig } from './pool.js';

describe('getDbConfig', () => {
  it('falls back to local defaults', () => {
    expect(getDbConfig({})).toEqual({
      host: 'localhost',
      port: 5432,
      database: 'alert_relay',
      user: 'postgres',
      password: '',
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      ssl: false,
    });
  });

  it('reads DB_* variables', () => {
    const config = getDbConfig({
      DB_HOST: 'db.internal',
      DB_PORT: '6543',
      DB_NAME: 'alerts',
      DB_USER: 'relay',
      DB_PASSWORD: 'test-secret',
      DB_POOL_MAX: '2',
      DB_SSL: 'true',
    });

    expect(config).toMatchObject({
      host: 'db.internal',
      port: 6543,
      database: 'alerts',
      user: 'relay',
      password: 'test-secret',
      max: 2,
      ssl: true,
    });
  });
});

describe('createPool', () => {
  it('creates a pool without connecting', async () => {
    const pool = createPool({ host: '127.0.0.1', max: 1 });

    expect(pool).toBeInstanceOf(pg.Pool);
    expect(pool.totalCount).toBe(0);
    await pool.end();
  });
});
