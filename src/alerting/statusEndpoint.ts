/**
 * Alert Status Endpoint
 *
 * Operator routes over an {@link AlertManager}:
 *
 * - `GET /alerts/status` current switches and transport state
 * - `GET /alerts/stats` counters, rate-limit usage and breaker snapshot
 * - `POST /alerts/test` push a test alert through the pipeline
 *
 * @module alerting/statusEndpoint
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { Logger } from '../logging/logger.js';
import type { AlertManager } from './alertManager.js';
import { toError } from './errors.js';

export function createAlertStatusEndpoint(manager: AlertManager, logger?: Logger): Router {
  const router = Router();

  router.get('/alerts/status', (_req: Request, res: Response) => {
    res.status(200).json(manager.getStatus());
  });

  router.get('/alerts/stats', (_req: Request, res: Response) => {
    res.status(200).json(manager.getStats());
  });

  router.post('/alerts/test', async (_req: Request, res: Response) => {
    try {
      const success = await manager.testAlertSystem();
      res.status(success ? 200 : 503).json({ success });
    } catch (err) {
      logger?.error('Alert system test errored', toError(err));
      res.status(500).json({ success: false, error: 'Alert system test errored' });
    }
  });

  return router;
}
